import { describe, it, expect, beforeEach } from "vitest";
import { Engine } from "./Engine";
import { EntityStore } from "./entity/EntityStore";
import { getEntityStore } from "./entity/context";
import { RecordingRenderer } from "./layer/RecordingRenderer";
import type { Logger } from "./log";
import type { Point, Rect } from "./math/rect";
import { resolveEngineOptions } from "./options";
import { ManualScheduler } from "./scheduler";
import type { Color } from "./types/color";

const SIZE = { width: 400, height: 300 };
const WHITE: Color = [1, 1, 1, 1];

class CapturingLogger implements Logger {
  logs: string[] = [];
  warnings: string[] = [];
  errors: string[] = [];

  log(message: string): void {
    this.logs.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

function center(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

describe("Engine", () => {
  let store: EntityStore;
  let renderer: RecordingRenderer;
  let scheduler: ManualScheduler;
  let logger: CapturingLogger;
  let engine: Engine;

  beforeEach(() => {
    store = new EntityStore();
    renderer = new RecordingRenderer();
    scheduler = new ManualScheduler();
    logger = new CapturingLogger();
    engine = new Engine({ size: SIZE, renderer, scheduler, entityStore: store, logger });
  });

  /** UI layer with a counter incremented by a button; returns the button bounds seen last */
  function addCounterLayer(): () => Rect | null {
    let bounds: Rect | null = null;
    engine.layers.addUiLayer(
      0,
      ({ ui }) => {
        const counter = ui.useEntity("counter", () => ({ value: 0 }));
        ui.horizontal(() => {
          const inc = ui.button("+", { key: "inc" });
          bounds = inc.bounds;
          if (inc.clicked) {
            store.withMut(counter, (state) => {
              state.value += 1;
            });
          }
        });
        ui.text(`count: ${store.get(counter).value}`, { key: "label" });
      },
      { options: { inputEnabled: true }, ui: { theme: { button: { fontSize: 10, padding: 5 }, label: { fontSize: 10 } } } }
    );
    return () => bounds;
  }

  function lastText(): string | null {
    const output = renderer.last?.outputs[0];
    if (output?.kind !== "ui") return null;
    const texts = output.drawList.commands().flatMap((c) => (c.kind === "text" ? [c.text] : []));
    return texts[texts.length - 1] ?? null;
  }

  describe("frame()", () => {
    it("renders the layers and submits them to the renderer", () => {
      engine.layers.addRawLayer(0, (ctx) => ctx.fullscreenQuad("background"));

      const result = engine.frame();

      expect(result.outputs).toHaveLength(1);
      expect(result.routed).toEqual([]);
      expect(result.needsFrame).toBe(false);
      expect(renderer.frames).toHaveLength(1);
      expect(renderer.last?.frame).toEqual({ size: SIZE, scaleFactor: 1 });
    });

    it("routes queued input before the declarative pass", () => {
      const buttonBounds = addCounterLayer();
      engine.frame();
      expect(lastText()).toBe("count: 0");

      const bounds = buttonBounds();
      if (!bounds) throw new Error("button not declared");
      const position = center(bounds);
      engine.dispatch({ type: "pointerDown", position, button: "left" });
      engine.dispatch({ type: "pointerUp", position, button: "left" });
      expect(engine.pendingInput).toBe(2);

      const result = engine.frame();

      expect(engine.pendingInput).toBe(0);
      expect(result.routed.map((r) => r.events.map((e) => e.type))).toEqual([
        ["enter", "down", "focus"],
        ["up", "click"],
      ]);
      expect(lastText()).toBe("count: 1");
      // The counter changed during the pass, so another frame is wanted
      expect(result.needsFrame).toBe(true);

      const settled = engine.frame();
      expect(lastText()).toBe("count: 1");
      expect(settled.needsFrame).toBe(false);
    });

    it("reclaims entities whose call sites disappeared", () => {
      let show = true;
      engine.layers.addUiLayer(0, ({ ui }) => {
        if (show) ui.useEntity("draft", () => ({ text: "" }));
      });

      engine.frame();
      expect(store.size).toBe(1);

      show = false;
      engine.frame();
      expect(store.size).toBe(0);
      expect(store.capacity).toBe(1);
    });

    it("logs a frame summary in debug mode", () => {
      const debugEngine = new Engine({ size: SIZE, scheduler, entityStore: store, logger, debug: true });
      debugEngine.layers.addRawLayer(0, (ctx) => {
        ctx.fillPolygon([[0, 0], [10, 0], [10, 10]], [], WHITE);
      });

      debugEngine.frame();
      debugEngine.frame();

      expect(logger.logs).toEqual(["[Engine] frame=1, layers=1, commands=1, entities=0"]);
    });
  });

  describe("frame loop", () => {
    it("schedules frames only when requested", () => {
      engine.layers.addRawLayer(0, () => {});
      engine.start();
      expect(scheduler.pending).toBe(1);

      expect(scheduler.step()).toBe(1);
      expect(renderer.frames).toHaveLength(1);
      expect(scheduler.pending).toBe(0);

      engine.dispatch({ type: "pointerMove", position: { x: 5, y: 5 } });
      expect(scheduler.pending).toBe(1);
      scheduler.step();
      expect(renderer.frames).toHaveLength(2);
    });

    it("keeps running while a layer asks for the next frame", () => {
      let rendered = 0;
      engine.layers.addRawLayer(0, (ctx) => {
        rendered++;
        if (rendered < 3) ctx.requestFrame();
      });
      engine.start();

      const steps = [scheduler.step(), scheduler.step(), scheduler.step(), scheduler.step()];

      expect(steps).toEqual([1, 1, 1, 0]);
      expect(rendered).toBe(3);
    });

    it("schedules a frame for layers added while running", () => {
      engine.start();
      scheduler.step();
      expect(scheduler.pending).toBe(0);

      engine.layers.addRawLayer(0, () => {});
      expect(scheduler.pending).toBe(1);
    });

    it("cancels the pending frame on stop and keeps queued input", () => {
      engine.start();
      engine.dispatch({ type: "keyDown", key: "a" });
      engine.stop();

      expect(scheduler.pending).toBe(0);
      expect(engine.isRunning).toBe(false);
      expect(engine.pendingInput).toBe(1);
    });

    it("stops the loop when a scheduled frame fails", () => {
      engine.layers.addRawLayer(0, () => {
        throw new Error("boom");
      });
      engine.start();

      expect(() => scheduler.step()).toThrowError("boom");
      expect(engine.isRunning).toBe(false);
      expect(logger.errors).toEqual(["[Engine] Frame failed, stopping the frame loop"]);
    });
  });

  it("requests a frame when resized", () => {
    engine.frame();
    expect(engine.needsFrame).toBe(false);

    engine.resize(SIZE);
    expect(engine.needsFrame).toBe(false);

    engine.resize({ width: 200, height: 100 }, 2);
    expect(engine.needsFrame).toBe(true);
    engine.frame();
    expect(renderer.last?.frame).toEqual({ size: { width: 200, height: 100 }, scaleFactor: 2 });
  });
});

describe("resolveEngineOptions", () => {
  it("uses the process-wide entity store by default", () => {
    expect(resolveEngineOptions().entityStore).toBe(getEntityStore());
  });

  it("creates a private store when a capacity is given", () => {
    const resolved = resolveEngineOptions({ maxEntities: 4 });
    expect(resolved.entityStore).not.toBe(getEntityStore());
  });

  it("replaces an invalid scale factor", () => {
    const logger = new CapturingLogger();
    const resolved = resolveEngineOptions({ scaleFactor: 0, logger });
    expect(resolved.scaleFactor).toBe(1);
    expect(logger.warnings).toEqual(["[Engine] Ignoring invalid scaleFactor 0, using 1"]);
  });
});
