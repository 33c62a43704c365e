import { describe, it, expect, beforeEach } from "vitest";
import { InteractionSystem } from "./InteractionSystem";
import { canonicalizeInput, eventPosition, mousePointer, NO_MODIFIERS, touchPointer } from "./InputEvent";
import { dragIndex } from "./dragDrop";
import type { HitTarget, InteractionEvent } from "./types";

const A: HitTarget = { id: "a", bounds: { x: 0, y: 0, width: 100, height: 40 }, focusable: true };
const B: HitTarget = { id: "b", bounds: { x: 0, y: 50, width: 100, height: 40 }, focusable: true };
const C: HitTarget = { id: "c", bounds: { x: 0, y: 100, width: 100, height: 40 }, focusable: false };
const OVERLAY: HitTarget = { id: "o", bounds: { x: 0, y: 0, width: 50, height: 100 }, focusable: false };

function commit(system: InteractionSystem, targets: HitTarget[]): InteractionEvent[] {
  return system.commitFrame(targets, new Set(targets.map((t) => t.id)));
}

function types(events: InteractionEvent[]): string[] {
  return events.map((e) => `${e.type}:${e.id}`);
}

describe("canonicalizeInput", () => {
  it("keys mouse presses by button", () => {
    const input = canonicalizeInput({ type: "pointerDown", position: { x: 1, y: 2 }, button: "right" });
    expect(input).toEqual({
      kind: "pointer",
      phase: "down",
      source: "mouse",
      pointer: "mouse:right",
      position: { x: 1, y: 2 },
      primary: false,
    });
  });

  it("keys touches by touch id", () => {
    const input = canonicalizeInput({ type: "touchUp", position: { x: 5, y: 6 }, touchId: 7 });
    expect(input).toMatchObject({ kind: "pointer", phase: "up", source: "touch", pointer: "touch:7" });
  });

  it("maps touch cancel to the cancel phase without a position", () => {
    const input = canonicalizeInput({ type: "touchCancel", touchId: 2 });
    expect(input).toMatchObject({ phase: "cancel", pointer: "touch:2", position: null });
  });

  it("fills in missing key modifiers", () => {
    const input = canonicalizeInput({ type: "keyDown", key: "a" });
    expect(input).toEqual({ kind: "key", phase: "down", key: "a", modifiers: NO_MODIFIERS, repeat: false });
  });
});

describe("pointer keys", () => {
  it("names mouse buttons and touch contacts", () => {
    expect(mousePointer("middle")).toBe("mouse:middle");
    expect(touchPointer(3)).toBe("touch:3");
  });
});

describe("eventPosition", () => {
  it("reads the position of pointer, touch and wheel events", () => {
    expect(eventPosition({ type: "pointerMove", position: { x: 4, y: 5 } })).toEqual({ x: 4, y: 5 });
    expect(eventPosition({ type: "touchDown", position: { x: 1, y: 2 }, touchId: 0 })).toEqual({ x: 1, y: 2 });
    expect(eventPosition({ type: "wheel", position: { x: 7, y: 8 }, delta: { x: 0, y: 1 } })).toEqual({ x: 7, y: 8 });
  });

  it("is null for events without one", () => {
    expect(eventPosition({ type: "pointerLeave" })).toBeNull();
    expect(eventPosition({ type: "touchCancel", touchId: 1 })).toBeNull();
    expect(eventPosition({ type: "keyDown", key: "a" })).toBeNull();
  });
});

describe("InteractionSystem", () => {
  let system: InteractionSystem;

  beforeEach(() => {
    system = new InteractionSystem();
  });

  describe("hit testing", () => {
    it("prefers the target painted last", () => {
      commit(system, [A, OVERLAY]);
      expect(system.hitTest({ x: 10, y: 10 })?.id).toBe("o");
      expect(system.hitTest({ x: 80, y: 10 })?.id).toBe("a");
    });

    it("reports the position local to the hit target", () => {
      commit(system, [A, B]);
      expect(system.hitTest({ x: 15, y: 60 })).toEqual({
        id: "b",
        bounds: B.bounds,
        local: { x: 15, y: 10 },
      });
    });

    it("misses outside every target", () => {
      commit(system, [A, B]);
      expect(system.hitTest({ x: 10, y: 45 })).toBeNull();
    });
  });

  describe("hover", () => {
    it("follows the pointer", () => {
      commit(system, [A, B]);
      expect(types(system.handleInput({ type: "pointerMove", position: { x: 10, y: 10 } }))).toEqual([
        "enter:a",
      ]);
      expect(types(system.handleInput({ type: "pointerMove", position: { x: 10, y: 60 } }))).toEqual([
        "leave:a",
        "enter:b",
      ]);
      expect(system.stateOf("a").hovered).toBe(false);
      expect(system.stateOf("b").hovered).toBe(true);
    });

    it("clears when the pointer leaves the surface", () => {
      commit(system, [A]);
      system.handleInput({ type: "pointerMove", position: { x: 10, y: 10 } });
      expect(types(system.handleInput({ type: "pointerLeave" }))).toEqual(["leave:a"]);
      expect(system.getHovered()).toBeNull();
    });

    it("only lets the pressed widget be hovered while it is active", () => {
      commit(system, [A, B]);
      system.handleInput({ type: "pointerDown", position: { x: 10, y: 10 }, button: "left" });
      expect(types(system.handleInput({ type: "pointerMove", position: { x: 10, y: 60 } }))).toEqual([
        "leave:a",
      ]);
      expect(system.isHovered("b")).toBe(false);
      expect(types(system.handleInput({ type: "pointerMove", position: { x: 10, y: 10 } }))).toEqual([
        "enter:a",
      ]);
    });
  });

  describe("press and click", () => {
    it("clicks when the release lands on the pressed widget", () => {
      commit(system, [A, B]);
      const down = system.handleInput({ type: "pointerDown", position: { x: 10, y: 10 }, button: "left" });
      expect(types(down)).toEqual(["enter:a", "down:a", "focus:a"]);
      expect(system.isActive("a")).toBe(true);

      const up = system.handleInput({ type: "pointerUp", position: { x: 20, y: 20 }, button: "left" });
      expect(types(up)).toEqual(["up:a", "click:a"]);
      expect(up[1]).toEqual({
        type: "click",
        id: "a",
        pointer: "mouse:left",
        position: { x: 20, y: 20 },
        local: { x: 20, y: 20 },
      });
      expect(system.isActive("a")).toBe(false);
    });

    it("does not click when the release lands elsewhere", () => {
      commit(system, [A, B]);
      system.handleInput({ type: "pointerDown", position: { x: 10, y: 10 }, button: "left" });
      system.handleInput({ type: "pointerMove", position: { x: 10, y: 60 } });
      const up = system.handleInput({ type: "pointerUp", position: { x: 10, y: 60 }, button: "left" });
      expect(types(up)).toEqual(["up:a", "enter:b"]);
    });

    it("drops a release with no matching press", () => {
      commit(system, [A]);
      expect(system.handleInput({ type: "pointerUp", position: { x: 10, y: 10 }, button: "left" })).toEqual(
        []
      );
    });

    it("tracks mouse buttons independently", () => {
      commit(system, [A]);
      system.handleInput({ type: "pointerDown", position: { x: 10, y: 10 }, button: "right" });
      const up = system.handleInput({ type: "pointerUp", position: { x: 10, y: 10 }, button: "left" });
      expect(up).toEqual([]);
      expect(system.isActive("a")).toBe(true);
    });

    it("keeps focus where it was on a secondary-button press", () => {
      commit(system, [A, B]);
      system.focus("b");
      const down = system.handleInput({ type: "pointerDown", position: { x: 10, y: 10 }, button: "right" });
      expect(types(down)).toEqual(["enter:a", "down:a"]);
      expect(system.getFocused()).toBe("b");
    });
  });

  describe("touch", () => {
    it("behaves like a mouse press keyed by touch id", () => {
      commit(system, [A]);
      const down = system.handleInput({ type: "touchDown", position: { x: 10, y: 10 }, touchId: 3 });
      expect(down[1]).toMatchObject({ type: "down", id: "a", pointer: "touch:3" });
      const up = system.handleInput({ type: "touchUp", position: { x: 12, y: 12 }, touchId: 3 });
      expect(types(up)).toEqual(["up:a", "click:a", "leave:a"]);
    });

    it("returns the widget to idle on cancel without a click", () => {
      commit(system, [A]);
      system.handleInput({ type: "touchDown", position: { x: 10, y: 10 }, touchId: 3 });
      const cancel = system.handleInput({ type: "touchCancel", touchId: 3 });

      expect(types(cancel)).toEqual(["cancel:a", "leave:a"]);
      expect(system.stateOf("a")).toEqual({ hovered: false, active: false, focused: true });

      system.beginPass();
      expect(system.wasClicked("a")).toBe(false);
    });

    it("ignores a cancel for a touch it is not tracking", () => {
      commit(system, [A]);
      expect(system.handleInput({ type: "touchCancel", touchId: 9 })).toEqual([]);
    });

    it("tracks several touches at once", () => {
      commit(system, [A, B]);
      system.handleInput({ type: "touchDown", position: { x: 10, y: 10 }, touchId: 1 });
      system.handleInput({ type: "touchDown", position: { x: 10, y: 60 }, touchId: 2 });
      expect(system.isActive("a")).toBe(true);
      expect(system.isActive("b")).toBe(true);

      const up = system.handleInput({ type: "touchUp", position: { x: 10, y: 60 }, touchId: 2 });
      expect(types(up)).toEqual(["up:b", "click:b"]);
      expect(system.isActive("a")).toBe(true);
    });
  });

  describe("focus", () => {
    it("blurs when the primary button goes down on empty space", () => {
      commit(system, [A]);
      system.focus("a");
      const down = system.handleInput({ type: "pointerDown", position: { x: 500, y: 500 }, button: "left" });
      expect(types(down)).toEqual(["blur:a"]);
    });

    it("blurs when pressing a widget that cannot take focus", () => {
      commit(system, [A, C]);
      system.focus("a");
      const down = system.handleInput({ type: "pointerDown", position: { x: 10, y: 110 }, button: "left" });
      expect(types(down)).toEqual(["enter:c", "down:c", "blur:a"]);
    });

    it("cycles focusable widgets in paint order with Tab", () => {
      commit(system, [A, C, B]);
      const tab = { type: "keyDown", key: "Tab" } as const;
      expect(types(system.handleInput(tab))).toEqual(["focus:a"]);
      expect(types(system.handleInput(tab))).toEqual(["blur:a", "focus:b"]);
      expect(types(system.handleInput(tab))).toEqual(["blur:b", "focus:a"]);
    });

    it("cycles backwards with Shift+Tab", () => {
      commit(system, [A, B]);
      const shiftTab = {
        type: "keyDown",
        key: "Tab",
        modifiers: { ...NO_MODIFIERS, shift: true },
      } as const;
      expect(types(system.handleInput(shiftTab))).toEqual(["focus:b"]);
      expect(types(system.handleInput(shiftTab))).toEqual(["blur:b", "focus:a"]);
    });

    it("keeps Tab inside a focus trap", () => {
      commit(system, [A, B]);
      expect(types(system.pushFocusTrap(["b"]))).toEqual(["focus:b"]);
      expect(system.handleInput({ type: "keyDown", key: "Tab" })).toEqual([]);
      expect(system.getFocused()).toBe("b");

      expect(system.focusTrapDepth).toBe(1);

      system.popFocusTrap();
      expect(system.focusTrapDepth).toBe(0);
      expect(types(system.handleInput({ type: "keyDown", key: "Tab" }))).toEqual(["blur:b", "focus:a"]);
    });

    it("routes keys and text to the focused widget", () => {
      commit(system, [A]);
      expect(system.handleInput({ type: "keyDown", key: "Enter" })).toEqual([]);

      system.focus("a");
      expect(system.handleInput({ type: "keyDown", key: "Enter" })).toEqual([
        { type: "key", id: "a", phase: "down", key: "Enter", modifiers: NO_MODIFIERS, repeat: false },
      ]);
      expect(system.handleInput({ type: "textInput", text: "hi" })).toEqual([
        { type: "text", id: "a", text: "hi" },
      ]);
    });
  });

  describe("wheel", () => {
    it("goes to the topmost widget under the pointer", () => {
      commit(system, [A, OVERLAY]);
      const events = system.handleInput({
        type: "wheel",
        position: { x: 10, y: 10 },
        delta: { x: 0, y: 30 },
      });
      expect(events).toEqual([{ type: "wheel", id: "o", position: { x: 10, y: 10 }, delta: { x: 0, y: 30 } }]);
    });

    it("goes to the scrollable container of the topmost hit", () => {
      commit(system, [{ ...A, scrollable: true }, { ...OVERLAY, parent: "a" }]);
      const events = system.handleInput({
        type: "wheel",
        position: { x: 10, y: 10 },
        delta: { x: 0, y: 30 },
      });
      expect(types(events)).toEqual(["wheel:a"]);
    });

    it("climbs past non-scrollable containers", () => {
      const panel: HitTarget = { id: "p", bounds: A.bounds, focusable: false, parent: "a" };
      commit(system, [{ ...A, scrollable: true }, panel, { ...OVERLAY, parent: "p" }]);
      const events = system.handleInput({ type: "wheel", position: { x: 10, y: 10 }, delta: { x: 0, y: 1 } });
      expect(types(events)).toEqual(["wheel:a"]);
    });

    it("stays on an unrelated widget painted over a scrollable one", () => {
      commit(system, [{ ...A, scrollable: true }, OVERLAY]);
      const events = system.handleInput({ type: "wheel", position: { x: 10, y: 10 }, delta: { x: 0, y: 1 } });
      expect(types(events)).toEqual(["wheel:o"]);
    });
  });

  describe("event queue", () => {
    it("exposes input events to the next pass", () => {
      commit(system, [A]);
      system.handleInput({ type: "pointerDown", position: { x: 10, y: 10 }, button: "left" });
      system.handleInput({ type: "pointerUp", position: { x: 10, y: 10 }, button: "left" });
      expect(system.wasClicked("a")).toBe(false);

      system.beginPass();
      expect(system.wasClicked("a")).toBe(true);
      expect(types(system.eventsFor("a"))).toEqual(["enter:a", "down:a", "focus:a", "up:a", "click:a"]);

      system.beginPass();
      expect(system.wasClicked("a")).toBe(false);
    });

    it("drains visible and pending events", () => {
      commit(system, [A]);
      system.handleInput({ type: "pointerMove", position: { x: 10, y: 10 } });
      system.beginPass();
      system.focus("a");
      expect(types(system.drainEvents())).toEqual(["enter:a", "focus:a"]);
      expect(system.drainEvents()).toEqual([]);
    });
  });

  describe("commitFrame", () => {
    it("creates state for every observed id", () => {
      expect(commit(system, [A, B])).toEqual([]);
      expect(system.trackedCount).toBe(2);
      expect(system.stateOf("a")).toEqual({ hovered: false, active: false, focused: false });
    });

    it("forgets widgets the frame did not declare", () => {
      commit(system, [A, B]);
      system.handleInput({ type: "pointerMove", position: { x: 10, y: 10 } });
      system.focus("a");

      commit(system, [B]);
      expect(system.hasTarget("a")).toBe(false);
      expect(system.hasTarget("b")).toBe(true);
      expect(system.trackedCount).toBe(1);
      expect(system.getHovered()).toBeNull();
      expect(system.getFocused()).toBeNull();
      expect(system.stateOf("a")).toEqual({ hovered: false, active: false, focused: false });
    });

    it("drops the press of a vanished widget", () => {
      commit(system, [A]);
      system.handleInput({ type: "pointerDown", position: { x: 10, y: 10 }, button: "left" });
      commit(system, []);
      expect(system.hasActive()).toBe(false);
      expect(system.handleInput({ type: "pointerUp", position: { x: 10, y: 10 }, button: "left" })).toEqual([]);
    });

    it("refreshes hover when geometry moves under a still mouse", () => {
      commit(system, [B]);
      system.handleInput({ type: "pointerMove", position: { x: 10, y: 60 } });
      const moved: HitTarget = { ...A, bounds: { x: 0, y: 50, width: 100, height: 40 } };
      expect(types(commit(system, [moved]))).toEqual(["enter:a"]);
      expect(system.getHovered()).toBe("a");
      expect(system.stateOf("a").hovered).toBe(true);
    });
  });

  describe("shortcuts", () => {
    const META = { ...NO_MODIFIERS, meta: true };

    it("turns a matching key press into a shortcut event instead of a key event", () => {
      commit(system, [A]);
      system.focus("a");
      const save = system.shortcuts.register("cmd+s", "save");

      const events = system.handleInput({ type: "keyDown", key: "s", modifiers: META });
      expect(events).toEqual([{ type: "shortcut", id: null, shortcut: save, action: "save" }]);

      system.beginPass();
      expect(system.wasShortcutTriggered("save")).toBe(true);
      expect(system.wasShortcutTriggered("open")).toBe(false);
    });

    it("addresses focused-scope shortcuts to the focused widget", () => {
      commit(system, [A]);
      system.shortcuts.register("enter", "submit", { scope: { kind: "focused", id: "a" } });
      system.focus("a");
      system.handleInput({ type: "keyDown", key: "Enter" });

      system.beginPass();
      expect(types(system.eventsFor("a"))).toEqual(["focus:a", "shortcut:a"]);
    });

    it("passes unmatched keys on to the focused widget", () => {
      commit(system, [A]);
      system.focus("a");
      system.shortcuts.register("cmd+s", "save");
      expect(types(system.handleInput({ type: "keyDown", key: "s" }))).toEqual(["key:a"]);
    });

    it("lets a shortcut take over Tab", () => {
      commit(system, [A, B]);
      system.shortcuts.register("tab", "indent");
      expect(types(system.handleInput({ type: "keyDown", key: "Tab" }))).toEqual(["shortcut:null"]);
      expect(system.getFocused()).toBeNull();
    });
  });

  describe("drag and drop", () => {
    const ZONE = { id: "z", bounds: { x: 0, y: 50, width: 100, height: 40 }, accepts: [] };

    beforeEach(() => {
      commit(system, [A]);
      system.dragDrop.commit(new Map([["a", dragIndex("row", 0)]]), [ZONE]);
      system.handleInput({ type: "pointerDown", position: { x: 10, y: 10 }, button: "left" });
    });

    it("drops on a zone and suppresses the click", () => {
      expect(types(system.handleInput({ type: "pointerMove", position: { x: 10, y: 30 } }))).toEqual([
        "dragStart:a",
        "dragMove:a",
      ]);
      expect(types(system.handleInput({ type: "pointerMove", position: { x: 10, y: 60 } }))).toEqual([
        "leave:a",
        "dragMove:a",
        "dragEnter:z",
        "dragOver:z",
      ]);
      expect(types(system.handleInput({ type: "pointerUp", position: { x: 10, y: 60 }, button: "left" }))).toEqual([
        "up:a",
        "drop:z",
      ]);
    });

    it("cancels with Escape without a click on release", () => {
      system.handleInput({ type: "pointerMove", position: { x: 10, y: 30 } });
      expect(types(system.handleInput({ type: "keyDown", key: "Escape" }))).toEqual(["dragCancel:a"]);
      expect(types(system.handleInput({ type: "pointerUp", position: { x: 10, y: 30 }, button: "left" }))).toEqual([
        "up:a",
      ]);
    });

    it("still clicks when the pointer barely moved", () => {
      system.handleInput({ type: "pointerMove", position: { x: 12, y: 11 } });
      expect(types(system.handleInput({ type: "pointerUp", position: { x: 12, y: 11 }, button: "left" }))).toEqual([
        "up:a",
        "click:a",
      ]);
    });
  });
});
