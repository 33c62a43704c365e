/**
 * Engine - owns the layer stack and runs the frame loop
 *
 * One frame: route queued input to the layers, run every layer's
 * declarative pass, hand the outputs to the renderer, then settle the
 * entity store (observer notifications, slot reclamation). Frames are
 * only scheduled when something asks for one.
 */

import type { EntityStore } from "./entity/EntityStore";
import type { InputEvent } from "./interaction/InputEvent";
import { LayerManager } from "./layer/LayerManager";
import type { LayerFrame, LayerOutput, Renderer, RouteResult } from "./layer/types";
import type { Logger } from "./log";
import type { Size } from "./math/rect";
import { resolveEngineOptions, type EngineOptions } from "./options";
import type { FrameHandle, FrameScheduler } from "./scheduler";

export interface FrameResult {
  /** Per-layer outputs in paint order */
  outputs: LayerOutput[];
  /** Where each queued input event went; events no layer accepted are omitted */
  routed: RouteResult[];
  /** Whether another frame was requested while producing this one */
  needsFrame: boolean;
}

export class Engine {
  readonly layers: LayerManager;
  readonly entities: EntityStore;

  private readonly scheduler: FrameScheduler;
  private readonly logger: Logger;
  private readonly debug: boolean;

  private surfaceSize: Size;
  private surfaceScale: number;
  private inputQueue: InputEvent[] = [];
  private frameHandle: FrameHandle | null = null;
  private running = false;
  private inFrame = false;
  private needsRender = true;

  private frameCount = 0;
  private lastDebugTime = 0;

  constructor(options: EngineOptions = {}) {
    const resolved = resolveEngineOptions(options);
    this.entities = resolved.entityStore;
    this.scheduler = resolved.scheduler;
    this.logger = resolved.logger;
    this.debug = resolved.debug;
    this.surfaceSize = resolved.size;
    this.surfaceScale = resolved.scaleFactor;
    this.layers = new LayerManager({
      entities: this.entities,
      renderer: resolved.renderer,
      logger: this.logger,
      onFrameRequested: () => this.schedule(),
    });
  }

  get renderer(): Renderer | null {
    return this.layers.renderer;
  }

  set renderer(renderer: Renderer | null) {
    this.layers.renderer = renderer;
    this.requestFrame();
  }

  get size(): Size {
    return this.surfaceSize;
  }

  get scaleFactor(): number {
    return this.surfaceScale;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Number of input events waiting for the next frame */
  get pendingInput(): number {
    return this.inputQueue.length;
  }

  // ==================== Input ====================

  /** Queue a platform event for the next frame */
  dispatch(event: InputEvent): void {
    this.inputQueue.push(event);
    this.requestFrame();
  }

  // ==================== Frame Loop ====================

  /** Request a frame on the next scheduler tick */
  requestFrame(): void {
    this.needsRender = true;
    this.schedule();
  }

  /** Whether a frame has been requested and not yet produced */
  get needsFrame(): boolean {
    return this.needsRender || this.layers.needsFrame;
  }

  /**
   * Produce one frame now, regardless of whether one was requested.
   */
  frame(): FrameResult {
    // Cleared before rendering so layers can re-request
    this.needsRender = false;
    this.inFrame = true;
    let result: FrameResult;
    try {
      result = this.produceFrame();
    } finally {
      this.inFrame = false;
    }
    this.schedule();
    return result;
  }

  private produceFrame(): FrameResult {
    const routed: RouteResult[] = [];
    for (const event of this.inputQueue.splice(0)) {
      const result = this.layers.routeInput(event);
      if (result) routed.push(result);
    }

    const frame: LayerFrame = { size: { ...this.surfaceSize }, scaleFactor: this.surfaceScale };
    const outputs = this.layers.renderFrame(frame);

    this.entities.flush();
    this.entities.cleanup();

    const needsFrame = this.layers.needsFrame || this.entities.invalidationRequested;
    this.entities.clearInvalidation();
    this.needsRender = needsFrame;

    this.frameCount++;
    if (this.debug) {
      this.logStats(outputs);
    }

    return { outputs, routed, needsFrame };
  }

  /** Start producing frames through the scheduler */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule();
  }

  /** Stop the frame loop; queued input stays queued */
  stop(): void {
    this.running = false;
    if (this.frameHandle !== null) {
      this.scheduler.cancel(this.frameHandle);
      this.frameHandle = null;
    }
  }

  /** Change the surface size and/or scale factor */
  resize(size: Size, scaleFactor: number = this.surfaceScale): void {
    if (
      size.width === this.surfaceSize.width &&
      size.height === this.surfaceSize.height &&
      scaleFactor === this.surfaceScale
    ) {
      return;
    }
    this.surfaceSize = { ...size };
    this.surfaceScale = scaleFactor;
    this.requestFrame();
  }

  /** Stop the loop and remove every layer */
  destroy(): void {
    this.stop();
    this.inputQueue = [];
    this.layers.clear();
    this.entities.cleanup();
  }

  private schedule(): void {
    if (!this.running || this.inFrame || this.frameHandle !== null || !this.needsFrame) return;

    this.frameHandle = this.scheduler.request(() => {
      this.frameHandle = null;
      if (!this.running || !this.needsFrame) return;
      try {
        this.frame();
      } catch (error) {
        this.logger.error("[Engine] Frame failed, stopping the frame loop", error);
        this.stop();
        throw error;
      }
    });
  }

  private logStats(outputs: readonly LayerOutput[]): void {
    const now = Date.now();
    if (now - this.lastDebugTime <= 1000) return;

    let commands = 0;
    for (const output of outputs) {
      commands += output.drawList.length;
    }
    this.logger.log(
      `[Engine] frame=${this.frameCount}, layers=${outputs.length}, commands=${commands}, ` +
        `entities=${this.entities.size}`
    );
    this.lastDebugTime = now;
  }
}
