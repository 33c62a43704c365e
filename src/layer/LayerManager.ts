/**
 * Layer Manager
 *
 * Orders compositor layers by z-index (ties by insertion), renders them
 * bottom to top and routes input top to bottom. Input goes to the
 * topmost layer that opted in, and to that layer only: an opted-in layer
 * occludes everything beneath it whether or not it has a widget at the
 * event position. Modals are just opted-in layers above the rest.
 */

import { getEntityStore } from "../entity/context";
import type { EntityStore } from "../entity/EntityStore";
import { EngineError } from "../errors";
import type { InputEvent } from "../interaction/InputEvent";
import { consoleLogger, type Logger } from "../log";
import { RawLayer } from "./RawLayer";
import type {
  Layer,
  LayerDefinition,
  LayerEnvironment,
  LayerFrame,
  LayerId,
  LayerOutput,
  RawLayerDefinition,
  Renderer,
  RouteResult,
  UiLayerDefinition,
} from "./types";
import { UiLayer } from "./UiLayer";

export interface LayerManagerOptions {
  entities?: EntityStore;
  renderer?: Renderer | null;
  logger?: Logger;
  /** Called whenever a layer or the manager asks for another frame */
  onFrameRequested?: () => void;
}

export class LayerManager {
  renderer: Renderer | null;

  private readonly entities: EntityStore;
  private readonly logger: Logger;
  private readonly env: LayerEnvironment;
  private readonly onFrameRequested: (() => void) | null;
  /** Kept sorted by (zIndex, sequence) */
  private ordered: Layer[] = [];
  private nextId: LayerId = 1;
  private nextSequence = 0;
  private frameRequested = false;

  constructor(options: LayerManagerOptions = {}) {
    this.entities = options.entities ?? getEntityStore();
    this.renderer = options.renderer ?? null;
    this.logger = options.logger ?? consoleLogger;
    this.onFrameRequested = options.onFrameRequested ?? null;
    this.env = {
      entities: this.entities,
      requestFrame: () => this.requestFrame(),
    };
  }

  // ==================== Registration ====================

  addLayer(zIndex: number, definition: LayerDefinition): LayerId {
    const id = this.nextId++;
    this.insert(this.createLayer(id, zIndex, this.nextSequence++, definition));
    this.requestFrame();
    return id;
  }

  addRawLayer(zIndex: number, render: RawLayerDefinition["render"], options?: Omit<RawLayerDefinition, "kind" | "render">): LayerId {
    return this.addLayer(zIndex, { ...options, kind: "raw", render });
  }

  addUiLayer(zIndex: number, render: UiLayerDefinition["render"], options?: Omit<UiLayerDefinition, "kind" | "render">): LayerId {
    return this.addLayer(zIndex, { ...options, kind: "ui", render });
  }

  /**
   * Swap a layer's definition, keeping its id and z-order slot.
   */
  replaceLayer(id: LayerId, definition: LayerDefinition): void {
    const index = this.indexOf(id);
    const previous = this.ordered[index];
    if (!previous) {
      throw new EngineError("unknown-layer", `Layer ${id} is not registered`);
    }
    previous.dispose();
    this.ordered[index] = this.createLayer(id, previous.zIndex, previous.sequence, definition);
    this.requestFrame();
  }

  /** Remove a layer; returns false if it was not registered */
  removeLayer(id: LayerId): boolean {
    const index = this.ordered.findIndex((layer) => layer.id === id);
    const layer = this.ordered[index];
    if (!layer) return false;
    this.ordered.splice(index, 1);
    layer.dispose();
    this.requestFrame();
    return true;
  }

  clear(): void {
    for (const layer of this.ordered) {
      layer.dispose();
    }
    this.ordered = [];
    this.requestFrame();
  }

  getLayer(id: LayerId): Layer | null {
    return this.ordered.find((layer) => layer.id === id) ?? null;
  }

  /** Layers in ascending paint order */
  layers(): readonly Layer[] {
    return [...this.ordered];
  }

  get count(): number {
    return this.ordered.length;
  }

  // ==================== Frame ====================

  /**
   * Render every layer bottom to top and hand the outputs to the renderer.
   */
  renderFrame(frame: LayerFrame): LayerOutput[] {
    this.frameRequested = false;
    const outputs = this.ordered.map((layer) => layer.render(frame));

    if (this.renderer) {
      try {
        this.renderer.submit(outputs, frame);
      } catch (error) {
        this.logger.error(`[LayerManager] Renderer failed to submit ${outputs.length} layer(s)`, error);
        throw error;
      }
    }
    return outputs;
  }

  /**
   * Deliver an event to the topmost opted-in layer. Returns null when no
   * layer accepts input.
   */
  routeInput(event: InputEvent): RouteResult | null {
    for (let i = this.ordered.length - 1; i >= 0; i--) {
      const layer = this.ordered[i];
      if (!layer || !layer.options.inputEnabled) continue;

      const events = layer.handleInput(event);
      this.requestFrame();
      return { layerId: layer.id, kind: layer.kind, events };
    }
    return null;
  }

  requestFrame(): void {
    this.frameRequested = true;
    this.onFrameRequested?.();
  }

  get needsFrame(): boolean {
    return this.frameRequested;
  }

  // ==================== Internals ====================

  private createLayer(id: LayerId, zIndex: number, sequence: number, definition: LayerDefinition): Layer {
    if (definition.kind === "raw") {
      return new RawLayer(id, zIndex, sequence, definition, this.env);
    }
    return new UiLayer(id, zIndex, sequence, definition, this.env);
  }

  private insert(layer: Layer): void {
    const index = this.ordered.findIndex(
      (other) => other.zIndex > layer.zIndex || (other.zIndex === layer.zIndex && other.sequence > layer.sequence)
    );
    if (index === -1) {
      this.ordered.push(layer);
    } else {
      this.ordered.splice(index, 0, layer);
    }
  }

  private indexOf(id: LayerId): number {
    const index = this.ordered.findIndex((layer) => layer.id === id);
    if (index === -1) {
      throw new EngineError("unknown-layer", `Layer ${id} is not registered`);
    }
    return index;
  }
}
