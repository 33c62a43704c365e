/**
 * Layer Types
 *
 * A layer is one compositor slot: either a UI layer backed by a UIContext
 * producing typed draw commands, or a raw layer recording shader
 * invocations directly. The manager never touches GPU state; it hands the
 * ordered per-layer outputs to a Renderer.
 */

import type { DrawBatch } from "../batch/types";
import type { DrawList } from "../draw/DrawList";
import type { DrawCommand } from "../draw/types";
import type { EntityStore } from "../entity/EntityStore";
import type { InputEvent } from "../interaction/InputEvent";
import type { InteractionEvent } from "../interaction/types";
import type { Size } from "../math/rect";
import type { Color } from "../types/color";
import type { UIContext, UIContextOptions } from "../ui/UIContext";
import type { RawLayerContext } from "./RawLayerContext";

export type LayerId = number;

export type LayerKind = "ui" | "raw";

export type BlendMode = "normal" | "add" | "multiply" | "screen";

export interface LayerOptions {
  /** Receive input routed by z-order; an opted-in layer occludes every layer below it */
  inputEnabled?: boolean;
  blendMode?: BlendMode;
  /** Clear the target before compositing this layer */
  clear?: boolean;
  clearColor?: Color;
}

export type ResolvedLayerOptions = Readonly<Required<LayerOptions>>;

export const DEFAULT_LAYER_OPTIONS: ResolvedLayerOptions = Object.freeze<Required<LayerOptions>>({
  inputEnabled: false,
  blendMode: "normal",
  clear: false,
  clearColor: [0, 0, 0, 0],
});

export function resolveLayerOptions(options: LayerOptions = {}): ResolvedLayerOptions {
  return Object.freeze({ ...DEFAULT_LAYER_OPTIONS, ...options });
}

// ==================== Raw Commands ====================

export type UniformValue = number | readonly number[] | Float32Array;

export interface FullscreenQuadCommand {
  kind: "fullscreenQuad";
  /** Shader name, resolved by the renderer */
  shader: string;
  uniforms: Readonly<Record<string, UniformValue>>;
}

export interface TrianglesCommand {
  kind: "triangles";
  /** Interleaved positions [x, y, x, y, ...] in logical pixels */
  vertices: Float32Array;
  indices: Uint16Array | Uint32Array;
  color: Color;
}

export type RawCommand = FullscreenQuadCommand | TrianglesCommand;

// ==================== Frame Output ====================

interface LayerOutputBase {
  id: LayerId;
  zIndex: number;
  options: ResolvedLayerOptions;
}

export interface UiLayerOutput extends LayerOutputBase {
  kind: "ui";
  drawList: DrawList<DrawCommand>;
  batches: DrawBatch[];
}

export interface RawLayerOutput extends LayerOutputBase {
  kind: "raw";
  drawList: DrawList<RawCommand>;
}

export type LayerOutput = UiLayerOutput | RawLayerOutput;

export interface LayerFrame {
  size: Size;
  scaleFactor: number;
}

/** Compositor: consumes the ordered layer outputs, produces nothing back */
export interface Renderer {
  submit(outputs: readonly LayerOutput[], frame: LayerFrame): void;
}

/** The layer that received a routed event and what it produced */
export interface RouteResult {
  layerId: LayerId;
  kind: LayerKind;
  /** Interaction events produced by a UI layer; empty for raw layers */
  events: InteractionEvent[];
}

// ==================== Definitions ====================

export interface UiLayerContext {
  ui: UIContext;
  size: Size;
  scaleFactor: number;
  requestFrame(): void;
}

export interface RawLayerDefinition {
  kind: "raw";
  options?: LayerOptions;
  render: (ctx: RawLayerContext) => void;
  onInput?: (event: InputEvent) => void;
}

export interface UiLayerDefinition {
  kind: "ui";
  options?: LayerOptions;
  render: (ctx: UiLayerContext) => void;
  /** Layout, measurer and theme for the layer's UI context */
  ui?: Omit<UIContextOptions, "interaction" | "entities">;
}

export type LayerDefinition = RawLayerDefinition | UiLayerDefinition;

// ==================== Layers ====================

/** Shared services a layer is built with */
export interface LayerEnvironment {
  entities: EntityStore;
  requestFrame(): void;
}

export interface Layer {
  readonly id: LayerId;
  readonly kind: LayerKind;
  readonly zIndex: number;
  /** Insertion sequence, breaks z-index ties */
  readonly sequence: number;
  readonly options: ResolvedLayerOptions;
  render(frame: LayerFrame): LayerOutput;
  /** Deliver a routed event; the layer always consumes it */
  handleInput(event: InputEvent): InteractionEvent[];
  /** Release resources held for the layer */
  dispose(): void;
}
