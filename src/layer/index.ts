/**
 * Layer Module
 *
 * Z-ordered compositor layers, frame rendering and input routing.
 */

export { LayerManager, type LayerManagerOptions } from "./LayerManager";
export { RawLayer } from "./RawLayer";
export { UiLayer } from "./UiLayer";
export { RawLayerContext } from "./RawLayerContext";
export { RecordingRenderer, type RecordedFrame } from "./RecordingRenderer";
export {
  DEFAULT_LAYER_OPTIONS,
  resolveLayerOptions,
  type BlendMode,
  type FullscreenQuadCommand,
  type Layer,
  type LayerDefinition,
  type LayerEnvironment,
  type LayerFrame,
  type LayerId,
  type LayerKind,
  type LayerOptions,
  type LayerOutput,
  type RawCommand,
  type RawLayerDefinition,
  type RawLayerOutput,
  type Renderer,
  type ResolvedLayerOptions,
  type RouteResult,
  type TrianglesCommand,
  type UiLayerContext,
  type UiLayerDefinition,
  type UiLayerOutput,
  type UniformValue,
} from "./types";
