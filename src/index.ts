/**
 * Lamina - An immediate-mode UI engine
 *
 * Widgets are re-declared every frame inside z-ordered layers; the engine
 * produces typed draw lists and leaves the pixels to a pluggable renderer.
 */

export const VERSION = "0.0.1";

// Engine
export { Engine, type FrameResult } from "./Engine";
export { resolveEngineOptions, DEFAULT_ENGINE_OPTIONS, type EngineOptions, type ResolvedEngineOptions } from "./options";
export {
  TimerScheduler,
  ManualScheduler,
  DEFAULT_FRAME_INTERVAL_MS,
  type FrameScheduler,
  type FrameHandle,
} from "./scheduler";
export { consoleLogger, silentLogger, type Logger } from "./log";
export { EngineError, isEngineError, type EngineErrorCode } from "./errors";

// Primitives
export {
  rectFromPosSize,
  containsPoint,
  intersectRects,
  rectsOverlap,
  rectsEqual,
  insetRect,
  type Point,
  type Size,
  type Rect,
} from "./math/rect";
export { isVisibleColor, withAlpha, type Color } from "./types/color";

// Subsystems
export * from "./layer";
export * from "./ui";
export * from "./interaction";
export * from "./entity";
export * from "./draw";
export * from "./batch";
export * from "./geometry";
