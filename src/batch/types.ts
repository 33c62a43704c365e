/**
 * Batch Types
 *
 * Runs of consecutive draw commands that a renderer can submit with one
 * pipeline/clip state.
 */

import type { Rect } from "../math/rect";
import type { DrawCommand, FrameCommand, RectCommand, TextCommand } from "../draw/types";

/** Commands that produce pixels (clip commands only change state) */
export type PaintCommand = RectCommand | FrameCommand | TextCommand;

/** Key for grouping commands into batches */
export interface BatchKey {
  /** Shader family */
  kind: PaintCommand["kind"];
  /** Nesting depth of the active clip (0 = none) */
  clipDepth: number;
  /** Active clip rectangle, null when unclipped */
  clip: Rect | null;
}

/** Consecutive commands sharing one key */
export interface DrawBatch {
  key: BatchKey;
  commands: Readonly<PaintCommand>[];
  /** Emission order of the first command in the batch */
  firstOrder: number;
}

export function isPaintCommand(command: Readonly<DrawCommand>): command is Readonly<PaintCommand> {
  return command.kind === "rect" || command.kind === "frame" || command.kind === "text";
}
