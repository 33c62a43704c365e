/**
 * Draw Command Types
 *
 * Typed drawing operations produced by UI layers. Text commands carry the
 * string and style as opaque payload for the external text shaper.
 */

import type { Color } from "../types/color";
import type { Point, Rect, Size } from "../math/rect";

export type TextAlign = "left" | "center" | "right";

export interface TextStyle {
  color: Color;
  fontSize: number;
  align: TextAlign;
}

export interface FrameStyle {
  fill: Color;
  borderColor: Color;
  borderWidth: number;
  cornerRadius: number;
}

export interface RectCommand {
  kind: "rect";
  rect: Rect;
  color: Color;
  cornerRadius: number;
}

export interface FrameCommand {
  kind: "frame";
  rect: Rect;
  style: FrameStyle;
}

export interface TextCommand {
  kind: "text";
  position: Point;
  text: string;
  style: TextStyle;
  /** Size reported by the text measurer at emission time */
  size: Size;
}

export interface PushClipCommand {
  kind: "pushClip";
  /** Already intersected with the enclosing clip */
  rect: Rect;
}

export interface PopClipCommand {
  kind: "popClip";
}

export type DrawCommand =
  | RectCommand
  | FrameCommand
  | TextCommand
  | PushClipCommand
  | PopClipCommand;

export type DrawCommandKind = DrawCommand["kind"];

/** A command together with its emission order */
export interface DrawEntry<C> {
  /** Monotonically increasing per list, stable tiebreak for same-depth commands */
  readonly order: number;
  readonly command: Readonly<C>;
}
