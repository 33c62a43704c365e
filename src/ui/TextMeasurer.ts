/**
 * Text measurement boundary. Shaping lives outside the engine; the draw
 * list only needs a box per string.
 */

import type { Size } from "../math/rect";

export interface TextMeasurer {
  measure(text: string, fontSize: number): Size;
}

/** Average advance of a glyph relative to the font size */
export const CHAR_WIDTH_RATIO = 0.6;
export const LINE_HEIGHT_RATIO = 1.25;

/**
 * Monospace approximation used when no shaping backend is attached.
 */
export const approximateTextMeasurer: TextMeasurer = {
  measure(text: string, fontSize: number): Size {
    return {
      width: text.length * fontSize * CHAR_WIDTH_RATIO,
      height: fontSize * LINE_HEIGHT_RATIO,
    };
  },
};
