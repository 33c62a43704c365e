/** RGBA color, components in the 0-1 range */
export type Color = [number, number, number, number];

/** Fully transparent colors are skipped by the draw pass */
export function isVisibleColor(color: Color): boolean {
  return color[3] > 0;
}

/** Multiply a color's alpha channel. Returns a new color. */
export function withAlpha(color: Color, alpha: number): Color {
  return [color[0], color[1], color[2], color[3] * alpha];
}
