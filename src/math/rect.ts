/**
 * Axis-aligned rectangle utilities
 *
 * Screen space: origin at top-left, y grows downward, units in logical pixels.
 */

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Rectangle for hit testing and layout */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function rectFromPosSize(pos: Point, size: Size): Rect {
  return { x: pos.x, y: pos.y, width: size.width, height: size.height };
}

/**
 * Check if a point is inside a rectangle.
 * Left/top edges are inclusive, right/bottom edges exclusive, so two
 * abutting rectangles never both contain the same point.
 */
export function containsPoint(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x < rect.x + rect.width &&
    point.y >= rect.y &&
    point.y < rect.y + rect.height
  );
}

/**
 * Intersection of two rectangles, or null when they do not overlap.
 */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const left = Math.max(a.x, b.x);
  const top = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);

  if (right <= left || bottom <= top) {
    return null;
  }
  return { x: left, y: top, width: right - left, height: bottom - top };
}

export function rectsOverlap(a: Rect, b: Rect): boolean {
  return intersectRects(a, b) !== null;
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

/** Shrink (positive) or grow (negative) a rectangle on every side */
export function insetRect(rect: Rect, amount: number): Rect {
  return {
    x: rect.x + amount,
    y: rect.y + amount,
    width: Math.max(0, rect.width - amount * 2),
    height: Math.max(0, rect.height - amount * 2),
  };
}
