/**
 * Geometry generation types
 */

/** Coordinate as [x, y] */
export type Coord = [number, number];

/** Ring of coordinates (for polygons) */
export type Ring = Coord[];

/** Outer ring plus optional holes */
export interface Polygon {
  outer: Ring;
  holes?: Ring[];
}

/** Tessellated polygon result with vertices and indices */
export interface TessellatedPolygon {
  /** Interleaved vertex data [x, y, x, y, ...] */
  vertices: Float32Array;
  /** Triangle indices */
  indices: Uint16Array | Uint32Array;
}
