/**
 * Polygon tessellation using earcut
 */

import earcut from "earcut";
import type { Polygon, Ring, TessellatedPolygon } from "./types";

/** Largest vertex count addressable by 16-bit indices */
const MAX_UINT16_VERTICES = 65535;

function indexArray(indices: number[], vertexCount: number): Uint16Array | Uint32Array {
  return vertexCount > MAX_UINT16_VERTICES ? new Uint32Array(indices) : new Uint16Array(indices);
}

/**
 * Tessellate a polygon (with optional holes) into triangles.
 *
 * @param outer - Outer ring coordinates [[x,y], [x,y], ...]
 * @param holes - Optional array of hole rings
 */
export function tessellatePolygon(outer: Ring, holes: Ring[] = []): TessellatedPolygon {
  // Flatten coordinates for earcut
  const coords: number[] = [];
  const holeIndices: number[] = [];

  for (const [x, y] of outer) {
    coords.push(x, y);
  }

  for (const hole of holes) {
    holeIndices.push(coords.length / 2);
    for (const [x, y] of hole) {
      coords.push(x, y);
    }
  }

  const indices = earcut(coords, holeIndices.length > 0 ? holeIndices : undefined, 2);

  return {
    vertices: new Float32Array(coords),
    indices: indexArray(indices, coords.length / 2),
  };
}

/**
 * Tessellate several polygons into one vertex/index buffer.
 */
export function tessellatePolygons(polygons: readonly Polygon[]): TessellatedPolygon {
  const allVertices: number[] = [];
  const allIndices: number[] = [];

  for (const polygon of polygons) {
    if (polygon.outer.length < 3) continue;
    const result = tessellatePolygon(polygon.outer, polygon.holes);

    const indexOffset = allVertices.length / 2;
    allVertices.push(...result.vertices);
    for (const index of result.indices) {
      allIndices.push(index + indexOffset);
    }
  }

  return {
    vertices: new Float32Array(allVertices),
    indices: indexArray(allIndices, allVertices.length / 2),
  };
}
