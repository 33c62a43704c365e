/**
 * Geometry generation utilities
 */

export * from "./types";
export { tessellatePolygon, tessellatePolygons } from "./tessellate";
