/**
 * Batch Key Utilities
 *
 * Functions for creating and comparing batch keys.
 */

import type { Rect } from "../math/rect";
import type { BatchKey, PaintCommand } from "./types";

const KIND_RANK: Record<PaintCommand["kind"], number> = {
  rect: 0,
  frame: 1,
  text: 2,
};

/**
 * Create a batch key for a command under the given clip state.
 */
export function createBatchKey(
  kind: PaintCommand["kind"],
  clipDepth: number,
  clip: Rect | null
): BatchKey {
  return { kind, clipDepth, clip };
}

function clipToString(clip: Rect | null): string {
  return clip ? `${clip.x},${clip.y},${clip.width},${clip.height}` : "none";
}

/**
 * Compare two batch keys for equality.
 */
export function batchKeyEquals(a: BatchKey, b: BatchKey): boolean {
  return (
    a.kind === b.kind &&
    a.clipDepth === b.clipDepth &&
    clipToString(a.clip) === clipToString(b.clip)
  );
}

/**
 * Convert a batch key to a unique string for map keys.
 */
export function batchKeyToString(key: BatchKey): string {
  return `${key.kind}:${key.clipDepth}:${clipToString(key.clip)}`;
}

/**
 * Compare batch keys for sorting pipeline state.
 * Orders by clip depth first, then rects before frames before text.
 *
 * Only for grouping statistics and caches: batches themselves must be
 * submitted in the order batchDrawList() returns them.
 */
export function compareBatchKeys(a: BatchKey, b: BatchKey): number {
  if (a.clipDepth !== b.clipDepth) {
    return a.clipDepth - b.clipDepth;
  }
  return KIND_RANK[a.kind] - KIND_RANK[b.kind];
}
