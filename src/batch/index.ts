/**
 * Batch Module
 *
 * Groups draw list commands into renderer batches.
 */

export type { BatchKey, DrawBatch, PaintCommand } from "./types";
export { isPaintCommand } from "./types";
export { createBatchKey, batchKeyEquals, batchKeyToString, compareBatchKeys } from "./BatchKey";
export { batchDrawList } from "./batchDrawList";
