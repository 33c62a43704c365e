/**
 * Process-wide entity store
 *
 * The store outlives frames and layers. Components that are not handed a
 * store explicitly use this one.
 */

import { EntityStore } from "./EntityStore";

let current: EntityStore | null = null;

export function getEntityStore(): EntityStore {
  if (!current) {
    current = new EntityStore();
  }
  return current;
}

/** Install a store (e.g. one with a custom capacity) as the process-wide store */
export function setEntityStore(store: EntityStore): void {
  current = store;
}

/** Forget the process-wide store; the next getEntityStore() creates a fresh one */
export function resetEntityStore(): void {
  current = null;
}
