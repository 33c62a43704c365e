/**
 * Entity System
 *
 * Reference-counted persistent state that survives across frames.
 */

export { EntityStore, DEFAULT_MAX_ENTITIES, type EntityStoreOptions } from "./EntityStore";
export {
  EntityHandle,
  WeakHandle,
  entityIdEquals,
  type AnyHandle,
  type EntityId,
  type CreateEntityOptions,
} from "./types";
export type { SubscriptionId, ObserverCallback } from "./observe";
export { getEntityStore, setEntityStore, resetEntityStore } from "./context";
export { Computed, computed } from "./computed";
export { Memo, deriveFrom, deriveFrom2 } from "./derived";
