/**
 * Entity Handle Types
 */

/** Slot index plus the generation the slot had when the entity was created */
export interface EntityId {
  readonly index: number;
  readonly generation: number;
}

export function entityIdEquals(a: EntityId, b: EntityId): boolean {
  return a.index === b.index && a.generation === b.generation;
}

export function entityIdToString(id: EntityId): string {
  return `${id.index}:${id.generation}`;
}

/**
 * Strong, typed handle into an EntityStore. Carries no state of its own;
 * every handle object counts once toward the entity's strong count until it
 * is passed to dropHandle().
 */
export class EntityHandle<T> {
  /** Phantom marker tying the handle to its state type */
  declare readonly __state?: T;

  readonly id: EntityId;
  readonly strong = true;

  constructor(id: EntityId) {
    this.id = id;
  }

  /** Handles are equal when they refer to the same entity */
  equals(other: EntityHandle<unknown> | WeakHandle<unknown>): boolean {
    return entityIdEquals(this.id, other.id);
  }

  toString(): string {
    return `Entity(${entityIdToString(this.id)})`;
  }
}

/**
 * Non-owning reference. Resolving it after the entity was released fails
 * with entity-not-found; a reused slot never resolves because the
 * generation differs.
 */
export class WeakHandle<T> {
  declare readonly __state?: T;

  readonly id: EntityId;
  readonly strong = false;

  constructor(id: EntityId) {
    this.id = id;
  }

  equals(other: EntityHandle<unknown> | WeakHandle<unknown>): boolean {
    return entityIdEquals(this.id, other.id);
  }

  toString(): string {
    return `WeakEntity(${entityIdToString(this.id)})`;
  }
}

export type AnyHandle<T> = EntityHandle<T> | WeakHandle<T>;

export interface CreateEntityOptions<T> {
  /** Runs when the slot is reclaimed */
  dispose?: (state: T) => void;
}
