/**
 * Computed values
 *
 * A cached projection of one entity. The cache is dropped when the store
 * delivers a change notification for the source, so a value read between
 * an update and the next flush() is still the old one.
 */

import { getEntityStore } from "./context";
import type { EntityStore } from "./EntityStore";
import type { SubscriptionId } from "./observe";
import type { AnyHandle, EntityId } from "./types";

export class Computed<T, R> {
  private cache: { value: R } | null = null;
  private subscription: SubscriptionId | null;

  /** The source handle is borrowed; the caller keeps it alive */
  constructor(
    private readonly source: AnyHandle<T>,
    private readonly mapper: (state: Readonly<T>) => R,
    private readonly store: EntityStore = getEntityStore()
  ) {
    this.subscription = store.isAlive(source) ? store.subscribe(source, () => this.invalidate()) : null;
  }

  /** Mapped value, or null once the source is gone */
  get(): R | null {
    if (this.cache) return this.cache.value;
    if (!this.store.isAlive(this.source)) return null;

    const value = this.store.read(this.source, this.mapper);
    this.cache = { value };
    return value;
  }

  invalidate(): void {
    this.cache = null;
  }

  get valid(): boolean {
    return this.cache !== null;
  }

  get sourceId(): EntityId {
    return this.source.id;
  }

  /** Stop listening for changes. get() keeps working but never refreshes on its own */
  dispose(): void {
    if (this.subscription === null) return;
    this.store.unsubscribe(this.subscription);
    this.subscription = null;
    this.cache = null;
  }
}

export function computed<T, R>(
  source: AnyHandle<T>,
  mapper: (state: Readonly<T>) => R,
  store?: EntityStore
): Computed<T, R> {
  return new Computed(source, mapper, store);
}
