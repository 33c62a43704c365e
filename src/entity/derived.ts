/**
 * Derived values
 *
 * One-off reads that combine entity state, plus a version-keyed memo for
 * values that are expensive to rebuild.
 */

import { getEntityStore } from "./context";
import type { EntityStore } from "./EntityStore";
import type { AnyHandle } from "./types";

/** Map one entity's state; null when it is no longer alive */
export function deriveFrom<T, R>(
  handle: AnyHandle<T>,
  f: (state: Readonly<T>) => R,
  store: EntityStore = getEntityStore()
): R | null {
  if (!store.isAlive(handle)) return null;
  return store.read(handle, f);
}

/** Combine two entities; null when either is gone */
export function deriveFrom2<A, B, R>(
  a: AnyHandle<A>,
  b: AnyHandle<B>,
  f: (a: Readonly<A>, b: Readonly<B>) => R,
  store: EntityStore = getEntityStore()
): R | null {
  if (!store.isAlive(a) || !store.isAlive(b)) return null;
  return store.read(a, (first) => store.read(b, (second) => f(first, second)));
}

/**
 * Value recomputed only when the caller's version number changes.
 */
export class Memo<T> {
  private entry: { value: T; version: number } | null = null;

  getOrCompute(version: number, compute: () => T): T {
    if (!this.entry || this.entry.version !== version) {
      this.entry = { value: compute(), version };
    }
    return this.entry.value;
  }

  invalidate(): void {
    this.entry = null;
  }

  get cached(): boolean {
    return this.entry !== null;
  }
}
