/**
 * Entity Store
 *
 * Arena of generation-tagged slots holding persistent, type-erased widget
 * state. Handles are reference counted explicitly: create() and
 * cloneHandle() add a strong reference, dropHandle() removes one. When the
 * last strong handle is dropped the entity is released immediately (every
 * lookup fails from then on) and its slot is reclaimed lazily by cleanup()
 * at the next frame boundary.
 */

import { EngineError } from "../errors";
import { ObserverRegistry, type ObserverCallback, type SubscriptionId } from "./observe";
import {
  EntityHandle,
  WeakHandle,
  entityIdToString,
  type AnyHandle,
  type CreateEntityOptions,
  type EntityId,
} from "./types";

type SlotState = "empty" | "live" | "released";

interface EntitySlot {
  value: unknown;
  generation: number;
  strong: number;
  state: SlotState;
  /** Number of read() callbacks currently running */
  readers: number;
  /** True while a withMut() callback is running */
  writing: boolean;
  dispose: (() => void) | null;
}

export interface EntityStoreOptions {
  /** Upper bound on simultaneously allocated slots */
  maxEntities?: number;
}

export const DEFAULT_MAX_ENTITIES = 1 << 20;

export class EntityStore {
  private slots: EntitySlot[] = [];
  private freeList: number[] = [];
  private pendingCleanup: number[] = [];
  private droppedHandles = new WeakSet<EntityHandle<unknown>>();
  private observers = new ObserverRegistry();
  private readonly maxEntities: number;

  constructor(options: EntityStoreOptions = {}) {
    this.maxEntities = options.maxEntities ?? DEFAULT_MAX_ENTITIES;
  }

  // ==================== Lifecycle ====================

  /**
   * Create an entity. The returned handle holds the only strong reference.
   */
  create<T>(initializer: () => T, options: CreateEntityOptions<T> = {}): EntityHandle<T> {
    const value = initializer();
    const index = this.allocateSlot();
    const slot = this.slotAt(index);

    slot.value = value;
    slot.strong = 1;
    slot.state = "live";
    slot.readers = 0;
    slot.writing = false;
    const dispose = options.dispose;
    slot.dispose = dispose ? () => dispose(value) : null;

    return new EntityHandle<T>({ index, generation: slot.generation });
  }

  /** Create an entity from a plain value */
  insert<T>(value: T, options: CreateEntityOptions<T> = {}): EntityHandle<T> {
    return this.create(() => value, options);
  }

  /**
   * Add a strong reference. The new handle equals the original and must be
   * dropped separately.
   */
  cloneHandle<T>(handle: EntityHandle<T>): EntityHandle<T> {
    this.assertNotDropped(handle);
    const slot = this.liveSlot(handle.id);
    slot.strong += 1;
    return new EntityHandle<T>(handle.id);
  }

  /**
   * Remove the strong reference held by this handle object. At zero the
   * entity is released and queued for reclamation.
   */
  dropHandle<T>(handle: EntityHandle<T>): void {
    this.assertNotDropped(handle);
    const slot = this.liveSlot(handle.id);
    if (slot.writing || slot.readers > 0) {
      throw new EngineError(
        "borrow-conflict",
        `${handle.toString()} dropped while its state is borrowed`
      );
    }

    this.droppedHandles.add(handle);
    slot.strong -= 1;
    if (slot.strong === 0) {
      slot.state = "released";
      this.pendingCleanup.push(handle.id.index);
    }
  }

  /** Produce a non-owning reference */
  downgrade<T>(handle: EntityHandle<T>): WeakHandle<T> {
    this.assertNotDropped(handle);
    this.liveSlot(handle.id);
    return new WeakHandle<T>(handle.id);
  }

  /** Turn a weak reference back into a strong one while the entity lives */
  upgrade<T>(weak: WeakHandle<T>): EntityHandle<T> {
    const slot = this.liveSlot(weak.id);
    slot.strong += 1;
    return new EntityHandle<T>(weak.id);
  }

  /**
   * Reclaim released slots and deliver pending observer notifications.
   * Call at frame boundaries.
   */
  cleanup(): number {
    this.observers.flush();

    let reclaimed = 0;
    const pending = this.pendingCleanup;
    this.pendingCleanup = [];

    for (const index of pending) {
      const slot = this.slots[index];
      if (!slot || slot.state !== "released") continue;

      const id: EntityId = { index, generation: slot.generation };
      const dispose = slot.dispose;

      this.observers.unsubscribeAll(id);
      slot.value = undefined;
      slot.dispose = null;
      slot.state = "empty";
      slot.generation += 1;
      this.freeList.push(index);
      reclaimed++;

      if (dispose) dispose();
    }

    return reclaimed;
  }

  // ==================== Access ====================

  /**
   * Exclusive access to an entity's state for the duration of `f`.
   * Nested withMut()/read() of the same entity inside `f` throws
   * borrow-conflict. Marks the entity as changed.
   */
  withMut<T, R>(handle: EntityHandle<T>, f: (state: T) => R): R {
    this.assertNotDropped(handle);
    const slot = this.liveSlot(handle.id);
    if (slot.writing || slot.readers > 0) {
      throw new EngineError(
        "borrow-conflict",
        `${handle.toString()} is already borrowed`
      );
    }

    slot.writing = true;
    try {
      return f(this.valueOf<T>(slot));
    } finally {
      slot.writing = false;
      this.observers.markChanged(handle.id);
    }
  }

  /** Replace an entity's state (for primitive state values) */
  set<T>(handle: EntityHandle<T>, value: T): void {
    this.assertNotDropped(handle);
    const slot = this.liveSlot(handle.id);
    if (slot.writing || slot.readers > 0) {
      throw new EngineError("borrow-conflict", `${handle.toString()} is already borrowed`);
    }
    slot.value = value;
    this.observers.markChanged(handle.id);
  }

  /**
   * Shared access. Several reads may nest; a read inside an exclusive
   * borrow of the same entity throws borrow-conflict.
   */
  read<T, R>(handle: AnyHandle<T>, f: (state: Readonly<T>) => R): R {
    if (handle instanceof EntityHandle) {
      this.assertNotDropped(handle);
    }
    const slot = this.liveSlot(handle.id);
    if (slot.writing) {
      throw new EngineError(
        "borrow-conflict",
        `${handle.toString()} is exclusively borrowed`
      );
    }

    slot.readers += 1;
    try {
      return f(this.valueOf<T>(slot));
    } finally {
      slot.readers -= 1;
    }
  }

  /**
   * Current state. This is the stored value itself, not a copy; change it
   * only through withMut() or set().
   */
  get<T>(handle: AnyHandle<T>): Readonly<T> {
    return this.read(handle, (state) => state);
  }

  /** Resolve a weak handle; fails with entity-not-found once released */
  resolve<T, R>(weak: WeakHandle<T>, f: (state: Readonly<T>) => R): R {
    return this.read(weak, f);
  }

  isAlive(handle: AnyHandle<unknown>): boolean {
    const slot = this.slots[handle.id.index];
    return slot !== undefined && slot.state === "live" && slot.generation === handle.id.generation;
  }

  /** Current strong reference count, 0 once released */
  strongCount(handle: AnyHandle<unknown>): number {
    return this.isAlive(handle) ? this.slotAt(handle.id.index).strong : 0;
  }

  // ==================== Observation ====================

  /**
   * Register a callback invoked at the next flush after each change.
   * Observers are removed automatically when the entity is reclaimed.
   */
  subscribe<T>(handle: AnyHandle<T>, callback: ObserverCallback): SubscriptionId {
    this.liveSlot(handle.id);
    return this.observers.subscribe(handle.id, callback);
  }

  unsubscribe(id: SubscriptionId): void {
    this.observers.unsubscribe(id);
  }

  /** Deliver pending notifications before the frame boundary */
  flush(): void {
    this.observers.flush();
  }

  hasPendingNotifications(): boolean {
    return this.observers.hasPendingChanges();
  }

  /** True when some entity changed since clearInvalidation() */
  get invalidationRequested(): boolean {
    return this.observers.invalidationRequested;
  }

  clearInvalidation(): void {
    this.observers.clearInvalidation();
  }

  // ==================== Stats ====================

  /** Number of live entities */
  get size(): number {
    return this.slots.filter((s) => s.state === "live").length;
  }

  /** Number of allocated slots, including free and released ones */
  get capacity(): number {
    return this.slots.length;
  }

  // ==================== Internals ====================

  private allocateSlot(): number {
    const reused = this.freeList.pop();
    if (reused !== undefined) {
      return reused;
    }
    if (this.slots.length >= this.maxEntities) {
      throw new EngineError(
        "resource-exhausted",
        `entity store is full (${this.maxEntities} slots)`
      );
    }
    this.slots.push({
      value: undefined,
      generation: 0,
      strong: 0,
      state: "empty",
      readers: 0,
      writing: false,
      dispose: null,
    });
    return this.slots.length - 1;
  }

  private slotAt(index: number): EntitySlot {
    const slot = this.slots[index];
    if (!slot) {
      throw new EngineError("entity-not-found", `no entity slot ${index}`);
    }
    return slot;
  }

  private liveSlot(id: EntityId): EntitySlot {
    const slot = this.slots[id.index];
    if (!slot || slot.state !== "live" || slot.generation !== id.generation) {
      throw new EngineError(
        "entity-not-found",
        `entity ${entityIdToString(id)} has been released`
      );
    }
    return slot;
  }

  private assertNotDropped(handle: EntityHandle<unknown>): void {
    if (this.droppedHandles.has(handle)) {
      throw new EngineError("handle-released", `${handle.toString()} was already dropped`);
    }
  }

  private valueOf<T>(slot: EntitySlot): T {
    // Slots are type-erased; the handle's type parameter was fixed by create()
    return slot.value as T;
  }
}
