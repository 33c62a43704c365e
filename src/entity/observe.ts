/**
 * Entity Observers
 *
 * Change notifications are batched: updates mark an entity as changed and
 * flush() delivers one notification per changed entity at the frame
 * boundary.
 */

import { entityIdToString, type EntityId } from "./types";

export type SubscriptionId = number;

export type ObserverCallback = () => void;

interface Observer {
  id: SubscriptionId;
  callback: ObserverCallback;
}

export class ObserverRegistry {
  private subscriptions = new Map<string, Observer[]>();
  private owners = new Map<SubscriptionId, string>();
  private pending = new Set<string>();
  private invalidation = false;
  private nextId: SubscriptionId = 1;

  subscribe(entity: EntityId, callback: ObserverCallback): SubscriptionId {
    const key = entityIdToString(entity);
    const id = this.nextId++;
    const list = this.subscriptions.get(key) ?? [];
    list.push({ id, callback });
    this.subscriptions.set(key, list);
    this.owners.set(id, key);
    return id;
  }

  unsubscribe(id: SubscriptionId): void {
    const key = this.owners.get(id);
    if (key === undefined) return;
    this.owners.delete(id);

    const remaining = (this.subscriptions.get(key) ?? []).filter((o) => o.id !== id);
    if (remaining.length > 0) {
      this.subscriptions.set(key, remaining);
    } else {
      this.subscriptions.delete(key);
    }
  }

  /** Remove every observer of an entity (called when it is reclaimed) */
  unsubscribeAll(entity: EntityId): void {
    const key = entityIdToString(entity);
    for (const observer of this.subscriptions.get(key) ?? []) {
      this.owners.delete(observer.id);
    }
    this.subscriptions.delete(key);
    this.pending.delete(key);
  }

  markChanged(entity: EntityId): void {
    this.pending.add(entityIdToString(entity));
    this.invalidation = true;
  }

  hasPendingChanges(): boolean {
    return this.pending.size > 0;
  }

  /**
   * Deliver pending notifications. Changes made by callbacks are queued
   * for the next flush.
   */
  flush(): void {
    if (this.pending.size === 0) return;

    const changed = [...this.pending];
    this.pending.clear();

    for (const key of changed) {
      // Copy: callbacks may unsubscribe themselves
      const observers = [...(this.subscriptions.get(key) ?? [])];
      for (const observer of observers) {
        observer.callback();
      }
    }
  }

  get invalidationRequested(): boolean {
    return this.invalidation;
  }

  clearInvalidation(): void {
    this.invalidation = false;
  }

  get subscriptionCount(): number {
    return this.owners.size;
  }
}
