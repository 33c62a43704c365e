import { describe, it, expect, vi, beforeEach } from "vitest";
import { EntityStore } from "./EntityStore";
import { Computed, computed } from "./computed";

interface Counter {
  value: number;
}

describe("Computed", () => {
  let store: EntityStore;

  beforeEach(() => {
    store = new EntityStore();
  });

  it("maps the source once and caches the result", () => {
    const counter = store.insert<Counter>({ value: 5 });
    const mapper = vi.fn((s: Readonly<Counter>) => s.value * 2);
    const doubled = new Computed(counter, mapper, store);

    expect(doubled.valid).toBe(false);
    expect(doubled.get()).toBe(10);
    expect(doubled.get()).toBe(10);
    expect(doubled.valid).toBe(true);
    expect(mapper).toHaveBeenCalledTimes(1);
    expect(doubled.sourceId).toEqual(counter.id);
  });

  it("recomputes after a flushed change", () => {
    const counter = store.insert<Counter>({ value: 5 });
    const doubled = computed(counter, (s) => s.value * 2, store);
    doubled.get();

    store.withMut(counter, (s) => {
      s.value = 7;
    });
    expect(doubled.get()).toBe(10);

    store.flush();
    expect(doubled.valid).toBe(false);
    expect(doubled.get()).toBe(14);
  });

  it("recomputes after an explicit invalidate", () => {
    const counter = store.insert<Counter>({ value: 1 });
    const doubled = computed(counter, (s) => s.value * 2, store);
    doubled.get();
    store.set(counter, { value: 3 });
    doubled.invalidate();
    expect(doubled.get()).toBe(6);
  });

  it("returns null once the source is released", () => {
    const counter = store.insert<Counter>({ value: 1 });
    const weak = store.downgrade(counter);
    const doubled = computed(weak, (s) => s.value * 2, store);

    store.dropHandle(counter);
    expect(doubled.get()).toBeNull();
  });

  it("stops refreshing after dispose", () => {
    const counter = store.insert<Counter>({ value: 1 });
    const doubled = computed(counter, (s) => s.value * 2, store);
    doubled.dispose();
    expect(doubled.get()).toBe(2);

    store.set(counter, { value: 4 });
    store.flush();
    expect(doubled.get()).toBe(2);
  });
});
