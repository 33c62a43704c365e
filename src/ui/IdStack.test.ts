import { describe, it, expect } from "vitest";
import { IdStack, ROOT_ID, hashWidgetId, stableId } from "./IdStack";
import { isEngineError } from "../errors";

function frame(build: (ids: IdStack) => string[]): string[] {
  const ids = new IdStack();
  const result = build(ids);
  ids.assertBalanced();
  return result;
}

describe("hashWidgetId", () => {
  it("is deterministic", () => {
    expect(hashWidgetId(ROOT_ID, "a", "b")).toBe(hashWidgetId(ROOT_ID, "a", "b"));
  });

  it("is order-sensitive", () => {
    expect(hashWidgetId(ROOT_ID, "a", "b")).not.toBe(hashWidgetId(ROOT_ID, "b", "a"));
  });

  it("frames parts so concatenation does not collide", () => {
    expect(hashWidgetId(ROOT_ID, "ab", "c")).not.toBe(hashWidgetId(ROOT_ID, "a", "bc"));
  });

  it("produces 16 hex digits", () => {
    expect(hashWidgetId(ROOT_ID, "x")).toMatch(/^[0-9a-f]{16}$/);
  });
});

describe("IdStack", () => {
  it("yields identical ids for identical call structure across frames", () => {
    const build = (ids: IdStack): string[] => {
      const out = [ids.currentId()];
      out.push(ids.pushScope());
      out.push(ids.currentId(), ids.currentId("inc"), ids.currentId(3));
      ids.popScope();
      out.push(ids.currentId());
      return out;
    };
    expect(frame(build)).toEqual(frame(build));
  });

  it("gives unkeyed siblings distinct ordinal-based ids", () => {
    const first = frame((ids) => [ids.currentId(), ids.currentId()]);
    expect(first[0]).not.toBe(first[1]);
  });

  it("keeps keyed ids stable regardless of sibling order", () => {
    const [a1, b1] = frame((ids) => [ids.currentId("a"), ids.currentId("b")]);
    const [b2, a2] = frame((ids) => [ids.currentId("b"), ids.currentId("a")]);
    expect(a1).toBe(a2);
    expect(b1).toBe(b2);
  });

  it("does not let keyed siblings shift unkeyed ordinals", () => {
    const [plain1] = frame((ids) => [ids.currentId()]);
    const [, plain2] = frame((ids) => [ids.currentId("extra"), ids.currentId()]);
    expect(plain1).toBe(plain2);
  });

  it("distinguishes numeric and string keys", () => {
    const ids = new IdStack();
    expect(ids.currentId(1)).not.toBe(ids.currentId("1"));
  });

  it("scopes the same key differently under different parents", () => {
    const [inA, inB] = frame((ids) => {
      ids.pushScope("a");
      const x = ids.currentId("item");
      ids.popScope();
      ids.pushScope("b");
      const y = ids.currentId("item");
      ids.popScope();
      return [x, y];
    });
    expect(inA).not.toBe(inB);
  });

  it("matches stableId for a root-level key", () => {
    const ids = new IdStack();
    expect(ids.currentId("menu")).toBe(stableId("menu"));
  });

  it("tracks depth", () => {
    const ids = new IdStack();
    ids.pushScope();
    ids.pushScope("inner");
    expect(ids.depth).toBe(2);
    ids.popScope();
    expect(ids.depth).toBe(1);
  });

  it("reports the id of the innermost scope", () => {
    const ids = new IdStack();
    expect(ids.scopeId).toBe(ROOT_ID);
    const outer = ids.pushScope("outer");
    expect(ids.scopeId).toBe(outer);
    ids.popScope();
    expect(ids.scopeId).toBe(ROOT_ID);
  });

  it("throws on more pops than pushes", () => {
    const ids = new IdStack();
    expect(() => ids.popScope()).toThrowError(/no open scope/);
    try {
      ids.popScope();
    } catch (error) {
      expect(isEngineError(error, "scope-underflow")).toBe(true);
    }
  });

  it("fails the balance check with open scopes", () => {
    const ids = new IdStack();
    ids.pushScope();
    expect(() => ids.assertBalanced()).toThrowError("1 identity scope(s) still open at end of frame");
  });

  it("peeks the next id without consuming it", () => {
    const ids = new IdStack();
    const peeked = ids.peekId();
    expect(ids.peekId()).toBe(peeked);
    expect(ids.pushScope()).toBe(peeked);
    expect(ids.peekId("row")).toBe(ids.currentId("row"));
  });

  it("reset restarts ordinals", () => {
    const ids = new IdStack();
    const first = ids.currentId();
    ids.pushScope();
    ids.reset();
    expect(ids.depth).toBe(0);
    expect(ids.currentId()).toBe(first);
  });
});
