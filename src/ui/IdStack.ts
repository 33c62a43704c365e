/**
 * Widget Identity
 *
 * Widget ids are recomputed every frame from the structural position of a
 * declarative call: the chain of enclosing scopes plus either the sibling
 * ordinal inside the current scope or an explicit key. Identical call
 * structure therefore yields identical ids from one frame to the next.
 */

import { EngineError } from "../errors";

/** Stable per-frame widget identifier (16 hex digits) */
export type WidgetId = string;

/** Explicit disambiguator: loop index, record id, tag */
export type IdKey = string | number;

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
// Second lane seed, so the two 32-bit halves are independent
const FNV_OFFSET_B = 0x050c5d1f;

function fnv1a(input: string, seed: number): number {
  let hash = seed >>> 0;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

function toHex(value: number): string {
  return value.toString(16).padStart(8, "0");
}

export const ROOT_ID: WidgetId = "0000000000000000";

/**
 * Combine a parent id with further parts by sequential hashing.
 * Order-sensitive: hashWidgetId(p, "a", "b") !== hashWidgetId(p, "b", "a").
 */
export function hashWidgetId(parent: WidgetId, ...parts: string[]): WidgetId {
  let a = fnv1a(parent, FNV_OFFSET);
  let b = fnv1a(parent, FNV_OFFSET_B);
  for (const part of parts) {
    // Length prefix keeps ["ab", "c"] and ["a", "bc"] apart
    const framed = `${part.length}:${part}`;
    a = fnv1a(framed, a);
    b = fnv1a(framed, b ^ a);
  }
  return toHex(a) + toHex(b);
}

/** Derive an id from a string key alone, outside any scope */
export function stableId(key: IdKey): WidgetId {
  return hashWidgetId(ROOT_ID, keyPart(key));
}

function keyPart(key: IdKey): string {
  return typeof key === "number" ? `n:${key}` : `s:${key}`;
}

interface Scope {
  id: WidgetId;
  nextOrdinal: number;
}

/**
 * Scoped push/pop stack used by the UI context to compose ids
 * hierarchically. Owned by one UI context for the duration of a frame.
 */
export class IdStack {
  private stack: Scope[] = [{ id: ROOT_ID, nextOrdinal: 0 }];

  /** Number of open scopes above the root */
  get depth(): number {
    return this.stack.length - 1;
  }

  /** Id of the innermost open scope */
  get scopeId(): WidgetId {
    return this.top().id;
  }

  /**
   * The id the next currentId() or pushScope() with the same key would
   * return, without consuming an ordinal.
   */
  peekId(key?: IdKey): WidgetId {
    const scope = this.top();
    if (key !== undefined) {
      return hashWidgetId(scope.id, "key", keyPart(key));
    }
    return hashWidgetId(scope.id, "ord", String(scope.nextOrdinal));
  }

  /**
   * Allocate the id for the next call site in the current scope.
   *
   * Without a key the id encodes the sibling ordinal, so reordering
   * unkeyed siblings changes their ids. With a key the id depends only on
   * the scope path and the key; keyed calls do not consume an ordinal.
   */
  currentId(key?: IdKey): WidgetId {
    const scope = this.top();
    if (key !== undefined) {
      return hashWidgetId(scope.id, "key", keyPart(key));
    }
    const ordinal = scope.nextOrdinal++;
    return hashWidgetId(scope.id, "ord", String(ordinal));
  }

  /**
   * Open a child scope. The scope's own id is allocated in the parent
   * exactly like currentId() and returned.
   */
  pushScope(key?: IdKey): WidgetId {
    const id = this.currentId(key);
    this.stack.push({ id, nextOrdinal: 0 });
    return id;
  }

  /** Close the innermost scope */
  popScope(): void {
    if (this.stack.length <= 1) {
      throw new EngineError("scope-underflow", "popScope() called with no open scope");
    }
    this.stack.pop();
  }

  /** Start a new frame with an empty stack */
  reset(): void {
    this.stack = [{ id: ROOT_ID, nextOrdinal: 0 }];
  }

  /** Throws if any pushScope() was not matched by popScope() */
  assertBalanced(): void {
    if (this.depth !== 0) {
      throw new EngineError(
        "unbalanced-scope",
        `${this.depth} identity scope(s) still open at end of frame`
      );
    }
  }

  private top(): Scope {
    const scope = this.stack[this.stack.length - 1];
    if (!scope) {
      // reset() and popScope() never leave the stack empty
      throw new EngineError("scope-underflow", "identity stack is empty");
    }
    return scope;
  }
}
