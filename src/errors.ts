/**
 * Engine errors
 *
 * Usage errors (unbalanced scopes, re-entrant entity access, stale handles)
 * are defects in the calling code and are thrown immediately. Input that
 * targets a widget that disappeared is an expected race and never reaches
 * this class.
 */

export type EngineErrorCode =
  /** beginFrame/endFrame called out of sequence */
  | "frame-state"
  /** popScope with only the root scope left */
  | "scope-underflow"
  /** identity scopes still open at endFrame */
  | "unbalanced-scope"
  /** re-entrant access to an entity that is exclusively borrowed */
  | "borrow-conflict"
  /** handle refers to an entity that has been released */
  | "entity-not-found"
  /** the same handle object was dropped twice */
  | "handle-released"
  /** entity store ran out of slots */
  | "resource-exhausted"
  /** layer id not registered with the manager */
  | "unknown-layer"
  /** shortcut text that does not parse */
  | "invalid-shortcut";

export class EngineError extends Error {
  override readonly name = "EngineError";
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }
}

export function isEngineError(error: unknown, code?: EngineErrorCode): error is EngineError {
  return error instanceof EngineError && (code === undefined || error.code === code);
}
