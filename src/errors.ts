/**
 * Error taxonomy for the engine.
 *
 * Every error raised inside a lock, forward or initializePool unwinds the
 * whole atomic scope; nothing here is caught and retried locally.
 */

export type EngineErrorKind =
  | "validation"
  | "invariant"
  | "arithmetic"
  | "session";

export class EngineError extends Error {
  readonly kind: EngineErrorKind;
  readonly code: string;

  constructor(kind: EngineErrorKind, code: string, message: string) {
    super(`[${code}] ${message}`);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
  }
}

/** Malformed input, rejected before any mutation. */
export class ValidationError extends EngineError {
  constructor(code: string, message: string) {
    super("validation", code, message);
  }
}

/** A settlement or width invariant would break; the session aborts. */
export class InvariantViolationError extends EngineError {
  constructor(code: string, message: string) {
    super("invariant", code, message);
  }
}

/** Price/tick conversion or fixed-point input outside its domain. */
export class ArithmeticDomainError extends EngineError {
  constructor(code: string, message: string) {
    super("arithmetic", code, message);
  }
}

/** Operation issued with a session that is not the current frame. */
export class SessionError extends EngineError {
  constructor(code: string, message: string) {
    super("session", code, message);
  }
}
