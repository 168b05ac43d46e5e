/**
 * @fileoverview Error types raised by session-scoped execution
 *
 * Errors coming from the unit of work or from the session source are never
 * wrapped: they reach the caller with their original identity. Only the
 * gateway's own failures use the classes below.
 *
 * @module
 */

/**
 * Base class for every error created by this library
 */
export class SessionScopeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required callback was not supplied
 *
 * Thrown synchronously, before any session is requested.
 */
export class InvalidArgumentError extends SessionScopeError {
  /** Name of the offending argument */
  readonly argument: string;

  constructor(argument: string, message = `${argument} must be a function`) {
    super(message);
    this.argument = argument;
  }
}

/**
 * A single-result execution observed more than one value
 */
export class CardinalityViolationError extends SessionScopeError {
  constructor(readonly expected = 1) {
    super(`Expected at most ${expected} value but the unit of work produced more`);
  }
}

/**
 * A finalizer threw or rejected
 *
 * Only delivered through the side channel (events, `onFinalizerError`, logs),
 * never as the result of an execution.
 */
export class FinalizerError extends SessionScopeError {
  constructor(cause: unknown) {
    super(
      `Session finalizer failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
  }
}
