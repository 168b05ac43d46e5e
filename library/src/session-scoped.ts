/**
 * @fileoverview Session-scoped execution gateway
 *
 * A gateway runs a unit of work against a session obtained from a
 * {@link SessionSource}, then runs a finalizer exactly once, whatever the
 * outcome. Values and errors of the unit of work reach the caller unchanged.
 *
 * The gateway never closes the session: closing it is the caller's job,
 * usually from the finalizer (see `endSession`).
 *
 * @module
 */

import {
  FinalizerError,
  InvalidArgumentError,
} from "./errors.ts";
import { createEventEmitter, type EventSubscriber } from "./events.ts";
import type { Logger } from "./logger.ts";
import { raceAbort, ResultStream, type Source, toAsyncIterable } from "./result-stream.ts";
import { getRuntimeLogger } from "./runtime-config.ts";
import { createSessionContext, type SessionContext } from "./session.ts";
import { endExecutionSpan, startExecutionSpan } from "./telemetry.ts";

/**
 * Provides the session an execution is bound to
 */
export interface SessionSource<TSession> {
  openSession(): TSession | PromiseLike<TSession>;
}

/**
 * The unit of work: performs backend operations with the session
 */
export type SessionCallback<T, TSession> = (session: TSession) => Source<T>;

/**
 * Runs after the unit of work, on every exit path
 */
export type SessionFinalizer<TSession> = (
  session: TSession,
) => void | PromiseLike<void>;

/**
 * States an execution goes through, in order
 *
 * `completed`, `failed` and `cancelled` are mutually exclusive.
 */
export type ExecutionState =
  | "created"
  | "running"
  | "completed"
  | "failed"
  | "cancelled"
  | "finalizing"
  | "terminal";

export type ExecutionOutcome = "completed" | "failed" | "cancelled";

export type SessionScopedEvents<TSession> = {
  /** An execution changed state; no session yet while `created` */
  state: [state: ExecutionState, session: TSession | undefined];
  /** A finalizer failed; the execution result is unaffected */
  finalizerError: [error: FinalizerError, session: TSession];
};

/**
 * Steps wrapped around the unit of work, used for transactions
 */
export interface SessionLifecycle<TSession> {
  readonly transactional: boolean;
  /** Before the unit of work starts; a failure fails the execution */
  begin(session: TSession): void | PromiseLike<void>;
  /** After the unit of work completed; a failure fails the execution */
  complete(session: TSession): void | PromiseLike<void>;
  /** After a failure or a cancellation; a failure is logged, never raised */
  rollback(session: TSession, outcome: ExecutionOutcome): PromiseLike<void>;
}

export interface ExecuteOptions {
  /** Cancels the execution; the stream then rejects with `signal.reason` */
  signal?: AbortSignal;
}

export interface SessionScopedOptions<TSession> {
  /** Defaults to a console logger at the configured level */
  logger?: Logger;
  /** Side channel for finalizer failures */
  onFinalizerError?: (error: FinalizerError, session: TSession) => void;
  /** Shares the session binding with other gateways */
  context?: SessionContext<TSession>;
  lifecycle?: SessionLifecycle<TSession>;
}

/**
 * Gateway to execute session-bound operations
 */
export interface SessionScoped<TSession> {
  /**
   * Executes the unit of work within a session
   *
   * @param action - The unit of work
   * @param doFinally - Notified with the session once the unit of work is done,
   * in every case. Defaults to a no-op
   * @throws {InvalidArgumentError} synchronously when a callback is missing
   */
  executeMany<T>(
    action: SessionCallback<T, TSession>,
    doFinally?: SessionFinalizer<TSession>,
    options?: ExecuteOptions,
  ): ResultStream<T>;

  /**
   * Executes the unit of work within a session, expecting at most one value
   *
   * @returns The value, or undefined when the unit of work produced none
   * @throws {InvalidArgumentError} synchronously when a callback is missing
   */
  executeOne<T>(
    action: SessionCallback<T, TSession>,
    doFinally?: SessionFinalizer<TSession>,
    options?: ExecuteOptions,
  ): Promise<T | undefined>;

  /** The session bound to the running unit of work, if any */
  currentSession(): TSession | undefined;

  readonly events: EventSubscriber<SessionScopedEvents<TSession>>;
}

const noOpFinalizer: SessionFinalizer<unknown> = () => {};

const noLifecycle: SessionLifecycle<unknown> = {
  transactional: false,
  begin: () => {},
  complete: () => {},
  rollback: () => Promise.resolve(),
};

function assertFunction(value: unknown, argument: string): void {
  if (typeof value !== "function") {
    throw new InvalidArgumentError(argument);
  }
}

/**
 * Creates a gateway over a session source
 *
 * @example
 * ```typescript
 * const gateway = createSessionScoped(mongoSessionSource(client));
 *
 * const user = await gateway.executeOne(
 *   (session) => users.findOne({ name: "Alice" }, { session }),
 *   (session) => session.endSession(),
 * );
 * ```
 */
export function createSessionScoped<TSession>(
  source: SessionSource<TSession>,
  options: SessionScopedOptions<TSession> = {},
): SessionScoped<TSession> {
  const logger = options.logger ?? getRuntimeLogger();
  const context = options.context ?? createSessionContext<TSession>();
  const lifecycle = options.lifecycle ?? noLifecycle;
  const events = createEventEmitter<SessionScopedEvents<TSession>>(logger);

  function reportFinalizerError(error: FinalizerError, session: TSession) {
    logger.warn("Session finalizer failed", error.cause);
    events.emit("finalizerError", error, session);
    if (options.onFinalizerError) {
      try {
        options.onFinalizerError(error, session);
      } catch (callbackError) {
        logger.error("onFinalizerError callback threw", callbackError);
      }
    }
  }

  async function closeSource(
    iterator: AsyncIterator<unknown>,
    abandoned: boolean,
  ): Promise<void> {
    if (!iterator.return) return;

    // An abandoned pull may never settle: closing cannot be awaited then
    if (abandoned) {
      Promise.resolve(iterator.return()).catch((error: unknown) => {
        logger.debug("Unit of work failed to close after abort", error);
      });
      return;
    }

    try {
      await iterator.return();
    } catch (error) {
      logger.debug("Unit of work failed to close after cancellation", error);
    }
  }

  async function* execute<T>(
    action: SessionCallback<T, TSession>,
    doFinally: SessionFinalizer<TSession>,
    signal: AbortSignal | undefined,
    cardinality: "many" | "one",
  ): AsyncGenerator<T, void, undefined> {
    signal?.throwIfAborted();
    events.emit("state", "created", undefined);

    let session: TSession;
    try {
      session = await source.openSession();
    } catch (error) {
      // No unit of work ran, so there is nothing to finalize
      events.emit("state", "terminal", undefined);
      throw error;
    }

    const span = startExecutionSpan({
      cardinality,
      transactional: lifecycle.transactional,
    });
    let outcome: ExecutionOutcome = "cancelled";
    let failure: unknown;
    let emitted = 0;
    let finalized = false;
    let finalizerSucceeded = true;

    const finalize = async () => {
      if (finalized) return;
      finalized = true;

      events.emit("state", "finalizing", session);
      try {
        await context.run(session, () => doFinally(session));
      } catch (cause) {
        finalizerSucceeded = false;
        reportFinalizerError(new FinalizerError(cause), session);
      }
    };

    events.emit("state", "running", session);
    try {
      await lifecycle.begin(session);

      const iterator = context.run(
        session,
        () => toAsyncIterable(action(session))[Symbol.asyncIterator](),
      );
      let open = true;
      let abandoned = false;
      try {
        for (;;) {
          signal?.throwIfAborted();
          let next: IteratorResult<T>;
          try {
            next = await raceAbort(
              context.run(session, () => iterator.next()),
              signal,
            );
          } catch (error) {
            if (signal?.aborted) abandoned = true;
            else open = false;
            throw error;
          }
          if (next.done) {
            open = false;
            break;
          }
          emitted++;
          yield next.value;
        }
      } finally {
        if (open) await closeSource(iterator, abandoned);
      }

      await lifecycle.complete(session);
      outcome = "completed";
    } catch (error) {
      outcome = signal?.aborted ? "cancelled" : "failed";
      failure = error;
      throw error;
    } finally {
      events.emit("state", outcome, session);
      if (outcome !== "completed") {
        try {
          await lifecycle.rollback(session, outcome);
        } catch (error) {
          logger.warn("Session rollback failed", error);
        }
      }
      await finalize();
      endExecutionSpan(span, {
        outcome,
        emitted,
        finalizerSucceeded,
        error: failure,
      });
      events.emit("state", "terminal", session);
    }
  }

  function stream<T>(
    action: SessionCallback<T, TSession>,
    doFinally: SessionFinalizer<TSession>,
    executeOptions: ExecuteOptions,
    cardinality: "many" | "one",
  ): ResultStream<T> {
    assertFunction(action, "action");
    assertFunction(doFinally, "doFinally");

    return new ResultStream(() =>
      execute(action, doFinally, executeOptions.signal, cardinality)
    );
  }

  return {
    executeMany: (action, doFinally = noOpFinalizer, executeOptions = {}) =>
      stream(action, doFinally, executeOptions, "many"),
    executeOne: (action, doFinally = noOpFinalizer, executeOptions = {}) =>
      stream(action, doFinally, executeOptions, "one").single(),
    currentSession: () => context.getSession(),
    events: events.expose(),
  };
}
