import { CardinalityViolationError } from "./errors.ts";

/**
 * What a unit of work may hand back
 *
 * - an async iterable (a driver cursor, an async generator) for zero or more values
 * - a promise for at most one value, `null` and `undefined` meaning no value
 */
export type Source<T> =
  | AsyncIterable<T>
  | PromiseLike<T | null | undefined>;

function isAsyncIterable<T>(source: Source<T>): source is AsyncIterable<T> {
  return typeof source === "object" && source !== null &&
    Symbol.asyncIterator in source;
}

async function* fromPromise<T>(
  promise: PromiseLike<T | null | undefined>,
): AsyncGenerator<T, void, undefined> {
  const value = await promise;
  if (value !== null && value !== undefined) {
    yield value;
  }
}

/**
 * Normalizes a {@link Source} into an async iterable
 */
export function toAsyncIterable<T>(source: Source<T>): AsyncIterable<T> {
  return isAsyncIterable(source) ? source : fromPromise(source);
}

/**
 * Settles like `promise`, or rejects with `signal.reason` as soon as the
 * signal aborts
 *
 * The original promise keeps running; its outcome is then ignored.
 */
export function raceAbort<T>(
  promise: PromiseLike<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (!signal) {
    return Promise.resolve(promise);
  }

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Multi-value result of a session-scoped execution
 *
 * The stream is cold: nothing runs until it is iterated, and every iteration
 * is a new execution. Leaving a `for await` loop early cancels the execution.
 *
 * @example
 * ```typescript
 * const names = gateway.executeMany((session) => users.find({}, { session }));
 *
 * for await (const user of names) {
 *   if (user.name === "Alice") break; // cancels, the finalizer still runs
 * }
 *
 * const all = await names.toArray(); // runs again
 * ```
 */
export class ResultStream<T> implements AsyncIterable<T> {
  constructor(private readonly subscribe: () => AsyncIterator<T>) {}

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.subscribe();
  }

  /**
   * Collects every value
   */
  async toArray(): Promise<T[]> {
    const values: T[] = [];
    for await (const value of this) {
      values.push(value);
    }
    return values;
  }

  /**
   * Resolves to the only value, or `undefined` when there is none
   *
   * @throws {CardinalityViolationError} as soon as a second value shows up;
   * the execution is cancelled first
   */
  async single(): Promise<T | undefined> {
    let seen = false;
    let result: T | undefined;
    for await (const value of this) {
      if (seen) {
        throw new CardinalityViolationError();
      }
      seen = true;
      result = value;
    }
    return result;
  }

  /**
   * Resolves to the first value and cancels the rest of the execution
   */
  async first(): Promise<T | undefined> {
    for await (const value of this) {
      return value;
    }
    return undefined;
  }
}
