import type { Logger } from "./logger.ts";

/**
 * Map of event names to listener parameter tuples
 */
export type EventMap = Record<string, unknown[]>;

export type Listener<T extends EventMap, E extends keyof T> = (
  ...params: T[E]
) => void;

/**
 * Listener-facing half of an emitter
 */
export interface EventSubscriber<T extends EventMap> {
  /** Registers a listener and returns a function removing it */
  on<E extends keyof T>(event: E, listener: Listener<T, E>): () => void;
  off<E extends keyof T>(event: E, listener: Listener<T, E>): void;
}

export interface EventEmitter<T extends EventMap> extends EventSubscriber<T> {
  emit<E extends keyof T>(event: E, ...params: T[E]): void;
  /** Read-only view handed out to consumers, without `emit` */
  expose(): EventSubscriber<T>;
  listenerCount<E extends keyof T>(event: E): number;
}

/**
 * Creates a strongly-typed event emitter
 *
 * A listener that throws is reported to `logger` and the remaining listeners
 * still run, so one faulty observer cannot break an execution.
 *
 * @example
 * ```typescript
 * type Events = { finalized: [outcome: string] };
 *
 * const events = createEventEmitter<Events>(logger);
 * const stop = events.on("finalized", (outcome) => console.log(outcome));
 * events.emit("finalized", "completed");
 * stop();
 * ```
 */
export function createEventEmitter<T extends EventMap>(
  logger: Logger,
): EventEmitter<T> {
  const listeners: { [E in keyof T]?: Set<Listener<T, E>> } = {};

  function on<E extends keyof T>(event: E, listener: Listener<T, E>): () => void {
    const set = listeners[event] ?? new Set<Listener<T, E>>();
    set.add(listener);
    listeners[event] = set;
    return () => off(event, listener);
  }

  function off<E extends keyof T>(event: E, listener: Listener<T, E>): void {
    const set = listeners[event];
    if (!set) return;
    set.delete(listener);
    if (set.size === 0) delete listeners[event];
  }

  function emit<E extends keyof T>(event: E, ...params: T[E]): void {
    const set = listeners[event];
    if (!set) return;
    // Snapshot: listeners may unsubscribe while being notified
    for (const listener of [...set]) {
      try {
        listener(...params);
      } catch (error) {
        logger.error(`Listener for "${String(event)}" threw`, error);
      }
    }
  }

  function listenerCount<E extends keyof T>(event: E): number {
    return listeners[event]?.size ?? 0;
  }

  return {
    on,
    off,
    emit,
    expose: () => ({ on, off }),
    listenerCount,
  };
}
