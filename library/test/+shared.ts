import type * as m from "mongodb";
import type { Logger } from "../src/logger.ts";
import type { SessionSource } from "../src/session-scoped.ts";
import type { TransactionCapableSession } from "../src/transaction.ts";

/**
 * In-process stand-in for a driver session, recording what happened to it
 */
export class FakeSession implements TransactionCapableSession {
  readonly calls: string[] = [];
  ended = false;
  failCommit: Error | undefined;
  failAbort: Error | undefined;
  transactionOptions: m.TransactionOptions | undefined;
  private active = false;

  constructor(readonly id: number) {}

  startTransaction(options?: m.TransactionOptions): void {
    this.calls.push("startTransaction");
    this.transactionOptions = options;
    this.active = true;
  }

  async commitTransaction(): Promise<void> {
    this.calls.push("commitTransaction");
    this.active = false;
    if (this.failCommit) throw this.failCommit;
  }

  async abortTransaction(): Promise<void> {
    this.calls.push("abortTransaction");
    this.active = false;
    if (this.failAbort) throw this.failAbort;
  }

  inTransaction(): boolean {
    return this.active;
  }

  async endSession(): Promise<void> {
    this.calls.push("endSession");
    this.ended = true;
  }
}

/**
 * Session source handing out numbered fake sessions
 */
export function fakeSessionSource(): SessionSource<FakeSession> & {
  opened: FakeSession[];
} {
  const opened: FakeSession[] = [];
  return {
    opened,
    openSession: async () => {
      const session = new FakeSession(opened.length + 1);
      opened.push(session);
      return session;
    },
  };
}

export type LogEntry = { level: keyof Logger; message: string; details: unknown[] };

/**
 * Logger keeping entries in memory
 */
export function memoryLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const write = (level: keyof Logger) =>
  (message: string, ...details: unknown[]) => {
    entries.push({ level, message, details });
  };
  return {
    entries,
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

/**
 * Async generator yielding `values`, recording whether it was closed early
 */
export function trackedValues<T>(values: T[]): {
  iterable: AsyncGenerator<T>;
  state: { closed: boolean; pulled: number };
} {
  const state = { closed: false, pulled: 0 };
  async function* generate(): AsyncGenerator<T> {
    try {
      for (const value of values) {
        state.pulled++;
        yield value;
      }
    } finally {
      state.closed = true;
    }
  }
  return { iterable: generate(), state };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
