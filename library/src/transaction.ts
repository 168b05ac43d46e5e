import type * as m from "mongodb";
import type { Logger } from "./logger.ts";
import { getRuntimeConfig, getRuntimeLogger } from "./runtime-config.ts";
import {
  createSessionScoped,
  type SessionLifecycle,
  type SessionScoped,
  type SessionScopedOptions,
  type SessionSource,
} from "./session-scoped.ts";

/**
 * The part of a session needed to drive a transaction
 *
 * MongoDB's `ClientSession` satisfies it.
 */
export interface TransactionCapableSession {
  startTransaction(options?: m.TransactionOptions): void;
  commitTransaction(): Promise<unknown>;
  abortTransaction(): Promise<unknown>;
  inTransaction(): boolean;
}

export interface TransactionLifecycleOptions {
  /** Merged over the configured transaction defaults */
  transaction?: m.TransactionOptions;
  logger?: Logger;
  /**
   * Tells whether the deployment supports transactions; checked before each
   * execution. Without support, units of work run outside of a transaction
   * and a warning is logged once.
   */
  isSupported?: () => Promise<boolean>;
}

/**
 * Creates the lifecycle running each execution inside a transaction
 *
 * The transaction starts before the unit of work, is committed once the unit
 * of work completed and aborted when it failed or was cancelled. Nothing is
 * retried.
 */
export function transactionLifecycle<TSession extends TransactionCapableSession>(
  options: TransactionLifecycleOptions = {},
): SessionLifecycle<TSession> {
  const logger = options.logger ?? getRuntimeLogger();
  let warningDisplayed = false;

  return {
    transactional: true,

    async begin(session) {
      if (options.isSupported && !(await options.isSupported())) {
        if (!warningDisplayed) {
          logger.warn(
            "MongoDB transactions are not enabled, units of work run without a transaction.",
          );
          warningDisplayed = true;
        }
        return;
      }

      session.startTransaction({
        ...getRuntimeConfig().transaction?.options,
        ...options.transaction,
      });
    },

    async complete(session) {
      if (session.inTransaction()) {
        await session.commitTransaction();
      }
    },

    async rollback(session, outcome) {
      try {
        if (!session.inTransaction()) return;
        await session.abortTransaction();
        logger.debug(`Transaction aborted after the unit of work was ${outcome}`);
      } catch (error) {
        // The unit of work's own outcome wins over an abort failure
        logger.warn("Failed to abort transaction", error);
      }
    },
  };
}

/**
 * Creates a gateway whose executions each run in their own transaction
 *
 * @example
 * ```typescript
 * const gateway = inTransaction(mongoSessionSource(client));
 *
 * await gateway.executeOne(async (session) => {
 *   await accounts.updateOne({ _id: from }, { $inc: { balance: -10 } }, { session });
 *   await accounts.updateOne({ _id: to }, { $inc: { balance: 10 } }, { session });
 * }, endSession);
 * ```
 */
export function inTransaction<TSession extends TransactionCapableSession>(
  source: SessionSource<TSession>,
  options:
    & Omit<SessionScopedOptions<TSession>, "lifecycle">
    & Omit<TransactionLifecycleOptions, "logger"> = {},
): SessionScoped<TSession> {
  const { transaction, isSupported, ...gatewayOptions } = options;
  return createSessionScoped(source, {
    ...gatewayOptions,
    lifecycle: transactionLifecycle<TSession>({
      transaction,
      isSupported,
      logger: gatewayOptions.logger,
    }),
  });
}
