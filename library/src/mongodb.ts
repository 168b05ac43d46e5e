import * as base from "mongodb";
import { getRuntimeConfig } from "./runtime-config.ts";
import {
  checkTransactionEnabled,
  getSessionContext,
  type MongoSessionClient,
} from "./session.ts";
import {
  createSessionScoped,
  type SessionFinalizer,
  type SessionScoped,
  type SessionScopedOptions,
  type SessionSource,
} from "./session-scoped.ts";
import { inTransaction } from "./transaction.ts";

/**
 * MongoDB ClientSession type
 */
export const ClientSession = base.ClientSession;
export type ClientSession = base.ClientSession;

/**
 * Session source starting a new driver session for every execution
 *
 * @param sessionOptions - Merged over the configured session defaults
 */
export function mongoSessionSource(
  client: MongoSessionClient,
  sessionOptions: base.ClientSessionOptions = {},
): SessionSource<base.ClientSession> {
  return {
    openSession: () =>
      client.startSession({
        ...getRuntimeConfig().session?.options,
        ...sessionOptions,
      }),
  };
}

/**
 * Finalizer ending the session once the unit of work is done
 *
 * @example
 * ```typescript
 * await client.sessionScoped().executeOne(
 *   (session) => users.countDocuments({}, { session }),
 *   endSession,
 * );
 * ```
 */
export const endSession: SessionFinalizer<base.ClientSession> = (session) =>
  session.endSession();

/**
 * Options for gateways created from a {@link MongoClient}
 */
export type MongoSessionScopedOptions =
  & Omit<SessionScopedOptions<base.ClientSession>, "context" | "lifecycle">
  & {
    session?: base.ClientSessionOptions;
  };

/**
 * MongoDB client able to hand out session-scoped gateways
 *
 * Every gateway of a client shares the same session context, so
 * {@link MongoClient.currentSession} sees the session of whichever gateway
 * runs the current unit of work.
 */
export class MongoClient extends base.MongoClient {
  /**
   * Gets a gateway executing units of work in a new session
   *
   * The session is not ended by the gateway: pass {@link endSession} as
   * finalizer, or end it yourself.
   *
   * @example
   * ```typescript
   * const client = new MongoClient("mongodb://localhost:27017");
   *
   * const users = client.sessionScoped().executeMany(
   *   (session) => client.db().collection("users").find({}, { session }),
   *   endSession,
   * );
   * for await (const user of users) {
   *   console.log(user.name);
   * }
   * ```
   */
  sessionScoped(
    options: MongoSessionScopedOptions = {},
  ): SessionScoped<base.ClientSession> {
    const { session, ...gatewayOptions } = options;
    return createSessionScoped(mongoSessionSource(this, session), {
      ...gatewayOptions,
      context: getSessionContext(this),
    });
  }

  /**
   * Gets a gateway executing each unit of work in its own transaction
   *
   * Transactions need a replica set or a sharded cluster. On a standalone
   * server, units of work run without a transaction and a warning is logged.
   */
  inTransaction(
    options: MongoSessionScopedOptions & {
      transaction?: base.TransactionOptions;
    } = {},
  ): SessionScoped<base.ClientSession> {
    const { session, ...gatewayOptions } = options;
    return inTransaction(mongoSessionSource(this, session), {
      ...gatewayOptions,
      context: getSessionContext(this),
      isSupported: () =>
        checkTransactionEnabled(this, this.db(), gatewayOptions.logger),
    });
  }

  /**
   * Gets the session bound to the unit of work currently running on this client
   */
  currentSession(): base.ClientSession | undefined {
    return getSessionContext(this).getSession();
  }
}
