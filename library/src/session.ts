import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type * as m from "mongodb";
import type { Logger } from "./logger.ts";
import { getRuntimeLogger } from "./runtime-config.ts";

/**
 * Binds a session to the async context of a running unit of work
 */
export interface SessionContext<TSession> {
  /**
   * Gets the session bound to the current async context
   *
   * @returns The session, or undefined outside of a unit of work
   */
  getSession(): TSession | undefined;

  /**
   * Runs `fn` with `session` bound for its synchronous part and every
   * continuation it schedules
   */
  run<R>(session: TSession, fn: () => R): R;
}

/**
 * Creates a new session context backed by AsyncLocalStorage
 *
 * @internal
 */
export function createSessionContext<TSession>(): SessionContext<TSession> {
  const storage = new AsyncLocalStorage<TSession>();

  return {
    getSession: () => storage.getStore(),
    run: (session, fn) => storage.run(session, fn),
  };
}

/**
 * Anything able to start a MongoDB session
 */
export type MongoSessionClient = Pick<m.MongoClient, "startSession">;

const sessionContextMap = new WeakMap<
  MongoSessionClient,
  SessionContext<m.ClientSession>
>();
const transactionSupportCache = new WeakMap<MongoSessionClient, Promise<boolean>>();

/**
 * Gets or creates the session context shared by every gateway of a client
 *
 * @example
 * ```typescript
 * const { getSession } = getSessionContext(client);
 *
 * await client.sessionScoped().executeOne(async () => {
 *   // Same session as the one passed to the callback
 *   const session = getSession();
 *   return await users.findOne({ name: "Alice" }, { session });
 * }, endSession);
 * ```
 */
export function getSessionContext(
  client: MongoSessionClient,
): SessionContext<m.ClientSession> {
  let context = sessionContextMap.get(client);
  if (!context) {
    context = createSessionContext<m.ClientSession>();
    sessionContextMap.set(client, context);
  }
  return context;
}

/**
 * Checks if MongoDB transactions are enabled on the current deployment
 *
 * Uses the `hello` and `serverStatus` administrative commands: transactions
 * need a replica set or a sharded cluster. When those commands are refused,
 * falls back to running a throwaway transaction.
 *
 * The check runs once per client; concurrent callers share it.
 *
 * @internal
 */
export function checkTransactionEnabled(
  mongoClient: MongoSessionClient,
  mongoDb: Pick<m.Db, "command" | "collection">,
  logger: Logger = getRuntimeLogger(),
): Promise<boolean> {
  let check = transactionSupportCache.get(mongoClient);
  if (!check) {
    check = detectTransactionSupport(mongoClient, mongoDb, logger);
    // A failed check is retried by the next caller
    check.catch(() => transactionSupportCache.delete(mongoClient));
    transactionSupportCache.set(mongoClient, check);
  }
  return check;
}

async function detectTransactionSupport(
  mongoClient: MongoSessionClient,
  mongoDb: Pick<m.Db, "command" | "collection">,
  logger: Logger,
): Promise<boolean> {
  try {
    const helloResult = await mongoDb.command({ hello: 1 });

    // Replica set members report setName, mongos reports isdbgrid
    if (helloResult.setName || helloResult.msg === "isdbgrid") {
      return true;
    }

    const serverStatus = await mongoDb.command({ serverStatus: 1 });
    const isReplicaSet = Boolean(serverStatus.repl?.setName);
    const isMongos = serverStatus.process === "mongos";

    return isReplicaSet || isMongos;
  } catch (error) {
    logger.warn(
      "Unable to check transaction support via administrative commands, falling back to test transaction:",
      error,
    );
  }

  const session = mongoClient.startSession();
  const probe = mongoDb.collection(`transaction_test_${randomUUID()}`);
  try {
    session.startTransaction();
    await probe.insertOne({ test: true }, { session });
    await probe.deleteOne({ test: true }, { session });
    await session.commitTransaction();
    return true;
  } catch (error) {
    logger.debug("Test transaction failed, transactions are disabled", error);
    if (session.inTransaction()) {
      await session.abortTransaction();
    }
    return false;
  } finally {
    await session.endSession();
    await probe.drop().catch((error: unknown) => {
      logger.debug("Could not drop transaction probe collection", error);
    });
  }
}
