/**
 * mongo-session-scoped
 *
 * Runs units of work bound to a MongoDB client session. The finalizer given
 * with a unit of work always runs exactly once, whatever the outcome, and the
 * unit of work's values and errors reach the caller unchanged.
 *
 * @module
 * @example
 * ```typescript
 * import { endSession, MongoClient } from "mongo-session-scoped";
 *
 * const client = new MongoClient("mongodb://localhost:27017");
 * const users = client.db("app").collection("users");
 *
 * // Zero or more values
 * for await (const user of client.sessionScoped().executeMany(
 *   (session) => users.find({ active: true }, { session }),
 *   endSession,
 * )) {
 *   console.log(user.name);
 * }
 *
 * // At most one value, inside a transaction
 * const alice = await client.inTransaction().executeOne(
 *   (session) => users.findOne({ name: "Alice" }, { session }),
 *   endSession,
 * );
 * ```
 */

export * from "./src/session-scoped.ts";
export * from "./src/result-stream.ts";
export * from "./src/transaction.ts";
export * from "./src/mongodb.ts";
export * from "./src/errors.ts";
export * from "./src/config.ts";
export * from "./src/runtime-config.ts";
export type { Logger, LogLevel } from "./src/logger.ts";
export { createConsoleLogger } from "./src/logger.ts";
export type { EventSubscriber } from "./src/events.ts";
