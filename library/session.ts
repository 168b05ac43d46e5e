/**
 * Session context module
 *
 * Gives access to the session bound to the running unit of work from code
 * that does not receive it as an argument.
 *
 * @module
 * @example
 * ```typescript
 * import { getSessionContext } from "mongo-session-scoped/session";
 *
 * const { getSession } = getSessionContext(client);
 *
 * async function insertAudit(entry: AuditEntry) {
 *   // Joins the caller's transaction when there is one
 *   await audit.insertOne(entry, { session: getSession() });
 * }
 * ```
 */

export {
  checkTransactionEnabled,
  createSessionContext,
  getSessionContext,
  type MongoSessionClient,
  type SessionContext,
} from "./src/session.ts";
