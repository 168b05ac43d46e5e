import { test } from "node:test";
import assert from "node:assert";
import type * as m from "mongodb";
import {
  checkTransactionEnabled,
  createSessionContext,
  getSessionContext,
  type MongoSessionClient,
} from "../src/session.ts";
import { delay, memoryLogger } from "./+shared.ts";

function fakeClient(): MongoSessionClient {
  return {
    startSession: () => {
      throw new Error("startSession is not expected here");
    },
  };
}

function fakeDb(replies: Record<string, m.Document>) {
  const commands: string[] = [];
  return {
    commands,
    command: async (command: m.Document) => {
      const name = Object.keys(command)[0];
      commands.push(name);
      return replies[name] ?? {};
    },
    collection: () => {
      throw new Error("collection is not expected here");
    },
  };
}

test("Session context: binds the session across awaits", async () => {
  const context = createSessionContext<string>();

  assert.strictEqual(context.getSession(), undefined);

  const seen = await context.run("session-a", async () => {
    const before = context.getSession();
    await delay(1);
    return [before, context.getSession()];
  });

  assert.deepStrictEqual(seen, ["session-a", "session-a"]);
  assert.strictEqual(context.getSession(), undefined);
});

test("Session context: nested runs restore the outer session", () => {
  const context = createSessionContext<number>();

  context.run(1, () => {
    context.run(2, () => assert.strictEqual(context.getSession(), 2));
    assert.strictEqual(context.getSession(), 1);
  });
});

test("Session context: one shared context per client", () => {
  const client = fakeClient();

  assert.strictEqual(getSessionContext(client), getSessionContext(client));
  assert.notStrictEqual(getSessionContext(client), getSessionContext(fakeClient()));
});

test("Transactions check: replica set answers hello with setName", async () => {
  const client = fakeClient();
  const db = fakeDb({ hello: { setName: "rs0" } });

  assert.strictEqual(await checkTransactionEnabled(client, db, memoryLogger()), true);
  assert.strictEqual(await checkTransactionEnabled(client, db, memoryLogger()), true);
  assert.deepStrictEqual(db.commands, ["hello"]);
});

test("Transactions check: mongos is detected through serverStatus", async () => {
  const db = fakeDb({ hello: {}, serverStatus: { process: "mongos" } });

  assert.strictEqual(
    await checkTransactionEnabled(fakeClient(), db, memoryLogger()),
    true,
  );
  assert.deepStrictEqual(db.commands, ["hello", "serverStatus"]);
});

test("Transactions check: standalone server has no transactions", async () => {
  const client = fakeClient();
  const db = fakeDb({ hello: { isWritablePrimary: true }, serverStatus: { process: "mongod" } });

  assert.strictEqual(await checkTransactionEnabled(client, db, memoryLogger()), false);
  assert.strictEqual(await checkTransactionEnabled(client, db, memoryLogger()), false);
  assert.deepStrictEqual(db.commands, ["hello", "serverStatus"]);
});

test("Transactions check: concurrent callers share one check", async () => {
  const client = fakeClient();
  const db = fakeDb({ hello: {}, serverStatus: { repl: { setName: "rs0" } } });

  const results = await Promise.all([
    checkTransactionEnabled(client, db, memoryLogger()),
    checkTransactionEnabled(client, db, memoryLogger()),
    checkTransactionEnabled(client, db, memoryLogger()),
  ]);

  assert.deepStrictEqual(results, [true, true, true]);
  assert.deepStrictEqual(db.commands, ["hello", "serverStatus"]);
});
