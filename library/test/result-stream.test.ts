import { test } from "node:test";
import assert from "node:assert";
import { raceAbort, ResultStream, toAsyncIterable } from "../src/result-stream.ts";
import { CardinalityViolationError } from "../src/errors.ts";
import { trackedValues } from "./+shared.ts";

function streamOf<T>(values: T[]) {
  const runs: { closed: boolean; pulled: number }[] = [];
  const stream = new ResultStream<T>(() => {
    const { iterable, state } = trackedValues(values);
    runs.push(state);
    return iterable;
  });
  return { stream, runs };
}

test("ResultStream: toArray collects every value", async () => {
  const { stream } = streamOf(["a", "b"]);
  assert.deepStrictEqual(await stream.toArray(), ["a", "b"]);
});

test("ResultStream: each iteration subscribes again", async () => {
  const { stream, runs } = streamOf([1]);
  await stream.toArray();
  await stream.toArray();
  assert.strictEqual(runs.length, 2);
});

test("ResultStream: single resolves zero or one value", async () => {
  assert.strictEqual(await streamOf<number>([]).stream.single(), undefined);
  assert.strictEqual(await streamOf([7]).stream.single(), 7);
});

test("ResultStream: single rejects a second value and closes the source", async () => {
  const { stream, runs } = streamOf([1, 2, 3]);
  await assert.rejects(stream.single(), (error) => {
    assert.ok(error instanceof CardinalityViolationError);
    assert.strictEqual(
      error.message,
      "Expected at most 1 value but the unit of work produced more",
    );
    return true;
  });
  assert.deepStrictEqual(runs[0], { closed: true, pulled: 2 });
});

test("ResultStream: first takes one value and cancels the rest", async () => {
  const { stream, runs } = streamOf(["x", "y", "z"]);
  assert.strictEqual(await stream.first(), "x");
  assert.deepStrictEqual(runs[0], { closed: true, pulled: 1 });
  assert.strictEqual(await streamOf<string>([]).stream.first(), undefined);
});

test("toAsyncIterable: promises yield at most one value", async () => {
  const collect = async <T>(iterable: AsyncIterable<T>) => {
    const values: T[] = [];
    for await (const value of iterable) values.push(value);
    return values;
  };

  assert.deepStrictEqual(await collect(toAsyncIterable(Promise.resolve(0))), [0]);
  assert.deepStrictEqual(await collect(toAsyncIterable(Promise.resolve(null))), []);
  assert.deepStrictEqual(
    await collect(toAsyncIterable(Promise.resolve(undefined))),
    [],
  );

  const { iterable } = trackedValues([1, 2]);
  assert.strictEqual(toAsyncIterable(iterable), iterable);
});

test("raceAbort: settles with the promise when not aborted", async () => {
  const controller = new AbortController();
  assert.strictEqual(await raceAbort(Promise.resolve("done"), controller.signal), "done");
  assert.strictEqual(await raceAbort(Promise.resolve("plain")), "plain");
  await assert.rejects(
    raceAbort(Promise.reject(new Error("failed")), controller.signal),
    { message: "failed" },
  );
});

test("raceAbort: rejects with the abort reason", async () => {
  const controller = new AbortController();
  const reason = new Error("aborted");

  const raced = raceAbort(new Promise<never>(() => {}), controller.signal);
  controller.abort(reason);
  await assert.rejects(raced, (error) => error === reason);

  await assert.rejects(
    raceAbort(Promise.resolve(1), controller.signal),
    (error) => error === reason,
  );
});
