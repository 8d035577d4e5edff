import test from "node:test";
import assert from "node:assert/strict";
import type { JsonValue, TaskContext } from "../contracts.js";
import { StateError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { execute, runHandler } from "./execute.js";
import { TaskRegistry } from "./registry.js";

const context: TaskContext = { taskId: "t1", kind: "echo", workerId: "w-1", logger: silentLogger() };

test("a returning handler is a success outcome", async () => {
  assert.deepEqual(await runHandler((input) => input, { x: 1 }, context), { ok: true, output: { x: 1 } });
});

test("an async handler is awaited and undefined becomes null", async () => {
  const outcome = await runHandler(async () => undefined, null, context);
  assert.deepEqual(outcome, { ok: true, output: null });
});

test("thrown errors and rejections become failure outcomes", async () => {
  assert.deepEqual(
    await runHandler(() => {
      throw new Error("bad input");
    }, null, context),
    { ok: false, error: "bad input" }
  );
  assert.deepEqual(await runHandler(() => Promise.reject("plain string"), null, context), {
    ok: false,
    error: "plain string",
  });
  assert.deepEqual(
    await runHandler(() => {
      throw { reason: "quota" };
    }, null, context),
    { ok: false, error: '{"reason":"quota"}' }
  );
});

test("an output with no JSON form is a failure outcome", async () => {
  const out: { [key: string]: JsonValue } = {};
  out.self = out;
  const outcome = await runHandler(() => out, null, context);
  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.ok(outcome.error.startsWith("handler output is not serialisable: Converting circular structure to JSON"));
  }
});

test("the handler receives the task context", async () => {
  let seen: TaskContext | undefined;
  await runHandler((_input, ctx) => {
    seen = ctx;
    return null;
  }, null, context);
  assert.equal(seen?.taskId, "t1");
  assert.equal(seen?.workerId, "w-1");
});

test("execute looks up the handler by kind", async () => {
  const registry = new TaskRegistry();
  registry.register("double", (input) => (typeof input === "number" ? input * 2 : null));
  assert.deepEqual(await execute(registry, "double", 21, context), { ok: true, output: 42 });
});

test("execute rejects an unknown kind with a state error", async () => {
  await assert.rejects(
    execute(new TaskRegistry(), "missing", null, context),
    (err: unknown) =>
      err instanceof StateError &&
      err.code === "unknown_task_kind" &&
      err.message === 'no handler registered for task kind "missing"'
  );
});
