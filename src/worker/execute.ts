import { failure, success } from "../contracts.js";
import type { Outcome, TaskContext, TaskHandler, TaskInput, TaskKind } from "../contracts.js";
import { decodeJson } from "../broker/envelope-codec.js";
import { StateError, describeError } from "../errors.js";
import type { TaskRegistry } from "./registry.js";

const NOT_SERIALISABLE = "handler output is not serialisable";

/** Outputs are reported as the JSON the coordinator will store. */
function toJsonOutcome(output: unknown): Outcome {
  let text: string | undefined;
  try {
    text = JSON.stringify(output === undefined ? null : output);
  } catch (err) {
    return failure(`${NOT_SERIALISABLE}: ${describeError(err)}`);
  }
  if (text === undefined) return failure(`${NOT_SERIALISABLE}: no JSON representation`);
  const decoded = decodeJson(text);
  return decoded.ok ? success(decoded.value) : failure(`${NOT_SERIALISABLE}: ${decoded.error}`);
}

/**
 * The only place handler code runs. Whatever the handler throws or rejects
 * with, or an output with no JSON form, comes back as a failure outcome.
 */
export async function runHandler(
  handler: TaskHandler,
  input: TaskInput,
  context: TaskContext
): Promise<Outcome> {
  let output: unknown;
  try {
    output = await handler(input, context);
  } catch (err) {
    return failure(describeError(err));
  }
  return toJsonOutcome(output);
}

/** Looks up the handler for `kind`; an unknown kind is a `StateError`, not an outcome. */
export async function execute(
  registry: TaskRegistry,
  kind: TaskKind,
  payload: TaskInput,
  context: TaskContext
): Promise<Outcome> {
  const handler = registry.get(kind);
  if (!handler) {
    throw new StateError("unknown_task_kind", `no handler registered for task kind "${kind}"`);
  }
  return runHandler(handler, payload, context);
}
