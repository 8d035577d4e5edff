import { z } from "zod";
import type { Envelope, JsonValue, TaskKind } from "../contracts.js";
import { describeError } from "../errors.js";

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: string };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export function decodeJson(raw: string | Buffer): DecodeResult<JsonValue> {
  const text = typeof raw === "string" ? raw : raw.toString("utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `invalid_json:${describeError(err)}` };
  }
  const checked = jsonValueSchema.safeParse(parsed);
  if (!checked.success) return { ok: false, error: "invalid_json:unsupported_value" };
  return { ok: true, value: checked.data };
}

const pubSubMessageSchema = z
  .object({
    task_id: z.string().min(1).optional(),
    id: z.string().min(1).optional(),
    task_kind: z.string().min(1).optional(),
    kind: z.string().min(1).optional(),
    input_data: jsonValueSchema.optional(),
    payload: jsonValueSchema.optional(),
  })
  .passthrough();

/**
 * Pub/sub messages carry their own routing metadata:
 * `{ "task_id": "...", "task_kind": "...", "input_data": {...} }`.
 */
export function decodePubSubMessage(raw: string, channelKind: TaskKind): DecodeResult<Envelope> {
  const json = decodeJson(raw);
  if (!json.ok) return json;

  const parsed = pubSubMessageSchema.safeParse(json.value);
  if (!parsed.success) return { ok: false, error: "invalid_message:not_an_object" };

  const msg = parsed.data;
  const taskId = msg.task_id ?? msg.id;
  if (!taskId) return { ok: false, error: "invalid_message:missing_task_id" };

  return {
    ok: true,
    value: {
      taskId,
      kind: msg.task_kind ?? msg.kind ?? channelKind,
      payload: msg.input_data ?? msg.payload ?? null,
    },
  };
}

export interface AmqpDeliveryMeta {
  messageId?: unknown;
  headers?: Record<string, unknown>;
}

function headerString(value: unknown): string | undefined {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number") return String(value);
  if (Buffer.isBuffer(value) && value.length > 0) return value.toString("utf8");
  return undefined;
}

/**
 * AMQP bodies are the bare task input. The task id rides in the `task_id`
 * header or the `messageId` property; the kind in the `task_kind` header.
 */
export function decodeAmqpDelivery(
  content: Buffer,
  meta: AmqpDeliveryMeta,
  queueKind: TaskKind
): DecodeResult<Envelope> {
  const headers = meta.headers ?? {};
  const taskId = headerString(headers["task_id"]) ?? headerString(meta.messageId);
  if (!taskId) return { ok: false, error: "invalid_message:missing_task_id" };

  const kind = headerString(headers["task_kind"]) ?? queueKind;
  const payload = content.length === 0 ? { ok: true as const, value: null } : decodeJson(content);
  if (!payload.ok) {
    // With a task id the failure is still reported for that task.
    return { ok: true, value: { taskId, kind, payload: null, decodeError: payload.error } };
  }

  return { ok: true, value: { taskId, kind, payload: payload.value } };
}
