import type { Logger } from "pino";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type WorkerId = string;
export type TaskKind = string;
export type TaskInput = JsonValue;
export type TaskOutput = JsonValue;

export const TASK_STATUSES = [
  "pending",
  "queued",
  "running",
  "completed",
  "failed",
  "cancelled",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type WorkerState = "unregistered" | "registering" | "active" | "draining" | "closed";

/** One unit of work pulled from a broker stream. */
export interface Envelope {
  taskId: string;
  kind: TaskKind;
  payload: TaskInput;
  /** Set when the body could not be decoded; the envelope is reported as failed without running a handler. */
  decodeError?: string;
}

export type Outcome = { ok: true; output: TaskOutput } | { ok: false; error: string };

export interface TaskContext {
  taskId: string;
  kind: TaskKind;
  /** Null when the handler runs outside a registered worker run. */
  workerId: WorkerId | null;
  logger: Logger;
}

export type TaskHandler = (
  input: TaskInput,
  context: TaskContext
) => TaskOutput | Promise<TaskOutput>;

export interface TaskResultRecord {
  output?: JsonValue;
  error?: JsonValue;
  workerId?: WorkerId;
}

/** The coordinator's view of a task, as returned by `getTask`. */
export interface TaskRecord {
  id: string;
  kind: TaskKind;
  input: JsonValue;
  status: TaskStatus;
  assignedTo: WorkerId | null;
  createdAt?: string;
  result: TaskResultRecord | null;
}

export function success(output: TaskOutput): Outcome {
  return { ok: true, output };
}

export function failure(error: string): Outcome {
  return { ok: false, error };
}
