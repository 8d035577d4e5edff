import { z } from "zod";
import type {
  Outcome,
  TaskKind,
  TaskRecord,
  TaskStatus,
  WorkerId,
} from "../contracts.js";
import { TASK_STATUSES } from "../contracts.js";
import { jsonValueSchema } from "../broker/envelope-codec.js";
import { ConnectionError, RpcError, describeError } from "../errors.js";

/** What the engine needs from the coordinator. */
export interface CoordinatorClient {
  registerWorker(name: string, kinds: readonly TaskKind[]): Promise<WorkerId>;
  unregisterWorker(id: WorkerId): Promise<void>;
  reportStatus(taskId: string, status: TaskStatus): Promise<void>;
  reportResult(taskId: string, outcome: Outcome): Promise<void>;
  getTask(taskId: string): Promise<TaskRecord>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export const WORKER_PATH = "/workers";
export const TASK_PATH = "/tasks";
const DEFAULT_TIMEOUT_MS = 10_000;

const registerResponseSchema = z.union([
  z.string().min(1),
  z.object({ id: z.string().min(1) }).passthrough(),
]);

const statusSchema = z
  .string()
  .transform((s) => s.toLowerCase())
  .pipe(z.enum(TASK_STATUSES));

const taskKindSchema = z.union([z.string(), z.object({ name: z.string() }).passthrough()]);

const taskInstanceSchema = z
  .object({
    id: z.string(),
    task_kind: taskKindSchema,
    input_data: jsonValueSchema.nullish(),
    status: statusSchema,
    created_at: z.string().optional(),
    assigned_to: z.string().nullish(),
    result: z
      .object({
        output_data: jsonValueSchema.nullish(),
        error_data: jsonValueSchema.nullish(),
        worker_id: z.string().optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

/**
 * JSON-over-HTTP client for the coordinator's worker and task endpoints.
 * Transport failures surface as `ConnectionError`, non-2xx as `RpcError`.
 */
export class HttpCoordinatorClient implements CoordinatorClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: { baseUrl: string; timeoutMs?: number; fetch?: FetchLike }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async registerWorker(name: string, kinds: readonly TaskKind[]): Promise<WorkerId> {
    const body = await this.request("POST", WORKER_PATH, { name, task_kinds: [...kinds] });
    const parsed = registerResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RpcError("malformed_response", "register response carries no worker id", {
        status: 200,
        body: JSON.stringify(body),
      });
    }
    return typeof parsed.data === "string" ? parsed.data : parsed.data.id;
  }

  async unregisterWorker(id: WorkerId): Promise<void> {
    await this.request("DELETE", `${WORKER_PATH}/${encodeURIComponent(id)}`);
  }

  async reportStatus(taskId: string, status: TaskStatus): Promise<void> {
    await this.request("PUT", `${TASK_PATH}/${encodeURIComponent(taskId)}/status`, status);
  }

  async reportResult(taskId: string, outcome: Outcome): Promise<void> {
    const body = outcome.ok
      ? { data: outcome.output, is_error: false }
      : { data: outcome.error, is_error: true };
    await this.request("PUT", `${TASK_PATH}/${encodeURIComponent(taskId)}/result`, body);
  }

  async getTask(taskId: string): Promise<TaskRecord> {
    const body = await this.request("GET", `${TASK_PATH}/${encodeURIComponent(taskId)}`);
    const parsed = taskInstanceSchema.safeParse(body);
    if (!parsed.success) {
      throw new RpcError("malformed_response", `task ${taskId} response is not a task`, {
        status: 200,
        body: JSON.stringify(body),
      });
    }
    const t = parsed.data;
    return {
      id: t.id,
      kind: typeof t.task_kind === "string" ? t.task_kind : t.task_kind.name,
      input: t.input_data ?? null,
      status: t.status,
      assignedTo: t.assigned_to ?? null,
      createdAt: t.created_at,
      result: t.result
        ? {
            output: t.result.output_data ?? undefined,
            error: t.result.error_data ?? undefined,
            workerId: t.result.worker_id,
          }
        : null,
    };
  }

  // ── Private helpers ───────────────────────────────────────────────────────

  private async request(method: string, path: string, payload?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const init: RequestInit = {
      method,
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (payload !== undefined) {
      init.headers = { accept: "application/json", "content-type": "application/json" };
      init.body = JSON.stringify(payload);
    }

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(url, init);
      text = await res.text();
    } catch (err) {
      throw new ConnectionError(
        "coordinator_unreachable",
        `${method} ${path} failed: ${describeError(err)}`,
        { cause: err }
      );
    }

    if (!res.ok) {
      throw new RpcError("coordinator_http_error", `HTTP ${res.status} ${res.statusText}: ${text}`, {
        status: res.status,
        body: text,
      });
    }
    if (text.length === 0) return null;
    try {
      return JSON.parse(text);
    } catch {
      // Void endpoints may answer with plain text.
      return text;
    }
  }
}
