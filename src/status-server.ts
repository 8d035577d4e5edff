import Fastify from "fastify";
import type { Logger } from "pino";
import type { TaskKind, WorkerId, WorkerState } from "./contracts.js";
import { silentLogger } from "./logger.js";
import type { TelemetryPlugin } from "./plugins/telemetry-plugin.js";
import type { WorkerEventType } from "./plugins/types.js";

/** The slice of `WorkerEngine` the status endpoints read. */
export interface WorkerStatusSource {
  readonly name: string;
  readonly state: WorkerState;
  readonly workerId: WorkerId | null;
  readonly kinds: readonly TaskKind[];
}

const COUNTERS: ReadonlyArray<{ metric: string; help: string; event: WorkerEventType }> = [
  { metric: "tasks_received_total", help: "Envelopes delivered to a handler", event: "task.received" },
  { metric: "tasks_succeeded_total", help: "Handlers that returned a result", event: "task.succeeded" },
  { metric: "tasks_failed_total", help: "Handlers that threw or had no registration", event: "task.failed" },
  { metric: "reports_failed_total", help: "Outcomes the coordinator never accepted", event: "task.report_failed" },
  { metric: "loops_exited_total", help: "Consumption loops that ended", event: "loop.exited" },
  { metric: "loops_failed_total", help: "Consumption loops ended by a broker error", event: "loop.failed" },
];

const PER_KIND: ReadonlyArray<WorkerEventType> = ["task.succeeded", "task.failed"];

/** Label values in the exposition format escape backslash, double quote and newline. */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function renderMetrics(source: WorkerStatusSource, counters: Record<string, number>): string {
  const lines: string[] = [
    "# HELP taskline_worker_up Whether the worker is registered and consuming",
    "# TYPE taskline_worker_up gauge",
    `taskline_worker_up ${source.state === "active" ? 1 : 0}`,
    "# HELP taskline_worker_kinds Task kinds this worker serves",
    "# TYPE taskline_worker_kinds gauge",
    `taskline_worker_kinds ${source.kinds.length}`,
  ];

  for (const { metric, help, event } of COUNTERS) {
    lines.push(
      `# HELP taskline_worker_${metric} ${help}`,
      `# TYPE taskline_worker_${metric} counter`,
      `taskline_worker_${metric} ${counters[`event.${event}`] ?? 0}`
    );
  }

  lines.push(
    "# HELP taskline_worker_task_outcomes_total Outcomes per task kind",
    "# TYPE taskline_worker_task_outcomes_total counter"
  );
  for (const kind of source.kinds) {
    for (const event of PER_KIND) {
      const outcome = event === "task.succeeded" ? "success" : "failure";
      lines.push(
        `taskline_worker_task_outcomes_total{kind="${escapeLabelValue(kind)}",outcome="${outcome}"} ${counters[`kind.${kind}.${event}`] ?? 0}`
      );
    }
  }

  lines.push("");
  return lines.join("\n");
}

export function buildStatusServer(
  source: WorkerStatusSource,
  telemetry: TelemetryPlugin,
  options: { logger?: Logger } = {}
) {
  const app = Fastify({ loggerInstance: options.logger ?? silentLogger() });

  app.get("/health", async (_req, reply) => {
    const ok = source.state === "active";
    return reply.code(ok ? 200 : 503).send({
      ok,
      name: source.name,
      state: source.state,
      workerId: source.workerId,
      kinds: source.kinds,
    });
  });

  app.get("/metrics", async (_req, reply) => {
    reply.header("content-type", "text/plain; version=0.0.4; charset=utf-8");
    return reply.send(renderMetrics(source, telemetry.snapshot().counters));
  });

  app.get<{ Querystring: { limit?: string } }>("/v1/events", async (req) => {
    const { events } = telemetry.snapshot();
    const limit = Number(req.query.limit ?? events.length);
    const count = Number.isFinite(limit) && limit >= 0 ? Math.floor(limit) : events.length;
    return { events: count === 0 ? [] : events.slice(-count) };
  });

  return app;
}

export type StatusServer = ReturnType<typeof buildStatusServer>;
