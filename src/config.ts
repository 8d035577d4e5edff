import os from "node:os";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LevelWithSilent } from "./logger.js";

export interface WorkerNodeConfig {
  workerName: string;
  coordinatorUrl: string;
  coordinatorTimeoutMs: number;
  brokerUrl: string;
  brokerExchange?: string;
  brokerNamespace: string;
  logLevel: LevelWithSilent;
  statusPort?: number;
  reportAttempts: number;
  reportRunningStatus: boolean;
}

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  TASKLINE_WORKER_NAME: z.string().min(1).optional(),
  TASKLINE_COORDINATOR_URL: z.string().url().default("http://localhost:3000"),
  TASKLINE_COORDINATOR_TIMEOUT_MS: z.coerce.number().int().min(100).max(300_000).default(10_000),
  TASKLINE_BROKER_URL: z.string().min(1).default("amqp://localhost:5672"),
  TASKLINE_BROKER_EXCHANGE: z.string().min(1).optional(),
  TASKLINE_BROKER_NAMESPACE: z.string().min(1).default("tasks"),
  TASKLINE_LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  TASKLINE_STATUS_PORT: z.coerce.number().int().min(0).max(65_535).optional(),
  TASKLINE_REPORT_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  TASKLINE_REPORT_RUNNING: flag.default("false"),
});

/**
 * Reads worker settings from `TASKLINE_*` environment variables.
 * Empty strings count as unset.
 */
export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerNodeConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("TASKLINE_") && value !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError("invalid_config", `invalid worker configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    workerName: e.TASKLINE_WORKER_NAME ?? `worker-${os.hostname()}`,
    coordinatorUrl: e.TASKLINE_COORDINATOR_URL.replace(/\/+$/, ""),
    coordinatorTimeoutMs: e.TASKLINE_COORDINATOR_TIMEOUT_MS,
    brokerUrl: e.TASKLINE_BROKER_URL,
    brokerExchange: e.TASKLINE_BROKER_EXCHANGE,
    brokerNamespace: e.TASKLINE_BROKER_NAMESPACE,
    logLevel: e.TASKLINE_LOG_LEVEL,
    statusPort: e.TASKLINE_STATUS_PORT,
    reportAttempts: e.TASKLINE_REPORT_ATTEMPTS,
    reportRunningStatus: e.TASKLINE_REPORT_RUNNING,
  };
}
