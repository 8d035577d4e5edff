#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import type { Logger } from "pino";
import type { BrokerFactory } from "./broker/types.js";
import { loadWorkerConfig, type WorkerNodeConfig } from "./config.js";
import type { TaskHandler } from "./contracts.js";
import { HttpCoordinatorClient, type CoordinatorClient } from "./coordinator/client.js";
import { createLogger } from "./logger.js";
import { createTelemetryPlugin } from "./plugins/telemetry-plugin.js";
import { buildStatusServer } from "./status-server.js";
import { WorkerEngine } from "./worker/engine.js";

/** Demo handler: returns its input unchanged. */
export const echo: TaskHandler = (input) => input;

export function createWorkerNode(
  config: WorkerNodeConfig,
  overrides: { logger?: Logger; coordinator?: CoordinatorClient; brokerFactory?: BrokerFactory } = {}
) {
  const logger = overrides.logger ?? createLogger({ name: config.workerName, level: config.logLevel });
  const telemetry = createTelemetryPlugin();
  const coordinator =
    overrides.coordinator ??
    new HttpCoordinatorClient({ baseUrl: config.coordinatorUrl, timeoutMs: config.coordinatorTimeoutMs });

  const engine = new WorkerEngine({
    name: config.workerName,
    brokerUrl: config.brokerUrl,
    coordinator,
    logger,
    plugins: [telemetry],
    brokerFactory: overrides.brokerFactory,
    brokerOptions: { exchange: config.brokerExchange, namespace: config.brokerNamespace },
    reportRunningStatus: config.reportRunningStatus,
    reportRetry: { maxAttempts: config.reportAttempts },
  }).registerTask("echo", echo);

  return { engine, telemetry, logger };
}

async function main() {
  const config = loadWorkerConfig();
  const { engine, telemetry, logger } = createWorkerNode(config);

  const controller = new AbortController();
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "shutdown signal received");
      controller.abort();
    });
  }

  const port = config.statusPort;
  const status = port === undefined ? null : buildStatusServer(engine, telemetry, { logger });
  if (status && port !== undefined) {
    await status.listen({ port, host: "0.0.0.0" });
  }

  try {
    await engine.run(controller.signal);
  } finally {
    await status?.close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    createLogger({ name: "worker-node" }).fatal({ err }, "worker node failed");
    process.exitCode = 1;
  });
}
