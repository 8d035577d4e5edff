export * from "./contracts.js";
export * from "./errors.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LevelWithSilent } from "./logger.js";
export { loadWorkerConfig } from "./config.js";
export type { WorkerNodeConfig } from "./config.js";

export type {
  BrokerBackend,
  BrokerClient,
  BrokerClientOptions,
  BrokerFactory,
  BrokerFactoryContext,
  ConsumeOptions,
} from "./broker/types.js";
export { createBrokerClient, defaultBrokerFactory, selectBrokerBackend } from "./broker/factory.js";
export { AmqpBrokerClient, queueNameFor } from "./broker/amqp-broker.js";
export { PubSubBrokerClient, channelsFor } from "./broker/pubsub-broker.js";
export { InMemoryBroker } from "./broker/memory-broker.js";

export { HttpCoordinatorClient } from "./coordinator/client.js";
export type { CoordinatorClient, FetchLike } from "./coordinator/client.js";

export { WorkerEngine } from "./worker/engine.js";
export type { WorkerEngineOptions } from "./worker/engine.js";
export type { ReportRetryOptions } from "./control/retry-policy.js";

export { createTelemetryPlugin } from "./plugins/telemetry-plugin.js";
export type { TelemetryPlugin, TelemetrySnapshot } from "./plugins/telemetry-plugin.js";
export type { WorkerEvent, WorkerEventType, WorkerPlugin, WorkerPluginContext } from "./plugins/types.js";
export { buildStatusServer } from "./status-server.js";
export type { StatusServer, WorkerStatusSource } from "./status-server.js";
