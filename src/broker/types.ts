import type { Logger } from "pino";
import type { Envelope, TaskKind, WorkerId } from "../contracts.js";

export type BrokerBackend = "amqp" | "pubsub" | "memory";

export interface ConsumeOptions {
  /** Aborting ends the stream cleanly, even while it waits for a delivery. */
  signal?: AbortSignal;
}

/**
 * Transport mechanics for one worker. Owns no dispatch policy.
 *
 * `consume` pulls lazily: the previous delivery is acknowledged and the next
 * one fetched only when the caller asks for the next element.
 */
export interface BrokerClient {
  readonly backend: BrokerBackend;
  readonly workerId: WorkerId;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  consume(kind: TaskKind, options?: ConsumeOptions): AsyncIterable<Envelope>;
}

export interface BrokerClientOptions {
  logger?: Logger;
  /** AMQP: exchange declared on connect and removed on disconnect. */
  exchange?: string;
  /** Pub/sub: channel prefix. */
  namespace?: string;
}

export interface BrokerFactoryContext {
  url: string;
  workerId: WorkerId;
  kinds: readonly TaskKind[];
  options: BrokerClientOptions;
}

export type BrokerFactory = (context: BrokerFactoryContext) => BrokerClient;
