import type { WorkerId } from "../contracts.js";
import { ConfigurationError } from "../errors.js";
import { AmqpBrokerClient } from "./amqp-broker.js";
import { PubSubBrokerClient } from "./pubsub-broker.js";
import type { BrokerBackend, BrokerClient, BrokerClientOptions, BrokerFactory } from "./types.js";

const SCHEMES: Record<string, BrokerBackend> = {
  "amqp:": "amqp",
  "amqps:": "amqp",
  "redis:": "pubsub",
  "rediss:": "pubsub",
};

/** Pure: decides the backend from the URL scheme, never touches the network. */
export function selectBrokerBackend(url: string): BrokerBackend {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError("invalid_broker_url", `broker URL is not a valid URL: ${redact(url)}`);
  }

  const backend = SCHEMES[parsed.protocol];
  if (!backend) {
    throw new ConfigurationError(
      "unsupported_broker_scheme",
      `unsupported broker URL scheme "${parsed.protocol.replace(/:$/, "")}"`
    );
  }
  return backend;
}

export function createBrokerClient(
  url: string,
  workerId: WorkerId,
  options: BrokerClientOptions = {}
): BrokerClient {
  switch (selectBrokerBackend(url)) {
    case "amqp":
      return new AmqpBrokerClient(url, workerId, options);
    case "pubsub":
      return new PubSubBrokerClient(url, workerId, options);
    default:
      throw new ConfigurationError("unsupported_broker_scheme", "no network backend for this URL");
  }
}

export const defaultBrokerFactory: BrokerFactory = ({ url, workerId, options }) =>
  createBrokerClient(url, workerId, options);

/** Strips credentials so URLs can be logged. */
export function redact(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) parsed.password = "***";
    return parsed.toString();
  } catch {
    return url.replace(/\/\/[^@/]*@/, "//***@");
  }
}
