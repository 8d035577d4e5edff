import { Redis } from "ioredis";
import type { Logger } from "pino";
import type { Envelope, TaskKind, WorkerId } from "../contracts.js";
import { ConnectionError, StateError, describeError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { decodePubSubMessage } from "./envelope-codec.js";
import { Inbox } from "./inbox.js";
import type { BrokerClient, BrokerClientOptions, ConsumeOptions } from "./types.js";

/** The subscriber-side slice of an ioredis connection. */
export interface PubSubSession {
  connect(): Promise<void>;
  subscribe(...channels: string[]): Promise<unknown>;
  unsubscribe(...channels: string[]): Promise<unknown>;
  quit(): Promise<unknown>;
  on(event: "message", listener: (channel: string, message: string) => void): unknown;
  on(event: "error" | "end", listener: (err?: unknown) => void): unknown;
}

export type PubSubConnector = (url: string) => PubSubSession;

const defaultConnector: PubSubConnector = (url) =>
  new Redis(url, {
    lazyConnect: true,
    // A dropped session ends the streams; the engine decides what happens next.
    retryStrategy: () => null,
    maxRetriesPerRequest: 1,
  });

export const DEFAULT_NAMESPACE = "tasks";

export function channelsFor(namespace: string, kind: TaskKind, workerId: WorkerId): string[] {
  return [`${namespace}.${kind}`, `${namespace}.${kind}.${workerId}`];
}

type Subscription = {
  kind: TaskKind;
  channels: string[];
  inbox: Inbox<Envelope>;
};

/**
 * Publish/subscribe backend over Redis. No acknowledgements: a message
 * published while nothing is subscribed is gone, and deliveries that arrive
 * while a handler runs wait in process memory.
 */
export class PubSubBrokerClient implements BrokerClient {
  readonly backend = "pubsub" as const;
  private session: PubSubSession | null = null;
  private closed = false;
  private readonly namespace: string;
  private readonly subscriptions = new Set<Subscription>();
  private readonly channelRefs = new Map<string, number>();
  private readonly logger: Logger;

  constructor(
    private readonly url: string,
    readonly workerId: WorkerId,
    private readonly options: BrokerClientOptions & { connector?: PubSubConnector } = {}
  ) {
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
    this.logger = (options.logger ?? silentLogger()).child({ broker: "pubsub", workerId });
  }

  async connect(): Promise<void> {
    if (this.closed) throw new StateError("broker_closed", "pubsub client already disconnected");
    if (this.session) return;

    const session = (this.options.connector ?? defaultConnector)(this.url);
    session.on("error", (err) => {
      this.logger.error({ err }, "pubsub session error");
    });
    try {
      await session.connect();
    } catch (err) {
      throw new ConnectionError(
        "broker_unreachable",
        `pubsub connect failed: ${describeError(err)}`,
        { cause: err }
      );
    }

    session.on("message", (channel, message) => this.route(channel, message));
    session.on("end", () => {
      if (this.closed) return;
      this.logger.warn("pubsub session ended");
      const dropped = new ConnectionError("broker_connection_closed", "pubsub session ended");
      for (const sub of this.subscriptions) sub.inbox.fail(dropped);
    });

    this.session = session;
    this.logger.info({ namespace: this.namespace }, "pubsub session opened");
  }

  consume(kind: TaskKind, options: ConsumeOptions = {}): AsyncIterable<Envelope> {
    return this.stream(kind, options.signal);
  }

  async disconnect(): Promise<void> {
    const session = this.session;
    this.closed = true;
    this.session = null;
    if (!session) return;

    for (const sub of this.subscriptions) sub.inbox.close();
    this.subscriptions.clear();

    const channels = [...this.channelRefs.keys()];
    this.channelRefs.clear();
    if (channels.length > 0) {
      await this.bestEffort("unsubscribe", () => session.unsubscribe(...channels));
    }
    await this.bestEffort("quit", () => session.quit());
    this.logger.info("pubsub session closed");
  }

  // ── Private helpers ───────────────────────────────────────────────────────

  private route(channel: string, message: string): void {
    for (const sub of this.subscriptions) {
      if (!sub.channels.includes(channel)) continue;
      const decoded = decodePubSubMessage(message, sub.kind);
      if (!decoded.ok) {
        this.logger.warn({ channel, error: decoded.error }, "dropping undecodable message");
        continue;
      }
      sub.inbox.push(decoded.value);
    }
  }

  private async *stream(kind: TaskKind, signal?: AbortSignal): AsyncGenerator<Envelope> {
    const session = this.session;
    if (!session) throw new StateError("broker_not_connected", "pubsub client is not connected");

    const sub: Subscription = {
      kind,
      channels: channelsFor(this.namespace, kind, this.workerId),
      inbox: new Inbox<Envelope>(),
    };
    this.subscriptions.add(sub);
    try {
      await this.retain(session, sub.channels);
    } catch (err) {
      this.subscriptions.delete(sub);
      throw err;
    }

    try {
      for (;;) {
        const next = await sub.inbox.take(signal);
        if (next.done) return;
        yield next.value;
      }
    } finally {
      if (this.subscriptions.delete(sub)) await this.release(session, sub.channels);
    }
  }

  private async retain(session: PubSubSession, channels: string[]): Promise<void> {
    const fresh = channels.filter((c) => !this.channelRefs.has(c));
    for (const c of channels) this.channelRefs.set(c, (this.channelRefs.get(c) ?? 0) + 1);
    if (fresh.length === 0) return;
    try {
      await session.subscribe(...fresh);
    } catch (err) {
      this.dropRefs(channels);
      throw new ConnectionError(
        "broker_subscribe_failed",
        `pubsub subscribe failed: ${describeError(err)}`,
        { cause: err }
      );
    }
    this.logger.debug({ channels: fresh }, "pubsub subscribed");
  }

  private async release(session: PubSubSession, channels: string[]): Promise<void> {
    const idle = this.dropRefs(channels);
    if (idle.length > 0 && !this.closed) {
      await this.bestEffort("unsubscribe", () => session.unsubscribe(...idle));
    }
  }

  private dropRefs(channels: string[]): string[] {
    const idle: string[] = [];
    for (const c of channels) {
      const count = (this.channelRefs.get(c) ?? 0) - 1;
      if (count > 0) {
        this.channelRefs.set(c, count);
      } else {
        this.channelRefs.delete(c);
        idle.push(c);
      }
    }
    return idle;
  }

  private async bestEffort(action: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn({ err, action }, "pubsub teardown step failed");
    }
  }
}
