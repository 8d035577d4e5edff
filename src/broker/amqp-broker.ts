import { connect } from "amqplib";
import type { Options } from "amqplib";
import type { Logger } from "pino";
import type { Envelope, TaskKind, WorkerId } from "../contracts.js";
import { ConnectionError, StateError, describeError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { decodeAmqpDelivery, type AmqpDeliveryMeta } from "./envelope-codec.js";
import { Inbox } from "./inbox.js";
import type { BrokerClient, BrokerClientOptions, ConsumeOptions } from "./types.js";

// Only the slice of amqplib the client touches. amqplib's own channel and
// connection objects satisfy these structurally.

export interface AmqpDelivery {
  content: Buffer;
  fields: { deliveryTag: number; routingKey: string; exchange: string };
  properties: AmqpDeliveryMeta;
}

export interface AmqpChannelLike {
  assertExchange(
    exchange: string,
    type: string,
    options?: Options.AssertExchange
  ): Promise<unknown>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  prefetch(count: number): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (msg: AmqpDelivery | null) => void,
    options?: Options.Consume
  ): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: AmqpDelivery): void;
  nack(message: AmqpDelivery, allUpTo?: boolean, requeue?: boolean): void;
  deleteQueue(queue: string): Promise<unknown>;
  deleteExchange(exchange: string): Promise<unknown>;
  close(): Promise<void>;
  on(event: "close" | "error", listener: (err?: unknown) => void): unknown;
}

export interface AmqpConnectionLike {
  createChannel(): Promise<AmqpChannelLike>;
  close(): Promise<void>;
  on(event: "close" | "error", listener: (err?: unknown) => void): unknown;
}

export type AmqpConnector = (url: string) => Promise<AmqpConnectionLike>;

const defaultConnector: AmqpConnector = (url) => connect(url);

export function queueNameFor(workerId: WorkerId, kind: TaskKind): string {
  return `${workerId}.${kind}`;
}

type Session = {
  connection: AmqpConnectionLike;
  control: AmqpChannelLike;
  exchange?: string;
};

type Consumer = {
  channel: AmqpChannelLike;
  queue: string;
  consumerTag?: string;
  inbox: Inbox<AmqpDelivery>;
};

/**
 * Exchange/queue backend. Work for a kind arrives on the direct exchange named
 * by the kind, routed by worker id into a queue owned by this worker.
 */
export class AmqpBrokerClient implements BrokerClient {
  readonly backend = "amqp" as const;
  private session: Session | null = null;
  private connecting: Promise<Session> | null = null;
  private closed = false;
  private readonly consumers = new Set<Consumer>();
  private readonly declaredQueues = new Set<string>();
  private readonly logger: Logger;

  constructor(
    private readonly url: string,
    readonly workerId: WorkerId,
    private readonly options: BrokerClientOptions & { connector?: AmqpConnector } = {}
  ) {
    this.logger = (options.logger ?? silentLogger()).child({ broker: "amqp", workerId });
  }

  async connect(): Promise<void> {
    if (this.closed) throw new StateError("broker_closed", "amqp client already disconnected");
    if (this.session) return;
    this.connecting ??= this.openSession();
    try {
      this.session = await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  consume(kind: TaskKind, options: ConsumeOptions = {}): AsyncIterable<Envelope> {
    return this.stream(kind, options.signal);
  }

  async disconnect(): Promise<void> {
    const session = this.session;
    if (this.closed || !session) {
      this.closed = true;
      return;
    }
    this.closed = true;
    this.session = null;

    const consumers = [...this.consumers];
    this.consumers.clear();
    for (const consumer of consumers) {
      consumer.inbox.close();
      await this.releaseConsumer(consumer);
    }

    for (const queue of this.declaredQueues) {
      await this.bestEffort(`delete queue ${queue}`, () => session.control.deleteQueue(queue));
    }
    this.declaredQueues.clear();
    if (session.exchange) {
      const exchange = session.exchange;
      await this.bestEffort(`delete exchange ${exchange}`, () =>
        session.control.deleteExchange(exchange)
      );
    }

    await this.bestEffort("close control channel", () => session.control.close());
    await this.bestEffort("close connection", () => session.connection.close());
    this.logger.info("amqp session closed");
  }

  // ── Private helpers ───────────────────────────────────────────────────────

  private async openSession(): Promise<Session> {
    const connector = this.options.connector ?? defaultConnector;
    let connection: AmqpConnectionLike;
    try {
      connection = await connector(this.url);
    } catch (err) {
      throw new ConnectionError(
        "broker_unreachable",
        `amqp connect failed: ${describeError(err)}`,
        { cause: err }
      );
    }

    connection.on("error", (err) => {
      this.logger.error({ err }, "amqp connection error");
    });
    connection.on("close", () => {
      if (this.closed) return;
      this.logger.warn("amqp connection closed by peer");
      const dropped = new ConnectionError("broker_connection_closed", "amqp connection closed");
      for (const consumer of this.consumers) consumer.inbox.fail(dropped);
    });

    try {
      const control = await connection.createChannel();
      const exchange = this.options.exchange;
      if (exchange) await control.assertExchange(exchange, "direct", { durable: true });
      this.logger.info({ exchange: exchange ?? null }, "amqp session opened");
      return { connection, control, exchange };
    } catch (err) {
      await this.bestEffort("close connection", () => connection.close());
      throw new ConnectionError(
        "broker_setup_failed",
        `amqp session setup failed: ${describeError(err)}`,
        { cause: err }
      );
    }
  }

  private async openConsumer(kind: TaskKind, session: Session): Promise<Consumer> {
    const queue = queueNameFor(this.workerId, kind);
    let channel: AmqpChannelLike;
    try {
      channel = await session.connection.createChannel();
    } catch (err) {
      throw new ConnectionError("broker_channel_failed", `amqp channel failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    const consumer: Consumer = { channel, queue, inbox: new Inbox<AmqpDelivery>() };
    channel.on("error", (err) => {
      this.logger.error({ err, kind }, "amqp channel error");
    });
    channel.on("close", () => {
      consumer.inbox.fail(
        new ConnectionError("broker_channel_closed", `amqp channel for ${kind} closed`)
      );
    });

    try {
      await channel.prefetch(1);
      await channel.assertExchange(kind, "direct", { durable: true });
      await channel.assertQueue(queue, { durable: false });
      this.declaredQueues.add(queue);
      await channel.bindQueue(queue, kind, this.workerId);

      const { consumerTag } = await channel.consume(
        queue,
        (msg) => {
          if (msg === null) {
            consumer.inbox.fail(
              new ConnectionError("broker_consumer_cancelled", `amqp consumer for ${kind} cancelled`)
            );
            return;
          }
          consumer.inbox.push(msg);
        },
        { noAck: false }
      );
      consumer.consumerTag = consumerTag;
    } catch (err) {
      await this.bestEffort("close channel", () => channel.close());
      throw new ConnectionError(
        "broker_consume_failed",
        `amqp consume setup for ${kind} failed: ${describeError(err)}`,
        { cause: err }
      );
    }

    this.logger.debug({ kind, queue }, "amqp consumer started");
    return consumer;
  }

  private async *stream(kind: TaskKind, signal?: AbortSignal): AsyncGenerator<Envelope> {
    const session = this.session;
    if (!session) throw new StateError("broker_not_connected", "amqp client is not connected");
    if (signal?.aborted) return;

    const consumer = await this.openConsumer(kind, session);
    this.consumers.add(consumer);
    try {
      for (;;) {
        const next = await consumer.inbox.take(signal);
        if (next.done) return;
        const delivery = next.value;

        const decoded = decodeAmqpDelivery(delivery.content, delivery.properties, kind);
        if (!decoded.ok) {
          this.logger.warn(
            { kind, deliveryTag: delivery.fields.deliveryTag, error: decoded.error },
            "rejecting undecodable delivery"
          );
          consumer.channel.nack(delivery, false, false);
          continue;
        }

        try {
          yield decoded.value;
        } finally {
          // Runs once the caller asks for more or stops iterating, i.e. after processing.
          if (consumer.inbox.isOpen) consumer.channel.ack(delivery);
        }
      }
    } finally {
      if (this.consumers.delete(consumer)) await this.releaseConsumer(consumer);
    }
  }

  private async releaseConsumer(consumer: Consumer): Promise<void> {
    const tag = consumer.consumerTag;
    if (tag) await this.bestEffort("cancel consumer", () => consumer.channel.cancel(tag));
    await this.bestEffort("close channel", () => consumer.channel.close());
  }

  private async bestEffort(action: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn({ err, action }, "amqp teardown step failed");
    }
  }
}
