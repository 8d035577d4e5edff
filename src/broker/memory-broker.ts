import type { Envelope, TaskKind, WorkerId } from "../contracts.js";
import { ConnectionError, StateError } from "../errors.js";
import { Inbox } from "./inbox.js";
import type { BrokerClient, ConsumeOptions } from "./types.js";

/**
 * In-process broker with the same pull/ack contract as the network backends.
 * Envelopes published before anyone consumes a kind are kept until a consumer
 * arrives.
 */
export class InMemoryBroker implements BrokerClient {
  readonly backend = "memory" as const;
  private connected = false;
  private closed = false;
  private readonly queues = new Map<TaskKind, Inbox<Envelope>>();
  private readonly acked: Envelope[] = [];
  connectCalls = 0;
  disconnectCalls = 0;

  constructor(readonly workerId: WorkerId = "memory-worker") {}

  async connect(): Promise<void> {
    this.connectCalls++;
    if (this.closed) throw new StateError("broker_closed", "memory broker already disconnected");
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.connected = false;
    this.closed = true;
    for (const inbox of this.queues.values()) inbox.close();
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Envelopes whose processing has completed. */
  get acknowledged(): readonly Envelope[] {
    return this.acked;
  }

  publish(envelope: Envelope): void {
    this.queueFor(envelope.kind).push(envelope);
  }

  pending(kind: TaskKind): number {
    return this.queues.get(kind)?.size ?? 0;
  }

  /** Simulates a transport drop on one kind's stream. */
  failStream(kind: TaskKind, message = `memory stream for ${kind} dropped`): void {
    this.queueFor(kind).fail(new ConnectionError("broker_connection_closed", message));
  }

  consume(kind: TaskKind, options: ConsumeOptions = {}): AsyncIterable<Envelope> {
    return this.stream(kind, options.signal);
  }

  private queueFor(kind: TaskKind): Inbox<Envelope> {
    let inbox = this.queues.get(kind);
    if (!inbox) {
      inbox = new Inbox<Envelope>();
      this.queues.set(kind, inbox);
    }
    return inbox;
  }

  private async *stream(kind: TaskKind, signal?: AbortSignal): AsyncGenerator<Envelope> {
    if (!this.connected) {
      throw new StateError("broker_not_connected", "memory broker is not connected");
    }
    const inbox = this.queueFor(kind);
    for (;;) {
      const next = await inbox.take(signal);
      if (next.done) return;
      try {
        yield next.value;
      } finally {
        this.acked.push(next.value);
      }
    }
  }
}
