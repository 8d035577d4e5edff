import { EventEmitter } from "node:events";
import type { PubSubConnector, PubSubSession } from "../broker/pubsub-broker.js";

/** In-process publish/subscribe server; fire-and-forget like Redis channels. */
export class FakePubSubServer {
  readonly sessions: FakePubSubSession[] = [];
  refuseConnections = false;

  readonly connector: PubSubConnector = () => {
    const session = new FakePubSubSession(this);
    this.sessions.push(session);
    return session;
  };

  /** Returns how many sessions received the message. */
  publish(channel: string, message: string): number {
    let receivers = 0;
    for (const session of this.sessions) {
      if (session.deliver(channel, message)) receivers += 1;
    }
    return receivers;
  }
}

export class FakePubSubSession extends EventEmitter implements PubSubSession {
  readonly channels = new Set<string>();
  connected = false;
  quitCalls = 0;
  failSubscribe = false;

  constructor(private readonly server: FakePubSubServer) {
    super();
  }

  async connect(): Promise<void> {
    if (this.server.refuseConnections) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    this.connected = true;
  }

  async subscribe(...channels: string[]): Promise<unknown> {
    if (this.failSubscribe) throw new Error("ERR subscribe rejected");
    for (const c of channels) this.channels.add(c);
    return this.channels.size;
  }

  async unsubscribe(...channels: string[]): Promise<unknown> {
    for (const c of channels) this.channels.delete(c);
    return this.channels.size;
  }

  async quit(): Promise<unknown> {
    this.quitCalls += 1;
    this.end();
    return "OK";
  }

  /** Connection lost without a quit. */
  end(): void {
    if (!this.connected) return;
    this.connected = false;
    this.channels.clear();
    this.emit("end");
  }

  deliver(channel: string, message: string): boolean {
    if (!this.connected || !this.channels.has(channel)) return false;
    this.emit("message", channel, message);
    return true;
  }
}
