import type { Logger } from "pino";
import { failure } from "../contracts.js";
import type {
  Envelope,
  Outcome,
  TaskHandler,
  TaskInput,
  TaskKind,
  WorkerId,
  WorkerState,
} from "../contracts.js";
import { defaultBrokerFactory, redact, selectBrokerBackend } from "../broker/factory.js";
import type { BrokerBackend, BrokerClient, BrokerFactory } from "../broker/types.js";
import type { CoordinatorClient } from "../coordinator/client.js";
import {
  computeRetryDecision,
  isRetryableReportError,
  type ReportRetryOptions,
} from "../control/retry-policy.js";
import { ConfigurationError, StateError, describeError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { WorkerEvent, WorkerEventType, WorkerPlugin, WorkerPluginContext } from "../plugins/types.js";
import { execute } from "./execute.js";
import { TaskRegistry } from "./registry.js";

export interface WorkerEngineOptions {
  name: string;
  brokerUrl: string;
  coordinator: CoordinatorClient;
  logger?: Logger;
  plugins?: WorkerPlugin[];
  /** Replaces URL-based backend construction; tests inject an in-memory broker here. */
  brokerFactory?: BrokerFactory;
  brokerOptions?: { exchange?: string; namespace?: string };
  /** Send a "running" status before each handler call. Off by default. */
  reportRunningStatus?: boolean;
  reportRetry?: ReportRetryOptions;
}

const TRANSITIONS: Record<WorkerState, readonly WorkerState[]> = {
  unregistered: ["registering"],
  registering: ["active", "closed"],
  active: ["draining"],
  draining: ["closed"],
  closed: [],
};

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Owns the worker lifecycle: register with the coordinator, open the broker,
 * run one consumption loop per task kind, and on shutdown drain, disconnect
 * and unregister.
 *
 * Each loop handles one envelope at a time, so a slow kind never holds up
 * another. Handler failures become failure outcomes; they never end a loop.
 */
export class WorkerEngine {
  readonly name: string;
  readonly brokerBackend: BrokerBackend;

  private logger: Logger;
  private readonly coordinator: CoordinatorClient;
  private readonly registry = new TaskRegistry();
  private readonly brokerFactory: BrokerFactory;
  private readonly ctx: WorkerPluginContext;
  private readonly shutdownController = new AbortController();

  private currentState: WorkerState = "unregistered";
  private id: WorkerId | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly options: WorkerEngineOptions) {
    if (options.name.trim().length === 0) {
      throw new ConfigurationError("invalid_worker_name", "worker name must be a non-empty string");
    }
    this.name = options.name;
    this.brokerBackend = selectBrokerBackend(options.brokerUrl);
    this.coordinator = options.coordinator;
    this.brokerFactory = options.brokerFactory ?? defaultBrokerFactory;
    this.logger = (options.logger ?? createLogger({ name: options.name })).child({ worker: options.name });

    const ctx: WorkerPluginContext = {
      emit: (event) => this.logger.trace({ event }, "worker event"),
    };
    for (const plugin of options.plugins ?? []) {
      plugin.register(ctx);
      this.logger.debug({ plugin: plugin.name }, "plugin registered");
    }
    this.ctx = ctx;
  }

  get state(): WorkerState {
    return this.currentState;
  }

  /** Coordinator-assigned id; null before registration and after a successful unregister. */
  get workerId(): WorkerId | null {
    return this.id;
  }

  get kinds(): TaskKind[] {
    return this.registry.kinds();
  }

  registerTask(kind: TaskKind, handler: TaskHandler): this {
    if (this.currentState !== "unregistered") {
      throw new StateError(
        "registration_frozen",
        `cannot register task kind "${kind}": worker is ${this.currentState}`
      );
    }
    this.registry.register(kind, handler);
    return this;
  }

  registerTasks(handlers: Record<TaskKind, TaskHandler>): this {
    for (const [kind, handler] of Object.entries(handlers)) {
      this.registerTask(kind, handler);
    }
    return this;
  }

  /**
   * Resolves once the worker has drained and unregistered. Rejects when
   * registration or the broker connection fails at startup.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.running || this.currentState !== "unregistered") {
      throw new StateError("already_started", `worker "${this.name}" has already been started`);
    }
    if (this.registry.size === 0) {
      throw new StateError("no_task_kinds", "register at least one task kind before running the worker");
    }
    this.running = this.lifecycle(signal);
    return this.running;
  }

  /** Requests a graceful stop and waits for teardown to finish. */
  async shutdown(): Promise<void> {
    this.shutdownController.abort();
    if (!this.running) return;
    try {
      await this.running;
    } catch (err) {
      this.logger.debug({ err }, "worker run had already failed");
    }
  }

  /** Runs the handler registered for `kind`. Throws `StateError` for an unknown kind. */
  async execute(kind: TaskKind, payload: TaskInput, taskId: string): Promise<Outcome> {
    return execute(this.registry, kind, payload, {
      taskId,
      kind,
      workerId: this.id,
      logger: this.logger.child({ kind, taskId }),
    });
  }

  private async lifecycle(external?: AbortSignal): Promise<void> {
    const stop = this.shutdownController.signal;
    const relay = () => this.shutdownController.abort();
    if (external?.aborted) relay();
    else external?.addEventListener("abort", relay, { once: true });

    try {
      const broker = await this.startup();
      try {
        await this.serve(broker, stop);
      } finally {
        await this.teardown(broker);
      }
    } finally {
      external?.removeEventListener("abort", relay);
    }
  }

  private async startup(): Promise<BrokerClient> {
    const kinds = this.registry.freeze();
    this.transition("registering");
    this.emit("worker.registering", { detail: { kinds: [...kinds] } });

    let workerId: WorkerId;
    try {
      workerId = await this.coordinator.registerWorker(this.name, kinds);
    } catch (err) {
      this.logger.error({ err }, "worker registration failed");
      this.emit("worker.startup_failed", { detail: { stage: "register", error: describeError(err) } });
      this.transition("closed");
      throw err;
    }

    this.id = workerId;
    this.logger = this.logger.child({ workerId });
    this.logger.info({ kinds }, "worker registered");
    this.emit("worker.registered", { detail: { kinds: [...kinds] } });

    let broker: BrokerClient;
    try {
      broker = this.brokerFactory({
        url: this.options.brokerUrl,
        workerId,
        kinds,
        options: { ...this.options.brokerOptions, logger: this.logger },
      });
      await broker.connect();
    } catch (err) {
      this.logger.error({ err, broker: redact(this.options.brokerUrl) }, "broker connection failed");
      this.emit("worker.startup_failed", { detail: { stage: "broker", error: describeError(err) } });
      if (await this.unregister(workerId)) this.id = null;
      this.transition("closed");
      throw err;
    }

    this.emit("broker.connected", { detail: { backend: broker.backend } });
    this.transition("active");
    this.emit("worker.active");
    return broker;
  }

  private async serve(broker: BrokerClient, stop: AbortSignal): Promise<void> {
    const drain = () => {
      if (this.currentState !== "active") return;
      this.transition("draining");
      this.logger.info("shutdown requested; draining");
      this.emit("worker.draining");
    };
    if (stop.aborted) drain();
    else stop.addEventListener("abort", drain, { once: true });

    try {
      await Promise.all(this.registry.kinds().map((kind) => this.listen(broker, kind, stop)));
      if (!stop.aborted) {
        this.logger.error("every consumption loop has exited; waiting for shutdown");
        await untilAborted(stop);
      }
    } finally {
      stop.removeEventListener("abort", drain);
      drain();
    }
  }

  private async listen(broker: BrokerClient, kind: TaskKind, stop: AbortSignal): Promise<void> {
    const log = this.logger.child({ kind });
    let processed = 0;
    log.info("consumption loop started");
    this.emit("loop.started", { kind });

    try {
      for await (const envelope of broker.consume(kind, { signal: stop })) {
        await this.process(envelope, log);
        processed += 1;
        if (stop.aborted) break;
      }
      const reason = stop.aborted ? "shutdown" : "stream_ended";
      if (reason === "stream_ended") log.warn({ processed }, "broker stream ended");
      else log.info({ processed }, "consumption loop stopped");
      this.emit("loop.exited", { kind, detail: { processed, reason } });
    } catch (err) {
      log.error({ err, processed }, "consumption loop failed");
      this.emit("loop.failed", { kind, detail: { processed, error: describeError(err) } });
    }
  }

  private async process(envelope: Envelope, log: Logger): Promise<void> {
    const { taskId, kind, payload } = envelope;
    const taskLog = log.child({ taskId });
    this.emit("task.received", { kind, taskId });

    let outcome: Outcome;
    if (envelope.decodeError !== undefined) {
      taskLog.warn({ error: envelope.decodeError }, "delivery body could not be decoded");
      outcome = failure(envelope.decodeError);
    } else {
      if (this.options.reportRunningStatus) {
        try {
          await this.coordinator.reportStatus(taskId, "running");
        } catch (err) {
          taskLog.warn({ err }, "failed to report running status");
        }
      }

      try {
        outcome = await this.execute(kind, payload, taskId);
      } catch (err) {
        taskLog.error({ err }, "no handler for delivered task kind");
        outcome = failure(describeError(err));
      }
    }

    if (outcome.ok) {
      taskLog.debug("task succeeded");
      this.emit("task.succeeded", { kind, taskId });
    } else {
      taskLog.warn({ error: outcome.error }, "task failed");
      this.emit("task.failed", { kind, taskId, detail: { error: outcome.error } });
    }

    await this.report(envelope, outcome, taskLog);
  }

  private async report(envelope: Envelope, outcome: Outcome, log: Logger): Promise<void> {
    const { taskId, kind } = envelope;
    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.coordinator.reportResult(taskId, outcome);
        this.emit("task.reported", { kind, taskId, detail: { attempt } });
        return;
      } catch (err) {
        const decision = isRetryableReportError(err)
          ? computeRetryDecision({ ...this.options.reportRetry, attempt })
          : { retry: false, delayMs: 0 };
        if (!decision.retry) {
          log.error({ err, attempt }, "failed to report task outcome");
          this.emit("task.report_failed", { kind, taskId, detail: { attempt, error: describeError(err) } });
          return;
        }
        log.warn({ err, attempt, delayMs: decision.delayMs }, "outcome report failed; retrying");
        await sleep(decision.delayMs);
      }
    }
  }

  private async teardown(broker: BrokerClient): Promise<void> {
    try {
      await broker.disconnect();
      this.emit("broker.disconnected");
    } catch (err) {
      this.logger.error({ err }, "broker disconnect failed");
    }

    if (this.id !== null && (await this.unregister(this.id))) {
      this.id = null;
    }
    this.transition("closed");
    this.logger.info("worker closed");
  }

  /** Best effort: a failure is logged and reported through events, never thrown. */
  private async unregister(workerId: WorkerId): Promise<boolean> {
    try {
      await this.coordinator.unregisterWorker(workerId);
      this.logger.info("worker unregistered");
      this.emit("worker.unregistered");
      return true;
    } catch (err) {
      this.logger.error({ err }, "worker unregistration failed");
      this.emit("worker.unregister_failed", { detail: { error: describeError(err) } });
      return false;
    }
  }

  private transition(next: WorkerState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new StateError("invalid_transition", `cannot move worker from ${this.currentState} to ${next}`);
    }
    this.logger.debug({ from: this.currentState, to: next }, "worker state changed");
    this.currentState = next;
  }

  private emit(type: WorkerEventType, fields: Omit<WorkerEvent, "type" | "at" | "workerId"> = {}): void {
    this.ctx.emit({ type, at: Date.now(), ...(this.id ? { workerId: this.id } : {}), ...fields });
  }
}
