import type { TaskKind, WorkerId } from "../contracts.js";

export type WorkerEventType =
  | "worker.registering"
  | "worker.registered"
  | "worker.active"
  | "worker.draining"
  | "worker.unregistered"
  | "worker.unregister_failed"
  | "worker.startup_failed"
  | "broker.connected"
  | "broker.disconnected"
  | "loop.started"
  | "loop.exited"
  | "loop.failed"
  | "task.received"
  | "task.succeeded"
  | "task.failed"
  | "task.reported"
  | "task.report_failed";

export interface WorkerEvent {
  type: WorkerEventType;
  at: number;
  workerId?: WorkerId;
  kind?: TaskKind;
  taskId?: string;
  detail?: Record<string, unknown>;
}

export interface WorkerPluginContext {
  emit(event: WorkerEvent): void;
}

export interface WorkerPlugin {
  name: string;
  register(ctx: WorkerPluginContext): void;
}
