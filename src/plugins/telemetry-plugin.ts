import type { WorkerEvent, WorkerPlugin, WorkerPluginContext } from "./types.js";

export interface TelemetrySnapshot {
  counters: Record<string, number>;
  events: WorkerEvent[];
}

export interface TelemetryPlugin extends WorkerPlugin {
  snapshot(): TelemetrySnapshot;
}

export function createTelemetryPlugin(options: { maxEvents?: number } = {}): TelemetryPlugin {
  const maxEvents = options.maxEvents ?? 200;
  const counters = new Map<string, number>();
  const events: WorkerEvent[] = [];

  const increment = (key: string) => counters.set(key, (counters.get(key) ?? 0) + 1);

  const capture = (event: WorkerEvent) => {
    increment(`event.${event.type}`);
    if (event.kind) increment(`kind.${event.kind}.${event.type}`);
    events.push(event);
    if (events.length > maxEvents) events.shift();
  };

  return {
    name: "telemetry",
    register(ctx: WorkerPluginContext) {
      const originalEmit = ctx.emit;
      ctx.emit = (event) => {
        capture(event);
        originalEmit(event);
      };
    },
    snapshot() {
      return { counters: Object.fromEntries(counters), events: [...events] };
    },
  };
}
