import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger, LevelWithSilent };

export function createLogger(options: { name?: string; level?: LevelWithSilent } = {}): Logger {
  return pino({
    name: options.name ?? "taskline-worker",
    level: options.level ?? "info",
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
