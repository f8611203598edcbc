import pino from "pino";
import { dirname } from "path";
import { mkdirSync } from "fs";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export type Logger = pino.Logger;

const streams = pino.multistream([{ level: "trace", stream: process.stderr }]);

const root = pino(
  {
    level: process.env.LOG_LEVEL ?? "warn",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  streams
);

// Children keep their own level once created, so track them for configureLogging()
const children = new Map<string, Logger>();

export function createLogger(name: string): Logger {
  const existing = children.get(name);
  if (existing) return existing;

  const child = root.child({ module: name });
  children.set(name, child);
  return child;
}

export interface LoggingOptions {
  level?: LogLevel;
  file?: string | null;
}

/**
 * Apply the configured level to every logger and optionally tee output to a file.
 * LOG_LEVEL in the environment wins over the configured level.
 */
export function configureLogging(options: LoggingOptions): void {
  const level = process.env.LOG_LEVEL ?? options.level;
  if (level) {
    root.level = level;
    for (const child of children.values()) {
      child.level = level;
    }
  }

  if (options.file) {
    mkdirSync(dirname(options.file), { recursive: true });
    streams.add({
      level: "trace",
      stream: pino.destination({ dest: options.file, append: true, sync: true }),
    });
  }
}
