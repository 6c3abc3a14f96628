// src/logger.ts — stderr logger

import type { Warning } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  sink?: LogSink;
}

/**
 * Line-oriented logger writing `[LEVEL] message` to stderr.
 * `debug` lines need `verbose`; `quiet` drops everything below `warn`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? process.stderr;
  const enabled = (level: LogLevel): boolean => {
    if (level === "debug") return options.verbose === true && options.quiet !== true;
    if (level === "info") return options.quiet !== true;
    return true;
  };
  const emit = (level: LogLevel, message: string): void => {
    if (enabled(level)) sink.write(`[${level.toUpperCase()}] ${message}\n`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function reportWarnings(warnings: Warning[], logger: Logger): void {
  for (const w of warnings) {
    const line = `${w.module}: ${w.message}`;
    if (w.level === "error") logger.error(line);
    else if (w.level === "warn") logger.warn(line);
    else logger.info(line);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
