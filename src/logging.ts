// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import type { LogLevel } from "./types.js";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export type LogContext = Record<string, string | number | boolean | undefined>;

/** Leveled logger writing one JSON document per line. */
export interface Logger {
  readonly level: LogLevel;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  /** Logger that adds `context` to every entry it writes. */
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives each serialized line, without trailing newline. Default: stderr. */
  sink?: (line: string) => void;
  now?: () => Date;
}

export interface LogEntry {
  message: string;
  context: Record<string, string | number | boolean>;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

const stderrSink = (line: string): void => {
  process.stderr.write(line + "\n");
};

export function createLogger(options: LoggerOptions = {}): Logger {
  return makeLogger(
    options.level ?? "warn",
    options.sink ?? stderrSink,
    options.now ?? (() => new Date()),
    {},
  );
}

/** Logger that drops everything. Handy for embedding and tests. */
export const silentLogger: Logger = createLogger({ level: "error", sink: () => {} });

function makeLogger(
  level: LogLevel,
  sink: (line: string) => void,
  now: () => Date,
  base: LogContext,
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  function write(entryLevel: LogLevel, message: string, extra?: LogContext): void {
    if (LOG_LEVELS.indexOf(entryLevel) > threshold) return;

    const context: LogEntry["context"] = {};
    for (const [key, value] of Object.entries({ ...base, ...extra })) {
      if (value !== undefined) context[key] = value;
    }
    context.level = entryLevel;
    context.date = now().toISOString();

    const entry: LogEntry = { message, context };
    sink(JSON.stringify(entry));
  }

  return {
    level,
    error: (message, context) => write("error", message, context),
    warn: (message, context) => write("warn", message, context),
    info: (message, context) => write("info", message, context),
    debug: (message, context) => write("debug", message, context),
    child: (context) => makeLogger(level, sink, now, { ...base, ...context }),
  };
}
