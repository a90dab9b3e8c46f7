/**
 * texnames Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Silent unless a level is configured,
 * so the CLI's own output stays readable. Logs always go to stderr, which
 * keeps stdout free for the summary.
 *
 * pino.destination() is used instead of transports: transports spawn
 * worker_threads and would keep a one-shot process alive.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "debug",
  "info",
  "warn",
  "error",
];

export interface LoggerOptions {
  level: LogLevel;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      name: "texnames",
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
