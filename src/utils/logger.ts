/**
 * Structured logging with Pino
 */

import pino from "pino";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env["LOG_LEVEL"];
const level: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export const logger = pino({
  level,
  transport:
    process.env["NODE_ENV"] === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  base: {
    service: "session-beacon",
  },
});

/**
 * Create a child logger with additional context
 */
export function createLogger(name: string) {
  return logger.child({ module: name });
}

/**
 * Normalize an unknown thrown value for log fields
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
