/**
 * Structured logger: pino-based, JSON lines on stdout.
 */

import pino from "pino";

const level = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "production" ? "info" : "debug");

export const logger = pino({
  level,
  base: { service: "listing-metrics-sync" },
  ...(process.env.NODE_ENV === "production" && {
    timestamp: pino.stdTimeFunctions.isoTime,
  }),
});

export type Logger = pino.Logger;

export function createChildLogger(module: string): pino.Logger {
  return logger.child({ module });
}
