/**
 * Structured logging for the research engine
 *
 * pino is the logger Fastify is built on, so engine logs and API logs share
 * one format. Components take a child logger named after themselves.
 */

import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export const logger: Logger = pino({
  name: "deep-research",
  level: process.env.LOG_LEVEL || "info",
  redact: {
    paths: ["apiKey", "*.apiKey", "to", "*.to"],
    censor: "[REDACTED]",
  },
});

/**
 * Create a child logger for a component
 */
export function createLogger(
  component: string,
  bindings?: Record<string, string>
): Logger {
  return logger.child({ component, ...bindings });
}
