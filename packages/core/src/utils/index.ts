/**
 * Shared utilities
 */

export { logger, createLogger, type Logger } from "./logger";
export { sleep, backoffDelay } from "./timing";
