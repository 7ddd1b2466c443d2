import { setTimeout as delay } from "node:timers/promises";

/**
 * Exponential backoff used by every retry loop: 1s, 2s, 4s... capped at 10s
 */
export function backoffDelay(attempt: number, baseDelayMs: number = 1000): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), 10000);
}

/**
 * Wait for `ms`, rejecting early with an AbortError if `signal` fires
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
}
