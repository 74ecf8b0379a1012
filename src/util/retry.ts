import pRetry, { AbortError } from "p-retry";
import { setTimeout as sleep } from "timers/promises";
import { Logger } from "./logger.js";

export { AbortError };

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  attempts: number;
  baseDelayMs: number;
  /** Upper bound (exclusive) of the random delay added to every backoff. */
  maxJitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 5,
  baseDelayMs: 2000,
  maxJitterMs: 2000,
};

export interface RetryOptions extends Partial<RetryPolicy> {
  label?: string;
  logger?: Logger;
}

/**
 * Runs `operation` until it resolves or `attempts` is exhausted. Attempt n
 * failing waits `baseDelayMs * 2^(n-1)` plus jitter before attempt n+1. The
 * last failure is rethrown as is.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_RETRY_POLICY.attempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs;
  const maxJitterMs = options.maxJitterMs ?? DEFAULT_RETRY_POLICY.maxJitterMs;
  const label = options.label ?? "operation";

  return await pRetry(operation, {
    retries: attempts - 1,
    factor: 2,
    minTimeout: baseDelayMs,
    maxTimeout: Number.POSITIVE_INFINITY,
    randomize: false,
    onFailedAttempt: async (error) => {
      if (error.retriesLeft === 0) {
        options.logger?.warn(
          `${label} failed after ${error.attemptNumber} attempts: ${error.message}`
        );
        return;
      }
      options.logger?.warn(
        `${label} attempt ${error.attemptNumber} failed: ${error.message} (${error.retriesLeft} retries left)`
      );
      if (maxJitterMs > 0) {
        await sleep(Math.floor(Math.random() * maxJitterMs));
      }
    },
  });
}

/** HTTP statuses worth another attempt. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
