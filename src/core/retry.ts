/**
 * Bounded exponential backoff with jitter for network operations.
 */
import pRetry from "p-retry";
import { isRetryable } from "./exceptions.js";
import type { Logger } from "./types.js";

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  attempts: number;
  factor: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 5,
  factor: 2,
  minDelayMs: 1_000,
  maxDelayMs: 60_000,
};

/**
 * Run `operation` until it succeeds, fails with a non-transient error, or
 * runs out of attempts. The error that ends the loop is rethrown without
 * the attempt counters p-retry attaches to it.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  opts: { label: string; logger: Logger },
): Promise<T> {
  let lastError: unknown;

  try {
    return await pRetry(
      async () => {
        try {
          return await operation();
        } catch (err) {
          lastError = err;
          throw err;
        }
      },
      {
        retries: Math.max(policy.attempts - 1, 0),
        factor: policy.factor,
        minTimeout: policy.minDelayMs,
        maxTimeout: policy.maxDelayMs,
        randomize: true,
        shouldRetry: (error) => isRetryable(error),
        onFailedAttempt: (error) => {
          if (isRetryable(error) && error.retriesLeft > 0) {
            opts.logger.warn(
              `${opts.label}: attempt ${error.attemptNumber} failed (${error.message}), ${error.retriesLeft} left`,
            );
          }
        },
      },
    );
  } catch (err) {
    // p-retry reports the most frequent error once attempts run out
    const failure = lastError ?? err;
    if (failure instanceof Error) {
      Reflect.deleteProperty(failure, "attemptNumber");
      Reflect.deleteProperty(failure, "retriesLeft");
    }
    throw failure;
  }
}
