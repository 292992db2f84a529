// src/client/retry.ts

import { RetriesExhaustedError, isRetryable } from "./errors.js";

export interface RetryPolicy {
  /**
   * Delay before each retry. The operation runs at most
   * `backoffMs.length + 1` times.
   */
  backoffMs: readonly number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  backoffMs: [1000, 2000, 5000, 10_000],
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(r => setTimeout(r, ms));

export interface RetryOptions {
  policy: RetryPolicy;
  sleep: Sleep;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export function maxAttempts(policy: RetryPolicy): number {
  return policy.backoffMs.length + 1;
}

/**
 * Run `operation` until it succeeds, a non-retryable error is thrown (rethrown
 * as is), or the schedule runs out (RetriesExhaustedError).
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const attempts = maxAttempts(options.policy);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (!shouldRetry(err)) throw err;
      if (attempt >= attempts) {
        throw new RetriesExhaustedError(attempt, { cause: err });
      }

      const delayMs = options.policy.backoffMs[attempt - 1];
      options.onRetry?.({ attempt, delayMs, error: err });
      await options.sleep(delayMs);
    }
  }
}
