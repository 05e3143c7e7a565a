// pattern: Imperative Shell

/**
 * Retry logic shared across all model adapters and the step engine.
 * Each caller provides its own isRetryableError predicate.
 */

import { RetriesExhaustedError } from "./types.ts";

export type RetryOptions = {
  maxAttempts: number;
  backoffBaseMs: number;
  maxDelayMs: number;
  sleep: (ms: number) => Promise<void>;
  onError?: (error: unknown, attempt: number) => void;
};

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  backoffBaseMs: 500,
  maxDelayMs: 10000,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Delay before the next attempt, for a 1-based attempt number.
 */
export function retryDelay(attempt: number, backoffBaseMs: number, maxDelayMs: number): number {
  return Math.min(backoffBaseMs * Math.pow(2, attempt - 1), maxDelayMs);
}

/**
 * Run fn up to maxAttempts times. Non-retryable errors propagate unchanged on the
 * attempt that raised them; running out of attempts raises RetriesExhaustedError.
 * The attempt counter lives in this call only.
 */
export async function callWithRetry<T>(
  fn: () => Promise<T>,
  isRetryableError: (error: unknown) => boolean,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const { maxAttempts, backoffBaseMs, maxDelayMs, sleep, onError } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (onError) {
        onError(error, attempt);
      }

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt < maxAttempts) {
        await sleep(retryDelay(attempt, backoffBaseMs, maxDelayMs));
      }
    }
  }

  throw new RetriesExhaustedError(maxAttempts, lastError);
}
