/**
 * Retry with exponential backoff
 */

import { isRetryableError } from "./errors.js";
import type { ChildLogger } from "./logger.js";

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts?: number;
  /** Delay before the second attempt; doubles after each failure */
  backoffMs?: number;
  /** Retry every error, not only retryable ones */
  retryAll?: boolean;
  log?: ChildLogger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an async operation, retrying on failure.
 * attempt 1 fails: wait backoffMs; attempt 2 fails: wait backoffMs * 2; ...
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 3;
  const backoffMs = options.backoffMs ?? 1000;
  const wait = options.sleep ?? sleep;

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      const canRetry = options.retryAll === true || isRetryableError(error);
      if (!canRetry || attempt >= attempts) {
        break;
      }

      const delay = backoffMs * Math.pow(2, attempt - 1);
      options.log?.warn(`Attempt ${attempt}/${attempts} failed, retrying in ${delay}ms`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(delay);
    }
  }

  throw lastError;
}
