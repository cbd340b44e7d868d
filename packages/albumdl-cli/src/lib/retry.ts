import type { DelayFn } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import { realDelay } from "./adapters/real-timers.js";
import { isCLIError } from "./errors/types.js";

export interface RetryOptions {
  /** Retries after the first attempt */
  retryAttempts: number;
  /** Base delay, doubled after each failed attempt */
  retryDelayMs: number;
  delay?: DelayFn;
  shouldRetry?: (error: unknown) => boolean;
  logger?: Logger;
  signal?: AbortSignal;
}

/** Retry only errors that say repeating may help. */
export function isRetryable(error: unknown): boolean {
  return isCLIError(error) && error.retryable;
}

/**
 * Run `fn` until it succeeds, a non-retryable error occurs, or the
 * attempts are used up. The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    retryAttempts,
    retryDelayMs,
    delay = realDelay,
    shouldRetry = isRetryable,
    logger,
    signal,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt > retryAttempts || signal?.aborted || !shouldRetry(error)) {
        throw error;
      }
      const wait = retryDelayMs * Math.pow(2, attempt - 1);
      logger?.warn("Attempt failed, retrying", {
        attempt,
        maxRetries: retryAttempts,
        retryDelayMs: wait,
        error: error instanceof Error ? error.message : String(error),
      });
      await delay(wait);
    }
  }
}
