import { RetryStrategy, SystemError } from '../errors/index.js';

export interface RetryOptions {
  onRetry?: (attempt: number, error: Error) => void;
  /** Return false to stop retrying and rethrow immediately. */
  isRetryable?: (error: Error) => boolean;
}

/**
 * A SystemError states its own retry policy: without a retryStrategy it is
 * final (e.g. market not found), with one its backoff replaces the caller's.
 * Other errors are retried on the caller's strategy.
 */
function backoffFor(
  error: Error,
  fallback: RetryStrategy,
): RetryStrategy | null {
  if (error instanceof SystemError) {
    return error.retryStrategy ?? null;
  }
  return fallback;
}

/**
 * Execute an async function with exponential backoff retry.
 * `strategy.maxRetries` bounds the attempts whatever the errors say.
 * Adds jitter to prevent thundering herd.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  strategy: RetryStrategy,
  options: RetryOptions = {},
): Promise<T> {
  let lastError = new Error('withRetry: no attempt was made');

  for (let attempt = 0; attempt <= strategy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= strategy.maxRetries) {
        break;
      }
      if (options.isRetryable && !options.isRetryable(lastError)) {
        break;
      }
      const backoff = backoffFor(lastError, strategy);
      if (!backoff) {
        break;
      }

      const baseDelay =
        backoff.initialDelayMs * Math.pow(backoff.backoffMultiplier, attempt);
      const cappedDelay = Math.min(baseDelay, backoff.maxDelayMs);
      // Add jitter: 0.5x to 1.5x of the computed delay
      const jitter = cappedDelay * (0.5 + Math.random());
      const delay = Math.min(jitter, backoff.maxDelayMs);

      options.onRetry?.(attempt + 1, lastError);

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
