export interface RetryStrategy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export type ErrorSeverity = 'critical' | 'error' | 'warning';

/**
 * Root of the error taxonomy. Code ranges:
 * - 1000-1999 market data (MarketDataError)
 * - 4000-4999 configuration (ConfigValidationError, 4010)
 *
 * `retryStrategy` is read by withRetry: an error without one is final and
 * is rethrown on the first failure.
 */
export abstract class SystemError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly severity: ErrorSeverity,
    readonly retryStrategy?: RetryStrategy,
    readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}
