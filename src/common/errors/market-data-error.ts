import { VenueId } from '../types/index.js';
import { ErrorSeverity, RetryStrategy, SystemError } from './system-error.js';

/**
 * Error class for event and order-book fetch failures (code range 1000-1999).
 *
 * - 1001: Event listing fetch failed (ERROR, network backoff)
 * - 1002: Depth fetch failed (ERROR, network backoff)
 * - 1003: Fetch timed out (WARNING, network backoff)
 * - 1004: Market not found (WARNING, no retry)
 */
export class MarketDataError extends SystemError {
  constructor(
    code: number,
    message: string,
    public readonly venue: VenueId | null,
    public readonly marketId: string | null,
    severity: ErrorSeverity,
    retryStrategy?: RetryStrategy,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, retryStrategy, metadata);
  }
}

export const MARKET_DATA_ERROR_CODES = {
  EVENT_FETCH_FAILED: 1001,
  DEPTH_FETCH_FAILED: 1002,
  FETCH_TIMEOUT: 1003,
  MARKET_NOT_FOUND: 1004,
} as const;

export const RETRY_STRATEGIES = {
  EVENT_FETCH: {
    maxRetries: 2,
    initialDelayMs: 500,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
  },
  DEPTH_FETCH: {
    maxRetries: 3,
    initialDelayMs: 250,
    maxDelayMs: 4000,
    backoffMultiplier: 2,
  },
} as const satisfies Record<string, RetryStrategy>;
