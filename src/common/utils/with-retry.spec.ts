import { describe, it, expect, vi, beforeEach } from 'vitest';
import { withRetry } from './with-retry.js';
import {
  MARKET_DATA_ERROR_CODES,
  MarketDataError,
  RetryStrategy,
} from '../errors/index.js';

const FAST_STRATEGY: RetryStrategy = {
  maxRetries: 3,
  initialDelayMs: 1,
  maxDelayMs: 10,
  backoffMultiplier: 2,
};

describe('withRetry', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('should succeed on first try', async () => {
    const fn = vi.fn().mockResolvedValue('success');
    const result = await withRetry(fn, FAST_STRATEGY);
    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry on failure and succeed', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('fail1'))
      .mockRejectedValueOnce(new Error('fail2'))
      .mockResolvedValue('success');

    const result = await withRetry(fn, FAST_STRATEGY);
    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should throw after max retries exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('persistent failure'));

    await expect(withRetry(fn, FAST_STRATEGY)).rejects.toThrow(
      'persistent failure',
    );
    // initial + 3 retries = 4
    expect(fn).toHaveBeenCalledTimes(4);
  });

  it('should call onRetry callback on each retry', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('fail'))
      .mockResolvedValue('ok');

    const onRetry = vi.fn();
    await withRetry(fn, FAST_STRATEGY, { onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error));
  });

  it('should stop immediately when the error is not retryable', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('market not found'));
    const onRetry = vi.fn();

    await expect(
      withRetry(fn, FAST_STRATEGY, {
        onRetry,
        isRetryable: (error) => error.message !== 'market not found',
      }),
    ).rejects.toThrow('market not found');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('should not retry a system error that carries no retry strategy', async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new MarketDataError(
          MARKET_DATA_ERROR_CODES.MARKET_NOT_FOUND,
          'No order book for pm-btc',
          null,
          'pm-btc',
          'warning',
        ),
      );

    await expect(withRetry(fn, FAST_STRATEGY)).rejects.toThrow(
      'No order book for pm-btc',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should back off on the strategy carried by the error', async () => {
    vi.useFakeTimers();
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    const slow: RetryStrategy = {
      maxRetries: 1,
      initialDelayMs: 1000,
      maxDelayMs: 1000,
      backoffMultiplier: 2,
    };
    const fn = vi
      .fn()
      .mockRejectedValueOnce(
        new MarketDataError(
          MARKET_DATA_ERROR_CODES.FETCH_TIMEOUT,
          'Timed out',
          null,
          null,
          'warning',
          slow,
        ),
      )
      .mockResolvedValue('ok');

    const pending = withRetry(fn, FAST_STRATEGY);
    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);

    await expect(pending).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    vi.useRealTimers();
  });

  it('should wrap non-Error throwables', async () => {
    const fn = vi.fn().mockRejectedValue('string error');
    const noRetry: RetryStrategy = { ...FAST_STRATEGY, maxRetries: 0 };

    await expect(withRetry(fn, noRetry)).rejects.toThrow('string error');
  });

  it('should respect maxRetries of 0 (no retries)', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fail'));
    const noRetry: RetryStrategy = {
      ...FAST_STRATEGY,
      maxRetries: 0,
    };

    await expect(withRetry(fn, noRetry)).rejects.toThrow('fail');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
