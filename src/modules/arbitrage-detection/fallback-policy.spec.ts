import { describe, it, expect } from 'vitest';
import {
  estimateFallbackPositionSize,
  estimateFallbackSlippage,
} from './fallback-policy.js';

describe('estimateFallbackSlippage', () => {
  it.each([
    [null, '0.005', 'unknown_liquidity_default'],
    [undefined, '0.005', 'unknown_liquidity_default'],
    [Number.NaN, '0.005', 'unknown_liquidity_default'],
    [50000, '0.001', 'liquidity_bucket'],
    [10000, '0.003', 'liquidity_bucket'],
    [1001, '0.003', 'liquidity_bucket'],
    [1000, '0.01', 'liquidity_bucket'],
    [0, '0.01', 'liquidity_bucket'],
  ])('liquidity %s -> %s (%s)', (liquidity, expected, source) => {
    const estimate = estimateFallbackSlippage(liquidity);
    expect(estimate.value.toString()).toBe(expected);
    expect(estimate.source).toBe(source);
  });
});

describe('estimateFallbackPositionSize', () => {
  const config = {
    liquidityFraction: 0.1,
    maxPositionSize: 10000,
    unknownLiquidityPositionSize: 100,
  };

  it('takes a fraction of known liquidity', () => {
    const estimate = estimateFallbackPositionSize(20000, config);
    expect(estimate.value.toString()).toBe('2000');
    expect(estimate.source).toBe('liquidity_fraction');
  });

  it('caps large books at the maximum position size', () => {
    const estimate = estimateFallbackPositionSize(250000, config);
    expect(estimate.value.toString()).toBe('10000');
    expect(estimate.source).toBe('hard_cap');
  });

  it('uses the configured default for unknown liquidity', () => {
    const estimate = estimateFallbackPositionSize(null, config);
    expect(estimate.value.toString()).toBe('100');
    expect(estimate.source).toBe('unknown_liquidity_default');
  });

  it('sizes a known empty book at zero', () => {
    const estimate = estimateFallbackPositionSize(0, config);
    expect(estimate.value.isZero()).toBe(true);
    expect(estimate.source).toBe('liquidity_fraction');
  });
});
