/** Fallback per-leg slippage when the side reports no liquidity */
export const UNKNOWN_LIQUIDITY_SLIPPAGE = 0.005;

/**
 * Liquidity buckets for the fallback slippage policy, checked in order.
 * A side at or below the last threshold gets THIN_LIQUIDITY_SLIPPAGE.
 */
export const LIQUIDITY_SLIPPAGE_BUCKETS: readonly {
  readonly above: number;
  readonly slippage: number;
}[] = [
  { above: 10000, slippage: 0.001 },
  { above: 1000, slippage: 0.003 },
];

export const THIN_LIQUIDITY_SLIPPAGE = 0.01;

/** Days of deadline drift at which timing risk saturates */
export const TIMING_RISK_HORIZON_DAYS = 7;

/** Resolution risk added per risk factor on the match */
export const RESOLUTION_RISK_PER_FACTOR = 0.1;
