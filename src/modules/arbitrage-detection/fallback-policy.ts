import { FinancialDecimal } from '../../common/utils/index.js';
import { DetectionConfig } from '../pipeline-config/types/index.js';
import {
  LIQUIDITY_SLIPPAGE_BUCKETS,
  THIN_LIQUIDITY_SLIPPAGE,
  UNKNOWN_LIQUIDITY_SLIPPAGE,
} from './arbitrage-detection.constants.js';
import {
  FallbackEstimate,
  PositionSizeSource,
  SlippageSource,
} from './types/index.js';

function isKnown(liquidity: number | null | undefined): liquidity is number {
  return (
    liquidity !== null && liquidity !== undefined && Number.isFinite(liquidity)
  );
}

/**
 * Per-leg slippage guess from the side's reported liquidity.
 * Zero liquidity is known (and thin), not unknown.
 */
export function estimateFallbackSlippage(
  liquidity: number | null | undefined,
): FallbackEstimate<SlippageSource> {
  if (!isKnown(liquidity)) {
    return {
      value: new FinancialDecimal(UNKNOWN_LIQUIDITY_SLIPPAGE),
      source: 'unknown_liquidity_default',
    };
  }

  const bucket = LIQUIDITY_SLIPPAGE_BUCKETS.find(
    ({ above }) => liquidity > above,
  );
  return {
    value: new FinancialDecimal(bucket?.slippage ?? THIN_LIQUIDITY_SLIPPAGE),
    source: 'liquidity_bucket',
  };
}

/** Per-leg position size: a fraction of reported liquidity, capped. */
export function estimateFallbackPositionSize(
  liquidity: number | null | undefined,
  config: Pick<
    DetectionConfig,
    'liquidityFraction' | 'maxPositionSize' | 'unknownLiquidityPositionSize'
  >,
): FallbackEstimate<PositionSizeSource> {
  if (!isKnown(liquidity)) {
    return {
      value: new FinancialDecimal(config.unknownLiquidityPositionSize),
      source: 'unknown_liquidity_default',
    };
  }

  const fraction = new FinancialDecimal(liquidity).mul(config.liquidityFraction);
  const cap = new FinancialDecimal(config.maxPositionSize);
  return fraction.gt(cap)
    ? { value: cap, source: 'hard_cap' }
    : { value: fraction, source: 'liquidity_fraction' };
}
