import Decimal from 'decimal.js';
import { MatchResult, VenueFeeSchedule, VenueId } from '../../../common/types/index.js';

export enum ArbitrageType {
  /** Identical payout on both venues */
  PURE = 'pure',
  /** Match carries risk factors; payout may differ across venues */
  STATISTICAL = 'statistical',
}

export type SlippageSource = 'unknown_liquidity_default' | 'liquidity_bucket';

export type PositionSizeSource =
  | 'liquidity_fraction'
  | 'hard_cap'
  | 'unknown_liquidity_default';

/** Heuristic value used when no live order book is available, labelled by origin. */
export interface FallbackEstimate<TSource extends string> {
  readonly value: Decimal;
  readonly source: TSource;
}

export interface OpportunityLeg {
  readonly venue: VenueId;
  readonly eventId: string;
  readonly marketId: string;
  /** Contract side bought on this venue, e.g. YES */
  readonly side: string;
  readonly price: Decimal;
  /** price × (1 + tradingFeeRate) + fixedCost */
  readonly totalCost: Decimal;
  readonly feeSchedule: VenueFeeSchedule;
  readonly slippage: FallbackEstimate<SlippageSource>;
  readonly positionSize: FallbackEstimate<PositionSizeSource>;
}

/**
 * Decimal fields are FinancialDecimal instances at runtime (precision=20).
 */
export interface ArbitrageOpportunity {
  readonly opportunityId: string;
  readonly match: MatchResult;
  readonly arbitrageType: ArbitrageType;
  readonly legA: OpportunityLeg;
  readonly legB: OpportunityLeg;
  /** 1 - (legA.totalCost + legB.totalCost) */
  readonly grossEdge: Decimal;
  /** grossEdge - slippageEstimate */
  readonly netEdge: Decimal;
  readonly maxPositionSize: Decimal;
  readonly expectedProfit: Decimal;
  /** Sum of both legs' fallback slippage */
  readonly slippageEstimate: Decimal;
  readonly timingRiskScore: number;
  readonly resolutionRiskScore: number;
  readonly confidenceScore: number;
  readonly detectedAt: Date;
  readonly expiresAt: Date;
}
