import { Event } from './event.type.js';
import { MatchStrategyName } from './match-strategy.type.js';

export enum RiskFactor {
  DIFFERENT_RESOLUTION_SOURCES = 'different_resolution_sources',
  DEADLINE_MISMATCH_GT_WEEK = 'deadline_mismatch_gt_week',
  DIFFERENT_MARKET_TYPES = 'different_market_types',
}

/**
 * Scored cross-venue candidate produced by the event matcher.
 * Immutable once built; consumed by the arbitrage detector.
 */
export interface MatchResult {
  readonly matchId: string;
  readonly eventA: Event;
  readonly eventB: Event;
  /** Weighted sum over contributing strategies, 0-1 */
  readonly confidenceScore: number;
  /** Strategies that returned a non-zero score, in registry order */
  readonly matchStrategies: readonly MatchStrategyName[];
  readonly strategyScores: Readonly<Partial<Record<MatchStrategyName, number>>>;
  readonly riskFactors: readonly RiskFactor[];
  readonly humanReviewRequired: boolean;
  readonly evaluatedAt: Date;
}
