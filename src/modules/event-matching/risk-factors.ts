import { Event, RiskFactor } from '../../common/types/index.js';
import {
  DEADLINE_MISMATCH_RISK_DAYS,
  REVIEW_CONFIDENCE_THRESHOLD,
  REVIEW_DEADLINE_TOLERANCE_DAYS,
} from './event-matching.constants.js';

/**
 * Risk tags for a candidate pair, independent of how confidently it matched.
 *
 * @param deadlineDeltaDays - whole days between deadlines, null when unknown
 */
export function detectRiskFactors(
  eventA: Event,
  eventB: Event,
  deadlineDeltaDays: number | null,
): RiskFactor[] {
  const factors: RiskFactor[] = [];

  const sourceA = eventA.resolutionSourceUrl?.trim();
  const sourceB = eventB.resolutionSourceUrl?.trim();
  if (sourceA && sourceB && sourceA !== sourceB) {
    factors.push(RiskFactor.DIFFERENT_RESOLUTION_SOURCES);
  }

  if (
    deadlineDeltaDays !== null &&
    deadlineDeltaDays > DEADLINE_MISMATCH_RISK_DAYS
  ) {
    factors.push(RiskFactor.DEADLINE_MISMATCH_GT_WEEK);
  }

  if (eventA.marketType !== eventB.marketType) {
    factors.push(RiskFactor.DIFFERENT_MARKET_TYPES);
  }

  return factors;
}

/**
 * Review gate, evaluated separately from the acceptance threshold.
 * An unknown deadline gap cannot be verified and therefore requires review.
 */
export function requiresHumanReview(
  confidence: number,
  riskFactors: readonly RiskFactor[],
  deadlineDeltaDays: number | null,
): boolean {
  return (
    confidence < REVIEW_CONFIDENCE_THRESHOLD ||
    riskFactors.length > 0 ||
    deadlineDeltaDays === null ||
    deadlineDeltaDays > REVIEW_DEADLINE_TOLERANCE_DAYS
  );
}
