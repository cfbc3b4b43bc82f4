import { ArbitrageOpportunity } from '../../arbitrage-detection/types/index.js';
import { ArbitrageSlippage } from './slippage.type.js';

export interface FeasibilityAssessment {
  /** True only when `constraints` is empty */
  readonly feasible: boolean;
  readonly maxSize: number;
  readonly totalSlippage: number;
  readonly netEdgeAfterSlippage: number | null;
  readonly constraints: readonly string[];
}

export type PricingSource = 'live_depth' | 'heuristic';

/**
 * Detector output re-checked against live depth. With `heuristic` pricing the
 * depth fetch failed and only the detector's fallback estimates apply.
 */
export interface AssessedOpportunity {
  readonly opportunity: ArbitrageOpportunity;
  readonly pricingSource: PricingSource;
  readonly slippage: ArbitrageSlippage | null;
  readonly assessment: FeasibilityAssessment | null;
}
