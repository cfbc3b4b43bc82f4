import { Event, MatchStrategyName } from '../../../common/types/index.js';

/**
 * One independently testable matching signal.
 * Returns a score in [0,1], or null to abstain (excluded from the weighted sum).
 */
export interface MatchStrategy {
  readonly name: MatchStrategyName;
  score(eventA: Event, eventB: Event): number | null | Promise<number | null>;
}

export interface WeightedStrategy {
  readonly strategy: MatchStrategy;
  readonly weight: number;
}
