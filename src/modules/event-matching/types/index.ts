export type { MatchStrategy, WeightedStrategy } from './match-strategy.type.js';
export type { ReviewDecision } from './review-decision.type.js';
