export { ArbitrageType } from './arbitrage-opportunity.type.js';
export type {
  ArbitrageOpportunity,
  FallbackEstimate,
  OpportunityLeg,
  PositionSizeSource,
  SlippageSource,
} from './arbitrage-opportunity.type.js';
