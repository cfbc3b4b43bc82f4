export { VenueId, isVenueId } from './venue.type.js';
export type { VenueFeeSchedule } from './venue.type.js';
export { MarketType, resolveMarketId } from './event.type.js';
export type { ContractSide, Event } from './event.type.js';
export { MatchStrategyName, isMatchStrategyName } from './match-strategy.type.js';
export type { RawPriceLevel } from './price-level.type.js';
export { RiskFactor } from './match.type.js';
export type { MatchResult } from './match.type.js';
