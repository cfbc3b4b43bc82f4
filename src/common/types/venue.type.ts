export enum VenueId {
  POLYMARKET = 'polymarket',
  PREDYX = 'predyx',
  KALSHI = 'kalshi',
  STACKER_NEWS = 'stacker_news',
}

/**
 * Per-venue trading costs used for leg pricing.
 * NOTE: tradingFeeRate uses the 0-1 scale (0.02 = 2%), applied to the contract price.
 * fixedCost is a per-contract amount in price units (gas, network or settlement cost).
 */
export interface VenueFeeSchedule {
  venue: VenueId;
  tradingFeeRate: number;
  fixedCost: number;
  description?: string;
}

export function isVenueId(value: unknown): value is VenueId {
  return Object.values(VenueId).some((venue) => venue === value);
}
