import { VenueFeeSchedule, VenueId } from './venue.type.js';

export enum MarketType {
  BINARY = 'binary',
  MULTI_OUTCOME = 'multi_outcome',
  CONTINUOUS = 'continuous',
}

/** One tradable outcome of a listing (e.g. YES or NO). */
export interface ContractSide {
  readonly sideId: string;
  readonly name: string;
  /** 0-1 probability price */
  readonly price: number;
  readonly impliedProbability: number;
  readonly volume24h: number | null;
  readonly liquidity: number | null;
}

/**
 * Canonical listing produced by a venue connector.
 * Read-only to the pipeline; a refresh supersedes the object rather than mutating it.
 */
export interface Event {
  readonly eventId: string;
  /** Venue market identifiers keyed by venue */
  readonly sourceIds: Readonly<Partial<Record<VenueId, string>>>;
  readonly title: string;
  readonly entities: readonly string[];
  readonly category: string;
  readonly resolutionCriteria: string;
  readonly resolutionSourceUrl: string | null;
  readonly deadline: Date;
  readonly venue: VenueId;
  readonly marketType: MarketType;
  readonly contractSides: readonly ContractSide[];
  /** Listing-level override of the venue fee schedule */
  readonly feeSchedule: VenueFeeSchedule | null;
  readonly totalVolume: number | null;
}

/** Venue market id for the event, falling back to the canonical id. */
export function resolveMarketId(event: Event): string {
  return event.sourceIds[event.venue] ?? event.eventId;
}
