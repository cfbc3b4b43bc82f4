import { MatchResult, VenueId } from '../../common/types/index.js';
import { AssessedOpportunity } from '../../modules/market-depth/types/index.js';

export interface ScanCycleResult {
  readonly correlationId: string | null;
  /** Listings fetched per venue that answered */
  readonly eventsByVenue: Partial<Record<VenueId, number>>;
  readonly venueFailures: readonly VenueId[];
  /** Every configured venue failed; the scheduler counts this cycle as an error */
  readonly allVenuesFailed: boolean;
  readonly matches: readonly MatchResult[];
  /** Every detected opportunity with its depth verdict, best net edge first */
  readonly opportunities: readonly AssessedOpportunity[];
  readonly actionable: readonly AssessedOpportunity[];
  readonly durationMs: number;
}
