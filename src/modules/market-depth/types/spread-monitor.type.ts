import { SpreadAlertType } from '../../../common/events/index.js';
import { VenueId } from '../../../common/types/index.js';

/** The spread and depth figures of one poll, cut down from an OrderbookDepth. */
export interface SpreadSnapshot {
  readonly marketId: string;
  readonly venue: VenueId | null;
  readonly spread: number | null;
  readonly spreadPercentage: number | null;
  readonly midPrice: number | null;
  readonly totalBidDepth: number;
  readonly totalAskDepth: number;
  readonly depthImbalance: number | null;
  readonly observedAt: Date;
}

export interface SpreadAlert {
  readonly type: SpreadAlertType;
  readonly marketId: string;
  readonly venue: VenueId | null;
  readonly severity: 'low' | 'medium';
  readonly message: string;
  readonly currentSpreadPercentage: number | null;
  readonly previousSpreadPercentage: number | null;
  readonly spreadChange: number | null;
  readonly depthImbalance: number | null;
  readonly raisedAt: Date;
}

export type SpreadTrend = 'narrowing' | 'widening';

export interface SpreadSummary {
  readonly marketId: string;
  readonly venue: VenueId | null;
  readonly spreadPercentage: number | null;
  readonly totalLiquidity: number;
  readonly depthImbalance: number | null;
  /** From the last three snapshots; null while there are fewer */
  readonly trend: SpreadTrend | null;
  readonly lastUpdated: Date;
}
