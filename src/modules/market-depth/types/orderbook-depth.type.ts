import { VenueId } from '../../../common/types/index.js';

export interface DepthPriceLevel {
  readonly price: number;
  readonly size: number;
  /** Running total from the best price on this side */
  readonly cumulativeSize: number;
}

/** Resting size within `percentage` of mid on each side. */
export interface DepthBucket {
  readonly percentage: number;
  readonly bidDepth: number;
  readonly askDepth: number;
}

/**
 * Analysed order book for one venue market. Built from a single fetch and
 * replaced wholesale on the next one.
 */
export interface OrderbookDepth {
  readonly marketId: string;
  readonly venue: VenueId | null;
  readonly bestBid: number | null;
  readonly bestAsk: number | null;
  readonly spread: number | null;
  readonly spreadPercentage: number | null;
  readonly midPrice: number | null;
  /** Descending by price */
  readonly bidLevels: readonly DepthPriceLevel[];
  /** Ascending by price */
  readonly askLevels: readonly DepthPriceLevel[];
  readonly totalBidDepth: number;
  readonly totalAskDepth: number;
  /** (bid - ask) / (bid + ask); null for an empty book */
  readonly depthImbalance: number | null;
  /** One entry per configured percentage; null without a mid price */
  readonly depthBuckets: readonly DepthBucket[] | null;
  readonly fetchedAt: Date;
}
