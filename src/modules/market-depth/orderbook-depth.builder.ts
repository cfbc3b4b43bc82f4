import Decimal from 'decimal.js';
import { RawPriceLevel, VenueId } from '../../common/types/index.js';
import { FinancialDecimal } from '../../common/utils/index.js';
import { DepthConfig } from '../pipeline-config/types/index.js';
import { DepthBucket, DepthPriceLevel, OrderbookDepth } from './types/index.js';

export type DepthBuildOptions = Pick<
  DepthConfig,
  'minLevelSize' | 'depthPercentages'
>;

function isUsableLevel(level: RawPriceLevel, minLevelSize: number): boolean {
  return (
    Number.isFinite(level.price) &&
    Number.isFinite(level.size) &&
    level.price >= 0 &&
    level.price <= 1 &&
    level.size >= minLevelSize
  );
}

function withCumulativeSizes(
  levels: readonly RawPriceLevel[],
): readonly DepthPriceLevel[] {
  let cumulative = new FinancialDecimal(0);
  return Object.freeze(
    levels.map((level) => {
      cumulative = cumulative.plus(level.size);
      return Object.freeze({
        price: level.price,
        size: level.size,
        cumulativeSize: cumulative.toNumber(),
      });
    }),
  );
}

function sumSizes(levels: readonly DepthPriceLevel[]): Decimal {
  return levels.reduce(
    (sum, level) => sum.plus(level.size),
    new FinancialDecimal(0),
  );
}

function buildBuckets(
  mid: Decimal,
  bids: readonly DepthPriceLevel[],
  asks: readonly DepthPriceLevel[],
  percentages: readonly number[],
): readonly DepthBucket[] {
  return percentages.map((percentage) => {
    const range = mid.mul(percentage);
    const bidDepth = sumSizes(
      bids.filter((level) => mid.minus(level.price).lte(range)),
    );
    const askDepth = sumSizes(
      asks.filter((level) =>
        new FinancialDecimal(level.price).minus(mid).lte(range),
      ),
    );
    return {
      percentage,
      bidDepth: bidDepth.toNumber(),
      askDepth: askDepth.toNumber(),
    };
  });
}

/**
 * Turns raw, unsorted price levels into an analysed order book.
 * BUY levels are bids, SELL levels are asks. Dust and malformed levels are dropped.
 */
export function buildOrderbookDepth(
  marketId: string,
  venue: VenueId | null,
  rawLevels: readonly RawPriceLevel[],
  options: DepthBuildOptions,
  fetchedAt: Date = new Date(),
): OrderbookDepth {
  const usable = rawLevels.filter((level) =>
    isUsableLevel(level, options.minLevelSize),
  );
  const bidLevels = withCumulativeSizes(
    usable
      .filter((level) => level.side === 'BUY')
      .sort((a, b) => b.price - a.price),
  );
  const askLevels = withCumulativeSizes(
    usable
      .filter((level) => level.side === 'SELL')
      .sort((a, b) => a.price - b.price),
  );

  const bestBid = bidLevels[0]?.price ?? null;
  const bestAsk = askLevels[0]?.price ?? null;

  let midPrice: Decimal | null = null;
  let spread: Decimal | null = null;
  if (bestBid !== null && bestAsk !== null) {
    midPrice = new FinancialDecimal(bestBid).plus(bestAsk).div(2);
    spread = new FinancialDecimal(bestAsk).minus(bestBid);
  }
  const spreadPercentage =
    spread !== null && midPrice !== null && midPrice.gt(0)
      ? spread.div(midPrice).toNumber()
      : null;

  const totalBid = sumSizes(bidLevels);
  const totalAsk = sumSizes(askLevels);
  const totalDepth = totalBid.plus(totalAsk);
  const depthImbalance = totalDepth.isZero()
    ? null
    : totalBid.minus(totalAsk).div(totalDepth).toNumber();

  return Object.freeze({
    marketId,
    venue,
    bestBid,
    bestAsk,
    spread: spread?.toNumber() ?? null,
    spreadPercentage,
    midPrice: midPrice?.toNumber() ?? null,
    bidLevels,
    askLevels,
    totalBidDepth: totalBid.toNumber(),
    totalAskDepth: totalAsk.toNumber(),
    depthImbalance,
    depthBuckets:
      midPrice === null
        ? null
        : Object.freeze(
            buildBuckets(
              midPrice,
              bidLevels,
              askLevels,
              options.depthPercentages,
            ),
          ),
    fetchedAt,
  });
}
