import { FinancialDecimal } from '../../common/utils/index.js';
import {
  ArbitrageSlippage,
  FilledLevel,
  OrderbookDepth,
  SlippageEstimate,
  TradeSide,
} from './types/index.js';

function noFill(
  depth: OrderbookDepth,
  side: TradeSide,
  size: number,
  expectedFillPrice: number | null,
  depthExhausted: boolean,
): SlippageEstimate {
  return {
    marketId: depth.marketId,
    side,
    nominalSize: size,
    averageFillPrice: null,
    expectedFillPrice,
    slippageAbsolute: null,
    slippagePercentage: null,
    priceImpact: null,
    liquidityConsumed: null,
    canExecute: false,
    maxExecutableSize: 0,
    depthExhausted,
    levelsConsumed: [],
  };
}

/**
 * Simulates a market order of `size` contracts: a buy walks the asks from the
 * best price, a sell walks the bids. A partial fill is reported through
 * `maxExecutableSize` and `depthExhausted`, never thrown.
 */
export function calculateSlippage(
  depth: OrderbookDepth,
  side: TradeSide,
  size: number,
): SlippageEstimate {
  const levels = side === 'buy' ? depth.askLevels : depth.bidLevels;
  const bestPrice = side === 'buy' ? depth.bestAsk : depth.bestBid;

  if (!Number.isFinite(size) || size <= 0) {
    return noFill(depth, side, size, bestPrice, false);
  }
  if (levels.length === 0 || bestPrice === null) {
    return noFill(depth, side, size, null, true);
  }

  let remaining = new FinancialDecimal(size);
  let totalCost = new FinancialDecimal(0);
  const levelsConsumed: FilledLevel[] = [];

  for (const level of levels) {
    if (remaining.lte(0)) break;

    const fill = FinancialDecimal.min(remaining, level.size);
    totalCost = totalCost.plus(fill.mul(level.price));
    levelsConsumed.push({ price: level.price, size: fill.toNumber() });
    remaining = remaining.minus(fill);
  }

  const filled = new FinancialDecimal(size).minus(remaining);
  if (filled.lte(0)) {
    return noFill(depth, side, size, bestPrice, true);
  }

  const averageFillPrice = totalCost.div(filled);
  const slippageAbsolute = averageFillPrice.minus(bestPrice).abs();
  const sideTotal = side === 'buy' ? depth.totalAskDepth : depth.totalBidDepth;
  const fullyFilled = remaining.lte(0);

  return {
    marketId: depth.marketId,
    side,
    nominalSize: size,
    averageFillPrice: averageFillPrice.toNumber(),
    expectedFillPrice: bestPrice,
    slippageAbsolute: slippageAbsolute.toNumber(),
    slippagePercentage:
      bestPrice > 0 ? slippageAbsolute.div(bestPrice).toNumber() : null,
    priceImpact:
      depth.midPrice !== null && depth.midPrice > 0
        ? averageFillPrice
            .minus(depth.midPrice)
            .abs()
            .div(depth.midPrice)
            .toNumber()
        : null,
    liquidityConsumed:
      sideTotal > 0 ? filled.div(sideTotal).toNumber() : null,
    canExecute: fullyFilled,
    maxExecutableSize: filled.toNumber(),
    depthExhausted: !fullyFilled,
    levelsConsumed,
  };
}

/**
 * Prices both legs of a cross-venue trade: buy where the mid is lower, sell
 * where it is higher, whatever order the books are passed in. Null when
 * either book lacks a mid price.
 */
export function calculateArbitrageSlippage(
  depthA: OrderbookDepth,
  depthB: OrderbookDepth,
  size: number,
): ArbitrageSlippage | null {
  if (depthA.midPrice === null || depthB.midPrice === null) {
    return null;
  }

  const [buyDepth, sellDepth] =
    depthA.midPrice < depthB.midPrice ? [depthA, depthB] : [depthB, depthA];

  return {
    buyLeg: calculateSlippage(buyDepth, 'buy', size),
    sellLeg: calculateSlippage(sellDepth, 'sell', size),
    buyVenue: { marketId: buyDepth.marketId, venue: buyDepth.venue },
    sellVenue: { marketId: sellDepth.marketId, venue: sellDepth.venue },
  };
}
