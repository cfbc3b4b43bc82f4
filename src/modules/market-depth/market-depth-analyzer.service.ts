import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  MARKET_DATA_ERROR_CODES,
  MarketDataError,
  RETRY_STRATEGIES,
} from '../../common/errors/index.js';
import type { IDepthSource } from '../../common/interfaces/index.js';
import { RawPriceLevel, VenueId } from '../../common/types/index.js';
import { withRetry, withTimeout } from '../../common/utils/index.js';
import { getCorrelationId } from '../../common/services/correlation-context.js';
import { DEPTH_SOURCE_TOKEN } from '../../connectors/connector.constants.js';
import { PIPELINE_CONFIG_TOKEN } from '../pipeline-config/pipeline-config.constants.js';
import { PipelineConfig } from '../pipeline-config/types/index.js';
import { buildOrderbookDepth } from './orderbook-depth.builder.js';
import {
  calculateArbitrageSlippage,
  calculateSlippage,
} from './slippage-calculator.js';
import {
  ArbitrageSlippage,
  OrderbookDepth,
  SlippageEstimate,
  TradeSide,
} from './types/index.js';

@Injectable()
export class MarketDepthAnalyzerService {
  private readonly logger = new Logger(MarketDepthAnalyzerService.name);

  constructor(
    @Inject(DEPTH_SOURCE_TOKEN) private readonly depthSource: IDepthSource,
    @Inject(PIPELINE_CONFIG_TOKEN) private readonly config: PipelineConfig,
  ) {}

  /**
   * Fetches fresh levels for one market and analyses them.
   * @throws MarketDataError when the fetch fails, times out or the market is unknown
   */
  async getMarketDepth(
    marketId: string,
    venue: VenueId | null = null,
  ): Promise<OrderbookDepth> {
    const rawLevels = await this.fetchPriceLevels(marketId, venue);
    const depth = buildOrderbookDepth(
      marketId,
      venue,
      rawLevels,
      this.config.depth,
    );

    this.logger.debug({
      message: `Depth analysed for ${marketId}`,
      module: 'market-depth',
      correlationId: getCorrelationId(),
      data: {
        marketId,
        venue,
        rawLevels: rawLevels.length,
        bidLevels: depth.bidLevels.length,
        askLevels: depth.askLevels.length,
        midPrice: depth.midPrice,
        depthImbalance: depth.depthImbalance,
      },
    });

    return depth;
  }

  calculateSlippage(
    depth: OrderbookDepth,
    side: TradeSide,
    size: number,
  ): SlippageEstimate {
    const estimate = calculateSlippage(depth, side, size);
    if (estimate.depthExhausted) {
      this.logger.debug({
        message: `Insufficient ${side} depth for ${depth.marketId}`,
        module: 'market-depth',
        correlationId: getCorrelationId(),
        data: {
          marketId: depth.marketId,
          requested: size,
          maxExecutableSize: estimate.maxExecutableSize,
        },
      });
    }
    return estimate;
  }

  calculateArbitrageSlippage(
    depthA: OrderbookDepth,
    depthB: OrderbookDepth,
    size: number,
  ): ArbitrageSlippage | null {
    const result = calculateArbitrageSlippage(depthA, depthB, size);
    if (!result) {
      this.logger.warn({
        message: 'Cannot price arbitrage legs without a mid price on both books',
        module: 'market-depth',
        correlationId: getCorrelationId(),
        data: {
          marketA: depthA.marketId,
          midA: depthA.midPrice,
          marketB: depthB.marketId,
          midB: depthB.midPrice,
        },
      });
    }
    return result;
  }

  private async fetchPriceLevels(
    marketId: string,
    venue: VenueId | null,
  ): Promise<RawPriceLevel[]> {
    const timeoutMs = this.config.depth.fetchTimeoutMs;
    try {
      return await withRetry(
        () =>
          withTimeout(
            this.depthSource.getPriceLevels(marketId),
            timeoutMs,
            () =>
              new MarketDataError(
                MARKET_DATA_ERROR_CODES.FETCH_TIMEOUT,
                `Depth fetch for ${marketId} timed out after ${timeoutMs}ms`,
                venue,
                marketId,
                'warning',
                RETRY_STRATEGIES.DEPTH_FETCH,
              ),
          ),
        RETRY_STRATEGIES.DEPTH_FETCH,
        {
          onRetry: (attempt, error) => {
            this.logger.warn({
              message: `Retrying depth fetch for ${marketId}`,
              module: 'market-depth',
              correlationId: getCorrelationId(),
              data: { marketId, venue, attempt, error: error.message },
            });
          },
        },
      );
    } catch (error) {
      if (error instanceof MarketDataError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new MarketDataError(
        MARKET_DATA_ERROR_CODES.DEPTH_FETCH_FAILED,
        `Depth fetch failed for ${marketId}: ${message}`,
        venue,
        marketId,
        'error',
        RETRY_STRATEGIES.DEPTH_FETCH,
        { cause: message },
      );
    }
  }
}
