import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  ContractSide,
  Event,
  MarketType,
  MatchResult,
  resolveMarketId,
} from '../../common/types/index.js';
import { FinancialDecimal, FinancialMath } from '../../common/utils/index.js';
import { getCorrelationId } from '../../common/services/correlation-context.js';
import { PIPELINE_CONFIG_TOKEN } from '../pipeline-config/pipeline-config.constants.js';
import { PipelineConfig } from '../pipeline-config/types/index.js';
import { wholeDaysBetween } from '../event-matching/similarity/text-similarity.js';
import {
  RESOLUTION_RISK_PER_FACTOR,
  TIMING_RISK_HORIZON_DAYS,
} from './arbitrage-detection.constants.js';
import {
  estimateFallbackPositionSize,
  estimateFallbackSlippage,
} from './fallback-policy.js';
import { ArbitrageOpportunity, ArbitrageType, OpportunityLeg } from './types/index.js';

/** Side bought on event A, then on event B */
const BINARY_DIRECTIONS: readonly (readonly [string, string])[] = [
  ['YES', 'NO'],
  ['NO', 'YES'],
];

type DiscardReason =
  | 'below_min_edge'
  | 'slippage_above_tolerance'
  | 'no_position_size'
  | 'unpriceable_leg';

interface DetectionTally {
  lowConfidence: number;
  nonBinary: number;
  failed: number;
  discarded: Record<DiscardReason, number>;
}

/**
 * Fee-aware pure-arbitrage detection over matched binary markets.
 *
 * Buying complementary sides on two venues pays exactly 1 at resolution, so the
 * pair is an opportunity when both all-in leg costs sum below 1 by at least the
 * configured edge. Slippage and size come from the fallback policy; live depth
 * is checked later by the feasibility assessor.
 */
@Injectable()
export class ArbitrageDetectorService {
  private readonly logger = new Logger(ArbitrageDetectorService.name);

  constructor(
    @Inject(PIPELINE_CONFIG_TOKEN) private readonly config: PipelineConfig,
  ) {}

  scanForArbitrage(matches: readonly MatchResult[]): ArbitrageOpportunity[] {
    const startTime = Date.now();
    const opportunities: ArbitrageOpportunity[] = [];
    const tally: DetectionTally = {
      lowConfidence: 0,
      nonBinary: 0,
      failed: 0,
      discarded: {
        below_min_edge: 0,
        slippage_above_tolerance: 0,
        no_position_size: 0,
        unpriceable_leg: 0,
      },
    };

    for (const match of matches) {
      if (match.confidenceScore < this.config.detection.minMatchConfidence) {
        tally.lowConfidence++;
        continue;
      }
      if (
        match.eventA.marketType !== MarketType.BINARY ||
        match.eventB.marketType !== MarketType.BINARY
      ) {
        tally.nonBinary++;
        continue;
      }

      try {
        for (const [sideA, sideB] of BINARY_DIRECTIONS) {
          const result = this.evaluateDirection(match, sideA, sideB);
          if (typeof result === 'string') {
            tally.discarded[result]++;
          } else {
            opportunities.push(result);
          }
        }
      } catch (error) {
        tally.failed++;
        this.logger.error({
          message: 'Failed to evaluate match, skipping',
          module: 'arbitrage-detection',
          correlationId: getCorrelationId(),
          data: {
            matchId: match.matchId,
            error: error instanceof Error ? error.message : 'Unknown error',
          },
        });
      }
    }

    opportunities.sort((a, b) => b.netEdge.comparedTo(a.netEdge));

    this.logger.log({
      message: `Detection complete: ${opportunities.length} opportunities from ${matches.length} matches`,
      module: 'arbitrage-detection',
      correlationId: getCorrelationId(),
      data: {
        matches: matches.length,
        opportunities: opportunities.length,
        ...tally,
        durationMs: Date.now() - startTime,
      },
    });

    return opportunities;
  }

  private evaluateDirection(
    match: MatchResult,
    sideNameA: string,
    sideNameB: string,
  ): ArbitrageOpportunity | DiscardReason {
    const legA = this.priceLeg(match.eventA, sideNameA);
    const legB = this.priceLeg(match.eventB, sideNameB);
    if (!legA || !legB) {
      return 'unpriceable_leg';
    }

    const grossEdge = FinancialMath.calculateGrossEdge(
      legA.totalCost,
      legB.totalCost,
    );
    const minEdge = new FinancialDecimal(this.config.detection.minEdgeThreshold);
    if (
      !grossEdge.gt(0) ||
      !FinancialMath.isAboveThreshold(grossEdge, minEdge)
    ) {
      return 'below_min_edge';
    }

    const slippageEstimate = legA.slippage.value.plus(legB.slippage.value);
    if (slippageEstimate.gt(this.config.detection.maxSlippageTolerance)) {
      return 'slippage_above_tolerance';
    }

    const maxPositionSize = FinancialDecimal.min(
      legA.positionSize.value,
      legB.positionSize.value,
    );
    if (maxPositionSize.lte(0)) {
      return 'no_position_size';
    }

    const netEdge = grossEdge.minus(slippageEstimate);
    const opportunity: ArbitrageOpportunity = {
      opportunityId: uuidv4(),
      match,
      arbitrageType:
        match.riskFactors.length > 0
          ? ArbitrageType.STATISTICAL
          : ArbitrageType.PURE,
      legA,
      legB,
      grossEdge,
      netEdge,
      maxPositionSize,
      expectedProfit: netEdge.mul(maxPositionSize),
      slippageEstimate,
      timingRiskScore: this.timingRisk(match.eventA, match.eventB),
      resolutionRiskScore: this.resolutionRisk(match),
      confidenceScore: match.confidenceScore,
      detectedAt: new Date(),
      expiresAt:
        match.eventA.deadline.getTime() <= match.eventB.deadline.getTime()
          ? match.eventA.deadline
          : match.eventB.deadline,
    };

    this.logger.debug({
      message: `Opportunity identified: buy ${sideNameA} on ${legA.venue}, ${sideNameB} on ${legB.venue}`,
      module: 'arbitrage-detection',
      correlationId: getCorrelationId(),
      data: {
        opportunityId: opportunity.opportunityId,
        matchId: match.matchId,
        grossEdge: grossEdge.toString(),
        netEdge: netEdge.toString(),
        maxPositionSize: maxPositionSize.toString(),
      },
    });

    return opportunity;
  }

  private priceLeg(event: Event, sideName: string): OpportunityLeg | null {
    const side = this.findSide(event, sideName);
    if (!side) {
      this.logger.debug({
        message: `Side ${sideName} not listed, skipping direction`,
        module: 'arbitrage-detection',
        correlationId: getCorrelationId(),
        data: { eventId: event.eventId, venue: event.venue },
      });
      return null;
    }
    if (!Number.isFinite(side.price) || side.price < 0 || side.price > 1) {
      this.logger.warn({
        message: 'Side price outside [0, 1], skipping direction',
        module: 'arbitrage-detection',
        correlationId: getCorrelationId(),
        data: { eventId: event.eventId, side: side.name, price: side.price },
      });
      return null;
    }

    const feeSchedule = event.feeSchedule ?? this.config.fees[event.venue];
    if (!feeSchedule) {
      this.logger.warn({
        message: `No fee schedule for ${event.venue}, skipping leg`,
        module: 'arbitrage-detection',
        correlationId: getCorrelationId(),
        data: { eventId: event.eventId, venue: event.venue },
      });
      return null;
    }

    const price = new FinancialDecimal(side.price);
    return {
      venue: event.venue,
      eventId: event.eventId,
      marketId: resolveMarketId(event),
      side: side.name,
      price,
      totalCost: FinancialMath.calculateLegCost(price, feeSchedule),
      feeSchedule,
      slippage: estimateFallbackSlippage(side.liquidity),
      positionSize: estimateFallbackPositionSize(
        side.liquidity,
        this.config.detection,
      ),
    };
  }

  private findSide(event: Event, name: string): ContractSide | undefined {
    const wanted = name.toLowerCase();
    return event.contractSides.find(
      (side) => side.name.trim().toLowerCase() === wanted,
    );
  }

  /** Unknown deadline drift is treated as maximal. */
  private timingRisk(eventA: Event, eventB: Event): number {
    const days = wholeDaysBetween(eventA.deadline, eventB.deadline);
    if (days === null) return 1;
    return Math.min(days / TIMING_RISK_HORIZON_DAYS, 1);
  }

  private resolutionRisk(match: MatchResult): number {
    return FinancialDecimal.min(
      new FinancialDecimal(1)
        .minus(match.confidenceScore)
        .plus(
          new FinancialDecimal(RESOLUTION_RISK_PER_FACTOR).mul(
            match.riskFactors.length,
          ),
        ),
      1,
    ).toNumber();
  }
}
