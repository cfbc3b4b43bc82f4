import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { FinancialDecimal, FinancialMath } from '../../common/utils/index.js';
import { getCorrelationId } from '../../common/services/correlation-context.js';
import { PIPELINE_CONFIG_TOKEN } from '../pipeline-config/pipeline-config.constants.js';
import { PipelineConfig } from '../pipeline-config/types/index.js';
import { ArbitrageOpportunity } from '../arbitrage-detection/types/index.js';
import { MarketDepthAnalyzerService } from './market-depth-analyzer.service.js';
import {
  ArbitrageSlippage,
  AssessedOpportunity,
  FeasibilityAssessment,
  OrderbookDepth,
} from './types/index.js';

function formatPercent(value: Decimal.Value): string {
  return `${new FinancialDecimal(value).mul(100).toFixed(2)}%`;
}

/**
 * Checks detector opportunities against live order books.
 * Live depth overrides the detector's heuristic slippage and size.
 */
@Injectable()
export class FeasibilityAssessorService {
  private readonly logger = new Logger(FeasibilityAssessorService.name);

  constructor(
    private readonly depthAnalyzer: MarketDepthAnalyzerService,
    @Inject(PIPELINE_CONFIG_TOKEN) private readonly config: PipelineConfig,
  ) {}

  /**
   * Pure verdict on a priced pair of legs. Every failed condition adds its own
   * constraint; feasible only when none failed.
   */
  assessArbitrageFeasibility(
    slippage: ArbitrageSlippage | null,
    targetEdge: number,
    maxSlippage: number,
  ): FeasibilityAssessment {
    if (!slippage) {
      return {
        feasible: false,
        maxSize: 0,
        totalSlippage: 0,
        netEdgeAfterSlippage: null,
        constraints: ['Missing slippage calculations'],
      };
    }

    const { buyLeg, sellLeg } = slippage;
    const constraints: string[] = [];

    if (!buyLeg.canExecute) {
      constraints.push(
        `Buy leg cannot execute full size (max: ${buyLeg.maxExecutableSize})`,
      );
    }
    if (!sellLeg.canExecute) {
      constraints.push(
        `Sell leg cannot execute full size (max: ${sellLeg.maxExecutableSize})`,
      );
    }

    const buySlippage = new FinancialDecimal(buyLeg.slippagePercentage ?? 0);
    const sellSlippage = new FinancialDecimal(sellLeg.slippagePercentage ?? 0);
    const totalSlippage = buySlippage.plus(sellSlippage);

    if (buySlippage.gt(maxSlippage)) {
      constraints.push(
        `Buy leg slippage too high: ${formatPercent(buySlippage)} > ${formatPercent(maxSlippage)}`,
      );
    }
    if (sellSlippage.gt(maxSlippage)) {
      constraints.push(
        `Sell leg slippage too high: ${formatPercent(sellSlippage)} > ${formatPercent(maxSlippage)}`,
      );
    }
    const combinedLimit = new FinancialDecimal(maxSlippage).mul(2);
    if (totalSlippage.gt(combinedLimit)) {
      constraints.push(
        `Combined slippage too high: ${formatPercent(totalSlippage)} > ${formatPercent(combinedLimit)}`,
      );
    }

    let netEdge: Decimal | null = null;
    if (
      buyLeg.averageFillPrice === null ||
      sellLeg.averageFillPrice === null ||
      buyLeg.averageFillPrice <= 0
    ) {
      constraints.push('Missing average fill price');
    } else {
      netEdge = FinancialMath.calculateFillEdge(
        new FinancialDecimal(buyLeg.averageFillPrice),
        new FinancialDecimal(sellLeg.averageFillPrice),
      ).minus(totalSlippage);
      if (netEdge.lt(targetEdge)) {
        constraints.push(
          `Net edge too low: ${formatPercent(netEdge)} < ${formatPercent(targetEdge)}`,
        );
      }
    }

    const maxSize = Math.min(
      buyLeg.maxExecutableSize,
      sellLeg.maxExecutableSize,
    );
    if (maxSize <= 0) {
      constraints.push('No executable size');
    }

    return {
      feasible: constraints.length === 0,
      maxSize,
      totalSlippage: totalSlippage.toNumber(),
      netEdgeAfterSlippage: netEdge?.toNumber() ?? null,
      constraints,
    };
  }

  /**
   * Re-prices an opportunity on freshly fetched books for both legs. When
   * either fetch fails the opportunity keeps its heuristic pricing and gets
   * no verdict.
   */
  async assessOpportunity(
    opportunity: ArbitrageOpportunity,
  ): Promise<AssessedOpportunity> {
    const { legA, legB } = opportunity;

    let depthA: OrderbookDepth;
    let depthB: OrderbookDepth;
    try {
      [depthA, depthB] = await Promise.all([
        this.depthAnalyzer.getMarketDepth(legA.marketId, legA.venue),
        this.depthAnalyzer.getMarketDepth(legB.marketId, legB.venue),
      ]);
    } catch (error) {
      this.logger.warn({
        message: 'Depth unavailable, keeping heuristic pricing',
        module: 'market-depth',
        correlationId: getCorrelationId(),
        data: {
          opportunityId: opportunity.opportunityId,
          marketA: legA.marketId,
          marketB: legB.marketId,
          error: error instanceof Error ? error.message : 'Unknown error',
        },
      });
      return {
        opportunity,
        pricingSource: 'heuristic',
        slippage: null,
        assessment: null,
      };
    }

    const slippage = this.depthAnalyzer.calculateArbitrageSlippage(
      depthA,
      depthB,
      opportunity.maxPositionSize.toNumber(),
    );
    const assessment = this.assessArbitrageFeasibility(
      slippage,
      this.config.feasibility.targetEdge,
      this.config.feasibility.maxSlippagePerLeg,
    );

    this.logger.log({
      message: `Opportunity ${assessment.feasible ? 'feasible' : 'infeasible'} on live depth`,
      module: 'market-depth',
      correlationId: getCorrelationId(),
      data: {
        opportunityId: opportunity.opportunityId,
        maxSize: assessment.maxSize,
        netEdgeAfterSlippage: assessment.netEdgeAfterSlippage,
        constraints: assessment.constraints,
      },
    });

    return {
      opportunity,
      pricingSource: 'live_depth',
      slippage,
      assessment,
    };
  }
}
