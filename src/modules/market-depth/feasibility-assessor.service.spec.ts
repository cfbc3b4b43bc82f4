import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import fc from 'fast-check';
import { FeasibilityAssessorService } from './feasibility-assessor.service.js';
import { MarketDepthAnalyzerService } from './market-depth-analyzer.service.js';
import { ArbitrageSlippage, SlippageEstimate } from './types/index.js';
import { DEPTH_SOURCE_TOKEN } from '../../connectors/connector.constants.js';
import { PIPELINE_CONFIG_TOKEN } from '../pipeline-config/pipeline-config.constants.js';
import {
  MARKET_DATA_ERROR_CODES,
  MarketDataError,
} from '../../common/errors/index.js';
import { VenueId } from '../../common/types/index.js';
import {
  createMockDepthSource,
  makeOpportunity,
  makePipelineConfig,
  makeRawLevels,
} from '../../test/mock-factories.js';

function leg(overrides: Partial<SlippageEstimate> = {}): SlippageEstimate {
  return {
    marketId: 'market',
    side: 'buy',
    nominalSize: 100,
    averageFillPrice: 0.45,
    expectedFillPrice: 0.45,
    slippageAbsolute: 0,
    slippagePercentage: 0,
    priceImpact: null,
    liquidityConsumed: 0.2,
    canExecute: true,
    maxExecutableSize: 100,
    depthExhausted: false,
    levelsConsumed: [{ price: 0.45, size: 100 }],
    ...overrides,
  };
}

function pair(
  buy: Partial<SlippageEstimate> = {},
  sell: Partial<SlippageEstimate> = {},
): ArbitrageSlippage {
  return {
    buyLeg: leg(buy),
    sellLeg: leg({ side: 'sell', averageFillPrice: 0.5, ...sell }),
    buyVenue: { marketId: 'buy-market', venue: VenueId.POLYMARKET },
    sellVenue: { marketId: 'sell-market', venue: VenueId.PREDYX },
  };
}

describe('FeasibilityAssessorService', () => {
  let service: FeasibilityAssessorService;
  let depthSource: ReturnType<typeof createMockDepthSource>;

  beforeEach(async () => {
    depthSource = createMockDepthSource();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FeasibilityAssessorService,
        MarketDepthAnalyzerService,
        { provide: DEPTH_SOURCE_TOKEN, useValue: depthSource },
        { provide: PIPELINE_CONFIG_TOKEN, useValue: makePipelineConfig() },
      ],
    }).compile();

    service = module.get<FeasibilityAssessorService>(FeasibilityAssessorService);
  });

  // ============================================================
  // assessArbitrageFeasibility
  // ============================================================

  describe('assessArbitrageFeasibility', () => {
    it('accepts fully executable legs with enough edge', () => {
      const assessment = service.assessArbitrageFeasibility(
        pair({ slippagePercentage: 0.002 }, { slippagePercentage: 0.001 }),
        0.02,
        0.01,
      );

      expect(assessment.feasible).toBe(true);
      expect(assessment.constraints).toEqual([]);
      expect(assessment.maxSize).toBe(100);
      expect(assessment.totalSlippage).toBe(0.003);
      // (0.50 - 0.45) / 0.45 - 0.003
      expect(assessment.netEdgeAfterSlippage).toBeCloseTo(0.05 / 0.45 - 0.003, 12);
    });

    it('reports missing slippage calculations', () => {
      expect(service.assessArbitrageFeasibility(null, 0.02, 0.01)).toEqual({
        feasible: false,
        maxSize: 0,
        totalSlippage: 0,
        netEdgeAfterSlippage: null,
        constraints: ['Missing slippage calculations'],
      });
    });

    it('caps the size at the smaller partial fill', () => {
      const assessment = service.assessArbitrageFeasibility(
        pair({ canExecute: false, maxExecutableSize: 60, depthExhausted: true }),
        0.02,
        0.01,
      );

      expect(assessment.feasible).toBe(false);
      expect(assessment.maxSize).toBe(60);
      expect(assessment.constraints).toEqual([
        'Buy leg cannot execute full size (max: 60)',
      ]);
    });

    it('lists each slippage violation separately', () => {
      const assessment = service.assessArbitrageFeasibility(
        pair(
          { slippagePercentage: 0.015 },
          { averageFillPrice: 0.6, slippagePercentage: 0.012 },
        ),
        0.02,
        0.01,
      );

      expect(assessment.constraints).toEqual([
        'Buy leg slippage too high: 1.50% > 1.00%',
        'Sell leg slippage too high: 1.20% > 1.00%',
        'Combined slippage too high: 2.70% > 2.00%',
      ]);
    });

    it('rejects a net edge below target', () => {
      const assessment = service.assessArbitrageFeasibility(
        pair({ averageFillPrice: 0.5 }, { averageFillPrice: 0.505 }),
        0.02,
        0.01,
      );

      expect(assessment.netEdgeAfterSlippage).toBe(0.01);
      expect(assessment.constraints).toEqual(['Net edge too low: 1.00% < 2.00%']);
    });

    it('reports a leg that filled nothing', () => {
      const assessment = service.assessArbitrageFeasibility(
        pair({
          averageFillPrice: null,
          expectedFillPrice: null,
          slippagePercentage: null,
          canExecute: false,
          maxExecutableSize: 0,
          depthExhausted: true,
          levelsConsumed: [],
        }),
        0.02,
        0.01,
      );

      expect(assessment.netEdgeAfterSlippage).toBeNull();
      expect(assessment.constraints).toEqual([
        'Buy leg cannot execute full size (max: 0)',
        'Missing average fill price',
        'No executable size',
      ]);
    });

    it('is idempotent', () => {
      const input = pair({ slippagePercentage: 0.004 });

      expect(service.assessArbitrageFeasibility(input, 0.02, 0.01)).toEqual(
        service.assessArbitrageFeasibility(input, 0.02, 0.01),
      );
    });

    it('loses net edge strictly as slippage grows', { timeout: 30000 }, () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 500 }),
          fc.integer({ min: 1, max: 500 }),
          (lowBps, extraBps) => {
            const low = service.assessArbitrageFeasibility(
              pair({ slippagePercentage: lowBps / 10000 }),
              0.02,
              0.01,
            );
            const high = service.assessArbitrageFeasibility(
              pair({ slippagePercentage: (lowBps + extraBps) / 10000 }),
              0.02,
              0.01,
            );

            expect(high.netEdgeAfterSlippage ?? 0).toBeLessThan(
              low.netEdgeAfterSlippage ?? 0,
            );
          },
        ),
        { numRuns: 1000 },
      );
    });
  });

  // ============================================================
  // assessOpportunity
  // ============================================================

  describe('assessOpportunity', () => {
    const books: Record<string, ReturnType<typeof makeRawLevels>> = {
      'polymarket-btc-100k-market': makeRawLevels([[0.44, 500]], [[0.45, 500]]),
      'predyx-btc-100k-market': makeRawLevels([[0.5, 500]], [[0.51, 500]]),
    };

    it('prices both legs on live depth at the opportunity size', async () => {
      depthSource.getPriceLevels.mockImplementation((marketId) =>
        Promise.resolve(books[marketId] ?? []),
      );
      const opportunity = makeOpportunity();

      const assessed = await service.assessOpportunity(opportunity);

      expect(assessed.pricingSource).toBe('live_depth');
      expect(assessed.opportunity).toBe(opportunity);
      expect(assessed.slippage?.buyVenue).toEqual({
        marketId: 'polymarket-btc-100k-market',
        venue: VenueId.POLYMARKET,
      });
      expect(assessed.slippage?.buyLeg.nominalSize).toBe(100);
      expect(assessed.assessment?.feasible).toBe(true);
      expect(assessed.assessment?.maxSize).toBe(100);
      expect(depthSource.getPriceLevels).toHaveBeenCalledTimes(2);
    });

    it('marks live depth that cannot fill as infeasible', async () => {
      depthSource.getPriceLevels.mockImplementation((marketId) =>
        Promise.resolve(
          marketId === 'polymarket-btc-100k-market'
            ? makeRawLevels([[0.44, 500]], [[0.45, 40]])
            : (books[marketId] ?? []),
        ),
      );

      const assessed = await service.assessOpportunity(makeOpportunity());

      expect(assessed.pricingSource).toBe('live_depth');
      expect(assessed.assessment?.feasible).toBe(false);
      expect(assessed.assessment?.maxSize).toBe(40);
    });

    it('falls back to heuristic pricing when a depth fetch fails', async () => {
      depthSource.getPriceLevels.mockImplementation((marketId) =>
        marketId === 'predyx-btc-100k-market'
          ? Promise.reject(
              new MarketDataError(
                MARKET_DATA_ERROR_CODES.MARKET_NOT_FOUND,
                `Unknown market ${marketId}`,
                VenueId.PREDYX,
                marketId,
                'warning',
              ),
            )
          : Promise.resolve(books[marketId] ?? []),
      );

      const assessed = await service.assessOpportunity(makeOpportunity());

      expect(assessed).toMatchObject({
        pricingSource: 'heuristic',
        slippage: null,
        assessment: null,
      });
    });

    it('reports missing slippage when a book has no mid', async () => {
      depthSource.getPriceLevels.mockResolvedValue(
        makeRawLevels([[0.44, 500]], []),
      );

      const assessed = await service.assessOpportunity(makeOpportunity());

      expect(assessed.pricingSource).toBe('live_depth');
      expect(assessed.slippage).toBeNull();
      expect(assessed.assessment?.constraints).toEqual([
        'Missing slippage calculations',
      ]);
    });
  });

  it('uses the configured feasibility thresholds', async () => {
    const spy = vi.spyOn(service, 'assessArbitrageFeasibility');
    depthSource.getPriceLevels.mockResolvedValue(
      makeRawLevels([[0.44, 500]], [[0.45, 500]]),
    );

    await service.assessOpportunity(makeOpportunity());

    expect(spy).toHaveBeenCalledWith(expect.anything(), 0.02, 0.01);
  });
});
