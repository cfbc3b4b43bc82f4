import { vi } from 'vitest';
import {
  ContractSide,
  Event,
  MarketType,
  MatchResult,
  MatchStrategyName,
  RawPriceLevel,
  VenueId,
  resolveMarketId,
} from '../common/types/index.js';
import { FinancialDecimal } from '../common/utils/index.js';
import {
  ArbitrageOpportunity,
  ArbitrageType,
  OpportunityLeg,
} from '../modules/arbitrage-detection/types/index.js';
import { PipelineConfig } from '../modules/pipeline-config/types/index.js';

export const TEST_DEADLINE = new Date('2026-11-03T23:59:59Z');

export function makeSide(overrides: Partial<ContractSide> = {}): ContractSide {
  const price = overrides.price ?? 0.5;
  return {
    sideId: `side-${overrides.name ?? 'YES'}`,
    name: 'YES',
    price,
    impliedProbability: price,
    volume24h: 5000,
    liquidity: 20000,
    ...overrides,
  };
}

/**
 * Binary listing with YES/NO sides priced at `yesPrice` / `noPrice`.
 * Pass contractSides to replace the sides entirely.
 */
export function makeEvent(
  overrides: Partial<Event> & { yesPrice?: number; noPrice?: number } = {},
): Event {
  const { yesPrice = 0.55, noPrice = 0.45, ...rest } = overrides;
  const venue = rest.venue ?? VenueId.POLYMARKET;
  const eventId = rest.eventId ?? `${venue}-btc-100k`;
  return {
    eventId,
    sourceIds: { [venue]: `${eventId}-market` },
    title: 'Will Bitcoin close above $100,000 on November 3, 2026?',
    entities: ['Bitcoin'],
    category: 'crypto',
    resolutionCriteria:
      'Resolves YES if the BTC/USD daily close on November 3, 2026 is above 100000 per the reference index.',
    resolutionSourceUrl: 'https://example.com/btc-index',
    deadline: TEST_DEADLINE,
    venue,
    marketType: MarketType.BINARY,
    contractSides: [
      makeSide({ name: 'YES', price: yesPrice }),
      makeSide({ name: 'NO', price: noPrice }),
    ],
    feeSchedule: null,
    totalVolume: 250000,
    ...rest,
  };
}

export function makeMatch(overrides: Partial<MatchResult> = {}): MatchResult {
  return {
    matchId: 'match-1',
    eventA: makeEvent({ venue: VenueId.POLYMARKET, yesPrice: 0.55 }),
    eventB: makeEvent({ venue: VenueId.PREDYX, noPrice: 0.4 }),
    confidenceScore: 0.95,
    matchStrategies: [MatchStrategyName.EXACT_TITLE],
    strategyScores: { [MatchStrategyName.EXACT_TITLE]: 1 },
    riskFactors: [],
    humanReviewRequired: false,
    evaluatedAt: new Date('2026-10-01T00:00:00Z'),
    ...overrides,
  };
}

function makeLeg(event: Event, side: string, price: number): OpportunityLeg {
  return {
    venue: event.venue,
    eventId: event.eventId,
    marketId: resolveMarketId(event),
    side,
    price: new FinancialDecimal(price),
    totalCost: new FinancialDecimal(price),
    feeSchedule: { venue: event.venue, tradingFeeRate: 0, fixedCost: 0 },
    slippage: {
      value: new FinancialDecimal(0.001),
      source: 'liquidity_bucket',
    },
    positionSize: {
      value: new FinancialDecimal(100),
      source: 'liquidity_fraction',
    },
  };
}

/** YES on polymarket at 0.55 + NO on predyx at 0.40, sized at 100 contracts. */
export function makeOpportunity(
  overrides: Partial<ArbitrageOpportunity> = {},
): ArbitrageOpportunity {
  const match = overrides.match ?? makeMatch();
  return {
    opportunityId: 'opp-1',
    match,
    arbitrageType: ArbitrageType.PURE,
    legA: makeLeg(match.eventA, 'YES', 0.55),
    legB: makeLeg(match.eventB, 'NO', 0.4),
    grossEdge: new FinancialDecimal(0.05),
    netEdge: new FinancialDecimal(0.048),
    maxPositionSize: new FinancialDecimal(100),
    expectedProfit: new FinancialDecimal(4.8),
    slippageEstimate: new FinancialDecimal(0.002),
    timingRiskScore: 0,
    resolutionRiskScore: 0.05,
    confidenceScore: match.confidenceScore,
    detectedAt: new Date('2026-10-01T00:00:00Z'),
    expiresAt: TEST_DEADLINE,
    ...overrides,
  };
}

/** Raw levels from `[price, size]` tuples: bids are BUY, asks are SELL. */
export function makeRawLevels(
  bids: readonly (readonly [number, number])[],
  asks: readonly (readonly [number, number])[],
): RawPriceLevel[] {
  return [
    ...bids.map(
      ([price, size]): RawPriceLevel => ({ price, side: 'BUY', size }),
    ),
    ...asks.map(
      ([price, size]): RawPriceLevel => ({ price, side: 'SELL', size }),
    ),
  ];
}

/** Pipeline config with production defaults and zero fees on both test venues. */
export function makePipelineConfig(
  overrides: Partial<PipelineConfig> = {},
): PipelineConfig {
  return {
    matching: {
      confidenceThreshold: 0.75,
      strategyWeights: {
        [MatchStrategyName.EXACT_TITLE]: 0.3,
        [MatchStrategyName.FUZZY_TITLE]: 0.2,
        [MatchStrategyName.ENTITY_OVERLAP]: 0.2,
        [MatchStrategyName.SEMANTIC_EMBEDDING]: 0.15,
        [MatchStrategyName.RESOLUTION_CRITERIA]: 0.1,
        [MatchStrategyName.TEMPORAL_ALIGNMENT]: 0.05,
      },
    },
    detection: {
      minMatchConfidence: 0.7,
      minEdgeThreshold: 0.02,
      maxSlippageTolerance: 0.01,
      liquidityFraction: 0.1,
      maxPositionSize: 10000,
      unknownLiquidityPositionSize: 100,
    },
    depth: {
      minLevelSize: 10,
      depthPercentages: [0.01, 0.05, 0.1],
      fetchTimeoutMs: 1000,
    },
    feasibility: {
      targetEdge: 0.02,
      maxSlippagePerLeg: 0.01,
    },
    scan: {
      venues: [VenueId.POLYMARKET, VenueId.PREDYX],
      intervalMs: 60000,
      maxIntervalMs: 240000,
      maxConsecutiveErrors: 3,
      fetchTimeoutMs: 1000,
      alertEdgeThreshold: 0.03,
    },
    spreadMonitor: {
      enabled: false,
      intervalMs: 30000,
      historySize: 20,
      compressionThreshold: 0.2,
      expansionThreshold: 0.5,
      imbalanceThreshold: 0.3,
      cooldownMs: 300000,
      trackAlertedMarkets: true,
      maxMarkets: 50,
      markets: [],
    },
    fees: {
      [VenueId.POLYMARKET]: {
        venue: VenueId.POLYMARKET,
        tradingFeeRate: 0,
        fixedCost: 0,
      },
      [VenueId.PREDYX]: {
        venue: VenueId.PREDYX,
        tradingFeeRate: 0,
        fixedCost: 0,
      },
    },
    ...overrides,
  };
}

/**
 * Creates a mock review sink with vi.fn() methods.
 */
export const createMockReviewSink = () => ({
  enqueue: vi.fn(),
  dequeue: vi.fn().mockReturnValue(null),
});

export const createMockEventEmitter = () => ({
  emit: vi.fn(),
});

export const createMockDepthSource = () => ({
  getPriceLevels: vi.fn<(marketId: string) => Promise<RawPriceLevel[]>>(),
});

export const createMockEventSource = () => ({
  listEvents: vi.fn<(venue: VenueId) => Promise<Event[]>>(),
});
