export type {
  DepthBucket,
  DepthPriceLevel,
  OrderbookDepth,
} from './orderbook-depth.type.js';
export type {
  ArbitrageSlippage,
  FilledLevel,
  MarketRef,
  SlippageEstimate,
  TradeSide,
} from './slippage.type.js';
export type {
  AssessedOpportunity,
  FeasibilityAssessment,
  PricingSource,
} from './feasibility.type.js';
export type {
  SpreadAlert,
  SpreadSnapshot,
  SpreadSummary,
  SpreadTrend,
} from './spread-monitor.type.js';
