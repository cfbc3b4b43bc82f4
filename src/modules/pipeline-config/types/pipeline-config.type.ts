import { MatchStrategyName, VenueFeeSchedule, VenueId } from '../../../common/types/index.js';

export interface MatchingConfig {
  /** Minimum weighted confidence for a pair to be emitted */
  readonly confidenceThreshold: number;
  /** Active strategies and their weights; strategies not listed do not run */
  readonly strategyWeights: Readonly<Partial<Record<MatchStrategyName, number>>>;
}

export interface DetectionConfig {
  /** Confidence floor applied before any economics are computed */
  readonly minMatchConfidence: number;
  readonly minEdgeThreshold: number;
  /** Two-leg heuristic slippage above which an opportunity is dropped */
  readonly maxSlippageTolerance: number;
  readonly liquidityFraction: number;
  readonly maxPositionSize: number;
  /** Contracts assumed executable when a leg reports no liquidity */
  readonly unknownLiquidityPositionSize: number;
}

export interface DepthConfig {
  /** Levels smaller than this are treated as dust and discarded */
  readonly minLevelSize: number;
  /** Distances from mid (0.01 = 1%) for the depth-within buckets */
  readonly depthPercentages: readonly number[];
  readonly fetchTimeoutMs: number;
}

export interface FeasibilityConfig {
  readonly targetEdge: number;
  readonly maxSlippagePerLeg: number;
}

export interface ScanConfig {
  readonly venues: readonly VenueId[];
  readonly intervalMs: number;
  readonly maxIntervalMs: number;
  readonly maxConsecutiveErrors: number;
  readonly fetchTimeoutMs: number;
  /** Compared to the live-depth net edge; the detector's edge only without a verdict */
  readonly alertEdgeThreshold: number;
}

export interface SpreadMonitorMarket {
  readonly marketId: string;
  readonly venue: VenueId | null;
}

export interface SpreadMonitorConfig {
  /** Poll on an interval from startup; markets can still be polled on demand when off */
  readonly enabled: boolean;
  readonly intervalMs: number;
  /** Snapshots kept per market, oldest dropped first */
  readonly historySize: number;
  /** Relative spread drop (0.2 = 20%) that raises a compression alert */
  readonly compressionThreshold: number;
  /** Relative spread rise (0.5 = 50%) that raises an expansion alert */
  readonly expansionThreshold: number;
  /** |depth imbalance| at or above which a one-sided book is reported */
  readonly imbalanceThreshold: number;
  /** Quiet period per market after any alert */
  readonly cooldownMs: number;
  /** Watch both legs of every opportunity alert */
  readonly trackAlertedMarkets: boolean;
  readonly maxMarkets: number;
  readonly markets: readonly SpreadMonitorMarket[];
}

/** Validated pipeline configuration, supplied to services through PIPELINE_CONFIG_TOKEN. */
export interface PipelineConfig {
  readonly matching: MatchingConfig;
  readonly detection: DetectionConfig;
  readonly depth: DepthConfig;
  readonly feasibility: FeasibilityConfig;
  readonly scan: ScanConfig;
  readonly spreadMonitor: SpreadMonitorConfig;
  readonly fees: Readonly<Partial<Record<VenueId, VenueFeeSchedule>>>;
}
