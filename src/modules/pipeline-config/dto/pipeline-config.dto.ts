import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import {
  MatchStrategyName,
  VenueId,
  isMatchStrategyName,
} from '../../../common/types/index.js';
import { DEFAULT_STRATEGY_WEIGHTS } from '../pipeline-config.constants.js';

export class MatchingConfigDto {
  @IsNumber()
  @Min(0)
  @Max(1)
  confidenceThreshold: number = 0.75;

  @IsObject()
  strategyWeights: Record<string, unknown> = { ...DEFAULT_STRATEGY_WEIGHTS };
}

export class DetectionConfigDto {
  @IsNumber()
  @Min(0)
  @Max(1)
  minMatchConfidence: number = 0.7;

  @IsNumber()
  @Min(0)
  minEdgeThreshold: number = 0.02;

  @IsNumber()
  @Min(0)
  maxSlippageTolerance: number = 0.01;

  @IsNumber()
  @Min(0)
  @Max(1)
  liquidityFraction: number = 0.1;

  @IsNumber()
  @IsPositive()
  maxPositionSize: number = 10000;

  @IsNumber()
  @Min(0)
  unknownLiquidityPositionSize: number = 100;
}

export class DepthConfigDto {
  @IsNumber()
  @Min(0)
  minLevelSize: number = 10;

  @IsArray()
  @ArrayMinSize(1)
  @IsNumber({}, { each: true })
  @IsPositive({ each: true })
  @Max(1, { each: true })
  depthPercentages: number[] = [0.01, 0.05, 0.1];

  @IsInt()
  @IsPositive()
  fetchTimeoutMs: number = 10000;
}

export class FeasibilityConfigDto {
  @IsNumber()
  @Min(0)
  targetEdge: number = 0.02;

  @IsNumber()
  @Min(0)
  maxSlippagePerLeg: number = 0.01;
}

export class ScanConfigDto {
  @IsArray()
  @IsEnum(VenueId, { each: true })
  venues: VenueId[] = [VenueId.POLYMARKET, VenueId.PREDYX];

  @IsInt()
  @IsPositive()
  intervalMs: number = 300000;

  @IsInt()
  @IsPositive()
  maxIntervalMs: number = 600000;

  @IsInt()
  @Min(1)
  maxConsecutiveErrors: number = 3;

  @IsInt()
  @IsPositive()
  fetchTimeoutMs: number = 15000;

  @IsNumber()
  @Min(0)
  alertEdgeThreshold: number = 0.03;
}

export class SpreadMonitorMarketDto {
  @IsString()
  @IsNotEmpty()
  marketId!: string;

  @IsOptional()
  @IsEnum(VenueId)
  venue?: VenueId;
}

export class SpreadMonitorConfigDto {
  @IsBoolean()
  enabled: boolean = false;

  @IsInt()
  @IsPositive()
  intervalMs: number = 30000;

  @IsInt()
  @Min(2)
  historySize: number = 20;

  @IsNumber()
  @IsPositive()
  @Max(1)
  compressionThreshold: number = 0.2;

  @IsNumber()
  @IsPositive()
  expansionThreshold: number = 0.5;

  @IsNumber()
  @IsPositive()
  @Max(1)
  imbalanceThreshold: number = 0.3;

  @IsInt()
  @Min(0)
  cooldownMs: number = 300000;

  @IsBoolean()
  trackAlertedMarkets: boolean = true;

  @IsInt()
  @IsPositive()
  maxMarkets: number = 50;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SpreadMonitorMarketDto)
  markets: SpreadMonitorMarketDto[] = [];
}

export class FeeScheduleDto {
  @IsEnum(VenueId)
  venue!: VenueId;

  @IsNumber()
  @Min(0)
  @Max(1)
  tradingFeeRate!: number;

  @IsNumber()
  @Min(0)
  fixedCost!: number;

  @IsOptional()
  @IsString()
  description?: string;
}

export class PipelineConfigDto {
  @ValidateNested()
  @Type(() => MatchingConfigDto)
  matching: MatchingConfigDto = new MatchingConfigDto();

  @ValidateNested()
  @Type(() => DetectionConfigDto)
  detection: DetectionConfigDto = new DetectionConfigDto();

  @ValidateNested()
  @Type(() => DepthConfigDto)
  depth: DepthConfigDto = new DepthConfigDto();

  @ValidateNested()
  @Type(() => FeasibilityConfigDto)
  feasibility: FeasibilityConfigDto = new FeasibilityConfigDto();

  @ValidateNested()
  @Type(() => ScanConfigDto)
  scan: ScanConfigDto = new ScanConfigDto();

  @ValidateNested()
  @Type(() => SpreadMonitorConfigDto)
  spreadMonitor: SpreadMonitorConfigDto = new SpreadMonitorConfigDto();

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => FeeScheduleDto)
  fees!: FeeScheduleDto[];

  /**
   * Rules that span fields, run after the class-validator decorators.
   * Returns human-readable errors; empty when the config is coherent.
   */
  static validateCrossFieldRules(config: PipelineConfigDto): string[] {
    const errors: string[] = [];

    const weights = Object.entries(config.matching.strategyWeights);
    if (weights.length === 0) {
      errors.push('matching.strategyWeights: at least one strategy is required');
    }
    for (const [name, weight] of weights) {
      if (!isMatchStrategyName(name)) {
        errors.push(
          `matching.strategyWeights.${name}: unknown strategy (expected one of ${Object.values(MatchStrategyName).join(', ')})`,
        );
        continue;
      }
      if (typeof weight !== 'number' || !(weight >= 0 && weight <= 1)) {
        errors.push(
          `matching.strategyWeights.${name}: weight must be a number between 0 and 1`,
        );
      }
    }

    const feeVenues = new Set<VenueId>();
    for (const [index, fee] of config.fees.entries()) {
      if (feeVenues.has(fee.venue)) {
        errors.push(`fees[${index}].venue: duplicate fee schedule for ${fee.venue}`);
      }
      feeVenues.add(fee.venue);
    }

    const scanVenues = new Set(config.scan.venues);
    if (scanVenues.size !== config.scan.venues.length) {
      errors.push('scan.venues: venues must be distinct');
    }
    if (scanVenues.size < 2) {
      errors.push('scan.venues: at least two venues are required to match across');
    }
    for (const venue of scanVenues) {
      if (!feeVenues.has(venue)) {
        errors.push(`fees: missing fee schedule for scanned venue ${venue}`);
      }
    }

    if (config.scan.maxIntervalMs < config.scan.intervalMs) {
      errors.push(
        `scan.maxIntervalMs: must be at least scan.intervalMs (${config.scan.intervalMs})`,
      );
    }

    const monitored = config.spreadMonitor.markets.map((m) => m.marketId);
    if (new Set(monitored).size !== monitored.length) {
      errors.push('spreadMonitor.markets: market ids must be distinct');
    }
    if (monitored.length > config.spreadMonitor.maxMarkets) {
      errors.push(
        `spreadMonitor.markets: at most spreadMonitor.maxMarkets (${config.spreadMonitor.maxMarkets}) markets`,
      );
    }

    return errors;
  }
}
