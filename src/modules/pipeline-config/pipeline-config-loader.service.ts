import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';

import { ConfigValidationError } from '../../common/errors/index.js';
import {
  MatchStrategyName,
  VenueFeeSchedule,
  VenueId,
  isMatchStrategyName,
} from '../../common/types/index.js';
import { flattenValidationErrors, isRecord } from '../../common/utils/index.js';
import { PipelineConfigDto } from './dto/pipeline-config.dto.js';
import { DEFAULT_PIPELINE_CONFIG_PATH } from './pipeline-config.constants.js';
import { PipelineConfig } from './types/index.js';

/**
 * Loads the pipeline thresholds and venue fee schedules from YAML.
 * Every problem is collected and reported in one ConfigValidationError,
 * which aborts startup.
 */
@Injectable()
export class PipelineConfigLoaderService {
  private readonly logger = new Logger(PipelineConfigLoaderService.name);

  constructor(private readonly configService: ConfigService) {}

  async load(): Promise<PipelineConfig> {
    const configPath = this.resolveConfigPath();
    const rawContent = this.readConfigFile(configPath);
    const parsed = this.parseYaml(rawContent, configPath);
    const config = await this.fromObject(parsed);

    this.logger.log({
      message: `Pipeline config loaded from ${configPath}`,
      module: 'pipeline-config',
      data: {
        venues: config.scan.venues,
        feeSchedules: Object.keys(config.fees).length,
        strategies: Object.keys(config.matching.strategyWeights),
      },
    });

    return config;
  }

  /** Validates an already-parsed document. */
  async fromObject(parsed: Record<string, unknown>): Promise<PipelineConfig> {
    const dto = plainToInstance(PipelineConfigDto, parsed);
    const errors = flattenValidationErrors(await validate(dto));

    // Cross-field rules assume well-typed fields
    if (errors.length === 0) {
      errors.push(...PipelineConfigDto.validateCrossFieldRules(dto));
    }

    if (errors.length > 0) {
      throw new ConfigValidationError(
        `Pipeline config validation failed with ${errors.length} error(s)`,
        errors,
      );
    }

    return this.toPipelineConfig(dto);
  }

  private resolveConfigPath(): string {
    const configPath = this.configService.get<string>(
      'PIPELINE_CONFIG_PATH',
      DEFAULT_PIPELINE_CONFIG_PATH,
    );
    return path.resolve(process.cwd(), configPath);
  }

  private readConfigFile(configPath: string): string {
    if (!fs.existsSync(configPath)) {
      throw new ConfigValidationError(
        `Pipeline config file not found: ${configPath}`,
        [`File not found: ${configPath}`],
      );
    }
    return fs.readFileSync(configPath, 'utf-8');
  }

  private parseYaml(
    content: string,
    configPath: string,
  ): Record<string, unknown> {
    let result: unknown;
    try {
      result = yaml.load(content);
    } catch (error) {
      const message =
        error instanceof Error ? error.message : 'Unknown YAML parse error';
      throw new ConfigValidationError(
        `Failed to parse YAML config at ${configPath}: ${message}`,
        [message],
      );
    }
    if (!isRecord(result)) {
      throw new ConfigValidationError(
        `Failed to parse YAML config at ${configPath}: file is empty or does not contain a valid object`,
        ['YAML content is empty or not an object'],
      );
    }
    return result;
  }

  private toPipelineConfig(dto: PipelineConfigDto): PipelineConfig {
    const strategyWeights: Partial<Record<MatchStrategyName, number>> = {};
    for (const [name, weight] of Object.entries(dto.matching.strategyWeights)) {
      if (isMatchStrategyName(name) && typeof weight === 'number') {
        strategyWeights[name] = weight;
      }
    }

    const fees: Partial<Record<VenueId, VenueFeeSchedule>> = {};
    for (const fee of dto.fees) {
      fees[fee.venue] = {
        venue: fee.venue,
        tradingFeeRate: fee.tradingFeeRate,
        fixedCost: fee.fixedCost,
        description: fee.description,
      };
    }

    return {
      matching: {
        confidenceThreshold: dto.matching.confidenceThreshold,
        strategyWeights,
      },
      detection: { ...dto.detection },
      depth: {
        minLevelSize: dto.depth.minLevelSize,
        depthPercentages: [...dto.depth.depthPercentages],
        fetchTimeoutMs: dto.depth.fetchTimeoutMs,
      },
      feasibility: { ...dto.feasibility },
      scan: {
        ...dto.scan,
        venues: [...dto.scan.venues],
      },
      spreadMonitor: {
        ...dto.spreadMonitor,
        markets: dto.spreadMonitor.markets.map((market) => ({
          marketId: market.marketId,
          venue: market.venue ?? null,
        })),
      },
      fees,
    };
  }
}
