import { Inject, Injectable } from '@nestjs/common';
import { ConfigValidationError } from '../../common/errors/index.js';
import { PIPELINE_CONFIG_TOKEN } from '../pipeline-config/pipeline-config.constants.js';
import { PipelineConfig } from '../pipeline-config/types/index.js';
import { MATCH_STRATEGIES_TOKEN } from './event-matching.constants.js';
import { MatchStrategy, WeightedStrategy } from './types/index.js';

/**
 * Pairs every registered strategy with its configured weight.
 * Registration order is preserved so results list strategies deterministically.
 */
@Injectable()
export class MatchStrategyRegistry {
  private readonly weighted: readonly WeightedStrategy[];

  constructor(
    @Inject(MATCH_STRATEGIES_TOKEN)
    strategies: MatchStrategy[],
    @Inject(PIPELINE_CONFIG_TOKEN)
    config: PipelineConfig,
  ) {
    const weights = config.matching.strategyWeights;
    const registered = new Set(strategies.map((strategy) => strategy.name));
    const unregistered = Object.keys(weights).filter(
      (name) => !strategies.some((strategy) => strategy.name === name),
    );
    if (unregistered.length > 0) {
      throw new ConfigValidationError(
        'Strategy weights reference unregistered strategies',
        unregistered.map(
          (name) =>
            `matching.strategyWeights.${name}: no strategy registered (registered: ${[...registered].join(', ')})`,
        ),
      );
    }

    this.weighted = strategies.flatMap((strategy) => {
      const weight = weights[strategy.name];
      // Unlisted or zero-weight strategies are disabled
      return weight !== undefined && weight > 0 ? [{ strategy, weight }] : [];
    });
  }

  getWeightedStrategies(): readonly WeightedStrategy[] {
    return this.weighted;
  }
}
