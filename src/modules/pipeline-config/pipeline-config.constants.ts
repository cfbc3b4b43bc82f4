import { MatchStrategyName } from '../../common/types/index.js';

export const PIPELINE_CONFIG_TOKEN = 'PipelineConfig';

export const DEFAULT_PIPELINE_CONFIG_PATH = 'config/pipeline.yaml';

export const DEFAULT_STRATEGY_WEIGHTS: Readonly<Record<MatchStrategyName, number>> = {
  [MatchStrategyName.EXACT_TITLE]: 0.3,
  [MatchStrategyName.FUZZY_TITLE]: 0.2,
  [MatchStrategyName.ENTITY_OVERLAP]: 0.2,
  [MatchStrategyName.SEMANTIC_EMBEDDING]: 0.15,
  [MatchStrategyName.RESOLUTION_CRITERIA]: 0.1,
  [MatchStrategyName.TEMPORAL_ALIGNMENT]: 0.05,
};
