export type {
  PipelineConfig,
  MatchingConfig,
  DetectionConfig,
  DepthConfig,
  FeasibilityConfig,
  ScanConfig,
  SpreadMonitorConfig,
  SpreadMonitorMarket,
} from './pipeline-config.type.js';
