import { Module } from '@nestjs/common';
import { ConnectorModule } from '../../connectors/connector.module.js';
import { FeasibilityAssessorService } from './feasibility-assessor.service.js';
import { MarketDepthAnalyzerService } from './market-depth-analyzer.service.js';
import { SpreadMonitorService } from './spread-monitor.service.js';

@Module({
  imports: [ConnectorModule],
  providers: [
    MarketDepthAnalyzerService,
    FeasibilityAssessorService,
    SpreadMonitorService,
  ],
  exports: [
    MarketDepthAnalyzerService,
    FeasibilityAssessorService,
    SpreadMonitorService,
  ],
})
export class MarketDepthModule {}
