import { Module } from '@nestjs/common';
import { ConnectorModule } from '../connectors/connector.module.js';
import { ArbitrageDetectionModule } from '../modules/arbitrage-detection/arbitrage-detection.module.js';
import { EventMatchingModule } from '../modules/event-matching/event-matching.module.js';
import { MarketDepthModule } from '../modules/market-depth/market-depth.module.js';
import { ArbitrageScanService } from './arbitrage-scan.service.js';
import { EngineLifecycleService } from './engine-lifecycle.service.js';
import { ScanSchedulerService } from './scan-scheduler.service.js';

/**
 * Scan orchestration: one cycle service, the loop that drives it and the
 * lifecycle hooks around both.
 */
@Module({
  imports: [
    ConnectorModule, // EVENT_SOURCE for ArbitrageScanService
    EventMatchingModule,
    ArbitrageDetectionModule,
    MarketDepthModule,
  ],
  providers: [ArbitrageScanService, ScanSchedulerService, EngineLifecycleService],
  exports: [ArbitrageScanService, ScanSchedulerService],
})
export class CoreModule {}
