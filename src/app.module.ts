import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { LoggerModule } from 'nestjs-pino';
import { loggerConfig } from './common/config/logger.config.js';
import { ConnectorModule } from './connectors/connector.module.js';
import { CoreModule } from './core/core.module.js';
import { ArbitrageDetectionModule } from './modules/arbitrage-detection/arbitrage-detection.module.js';
import { EventMatchingModule } from './modules/event-matching/event-matching.module.js';
import { MarketDepthModule } from './modules/market-depth/market-depth.module.js';
import { PipelineConfigModule } from './modules/pipeline-config/pipeline-config.module.js';

@Module({
  imports: [
    // CRITICAL: LoggerModule MUST be first to replace default logger early
    LoggerModule.forRoot(loggerConfig),

    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env.${process.env.NODE_ENV || 'development'}`,
    }),
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 25,
      verboseMemoryLeak: true,
    }),
    ScheduleModule.forRoot(), // SchedulerRegistry for the scan loop
    PipelineConfigModule,
    ConnectorModule,
    EventMatchingModule,
    ArbitrageDetectionModule,
    MarketDepthModule,
    CoreModule,
  ],
})
export class AppModule {}
