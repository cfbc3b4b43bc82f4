import { Module } from '@nestjs/common';
import { ArbitrageDetectorService } from './arbitrage-detector.service.js';

@Module({
  providers: [ArbitrageDetectorService],
  exports: [ArbitrageDetectorService],
})
export class ArbitrageDetectionModule {}
