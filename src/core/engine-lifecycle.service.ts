import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ArbitrageScanService } from './arbitrage-scan.service.js';
import { ScanSchedulerService } from './scan-scheduler.service.js';

/** Docker grants 15s after SIGTERM; leave 3s for Nest to close the rest. */
export const SHUTDOWN_TIMEOUT_MS = 12000;

/**
 * Startup summary and graceful shutdown: stop scheduling, then wait for
 * the in-flight cycle to drain.
 */
@Injectable()
export class EngineLifecycleService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(EngineLifecycleService.name);

  constructor(
    private readonly scanService: ArbitrageScanService,
    private readonly scheduler: ScanSchedulerService,
    private readonly configService: ConfigService,
  ) {}

  onApplicationBootstrap(): void {
    this.logger.log({
      message: 'Engine startup complete',
      timestamp: new Date().toISOString(),
      module: 'core',
      configSummary: {
        environment: this.configService.get<string>('NODE_ENV', 'development'),
        scannerRunning: this.scheduler.isRunning(),
        intervalMs: this.scheduler.getCurrentIntervalMs(),
      },
    });
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log({
      message: 'Graceful shutdown initiated',
      timestamp: new Date().toISOString(),
      module: 'core',
      signal: signal || 'UNKNOWN',
    });

    try {
      this.scheduler.stop();
      const drained = await this.scanService.waitForIdle(SHUTDOWN_TIMEOUT_MS);

      this.logger.log({
        message: drained
          ? 'Shutdown complete'
          : 'Shutdown complete with a scan cycle still running',
        timestamp: new Date().toISOString(),
        module: 'core',
      });
    } catch (error) {
      this.logger.error({
        message: 'Error during shutdown',
        timestamp: new Date().toISOString(),
        module: 'core',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}
