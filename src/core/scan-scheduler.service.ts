import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EVENT_NAMES, ScanBackoffAppliedEvent } from '../common/events/index.js';
import { PIPELINE_CONFIG_TOKEN } from '../modules/pipeline-config/pipeline-config.constants.js';
import { PipelineConfig } from '../modules/pipeline-config/types/index.js';
import { ArbitrageScanService } from './arbitrage-scan.service.js';

export const SCAN_TIMEOUT_NAME = 'scanCycle';

/**
 * Continuous scan loop built on one-shot timeouts, so the delay can widen
 * between cycles. stop() only takes effect between cycles; a running cycle
 * is left to finish.
 */
@Injectable()
export class ScanSchedulerService implements OnApplicationBootstrap {
  private readonly logger = new Logger(ScanSchedulerService.name);
  private running = false;
  private consecutiveErrors = 0;
  private currentIntervalMs: number;

  constructor(
    private readonly scanService: ArbitrageScanService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly eventEmitter: EventEmitter2,
    private readonly configService: ConfigService,
    @Inject(PIPELINE_CONFIG_TOKEN) private readonly config: PipelineConfig,
  ) {
    this.currentIntervalMs = config.scan.intervalMs;
  }

  onApplicationBootstrap(): void {
    const autostart =
      this.configService.get<string>('SCAN_AUTOSTART', 'true') !== 'false';
    if (!autostart) {
      this.logger.log({
        message: 'Scan autostart disabled',
        module: 'core',
        data: { reason: 'SCAN_AUTOSTART=false' },
      });
      return;
    }
    this.start();
  }

  /** Begins scanning immediately. No-op when already running. */
  start(): void {
    if (this.running) return;

    this.running = true;
    this.consecutiveErrors = 0;
    this.currentIntervalMs = this.config.scan.intervalMs;
    this.scheduleNext(0);

    this.logger.log({
      message: 'Scan scheduler started',
      module: 'core',
      data: {
        intervalMs: this.currentIntervalMs,
        maxIntervalMs: this.config.scan.maxIntervalMs,
        venues: this.config.scan.venues,
      },
    });
  }

  stop(): void {
    if (!this.running) return;

    this.running = false;
    this.clearPending();
    this.logger.log({
      message: 'Scan scheduler stopped',
      module: 'core',
      data: { cycleInProgress: this.scanService.isCycleInProgress() },
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  getCurrentIntervalMs(): number {
    return this.currentIntervalMs;
  }

  getConsecutiveErrors(): number {
    return this.consecutiveErrors;
  }

  private scheduleNext(delayMs: number): void {
    this.clearPending();
    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(SCAN_TIMEOUT_NAME);
      void this.runScheduledCycle();
    }, delayMs);
    this.schedulerRegistry.addTimeout(SCAN_TIMEOUT_NAME, timeout);
  }

  private clearPending(): void {
    if (this.schedulerRegistry.doesExist('timeout', SCAN_TIMEOUT_NAME)) {
      this.schedulerRegistry.deleteTimeout(SCAN_TIMEOUT_NAME);
    }
  }

  private async runScheduledCycle(): Promise<void> {
    if (!this.running) return;

    if (this.scanService.isCycleInProgress()) {
      this.logger.debug({
        message: 'Skipping scan - cycle already in progress',
        module: 'core',
        data: { reason: 'cycle_in_progress' },
      });
    } else {
      await this.executeCycle();
    }

    if (this.running) {
      this.scheduleNext(this.currentIntervalMs);
    }
  }

  private async executeCycle(): Promise<void> {
    try {
      const result = await this.scanService.runCycle();
      if (result.allVenuesFailed) {
        this.recordError('all venues failed');
        return;
      }
      this.recordSuccess();
    } catch (error) {
      // Already logged by ArbitrageScanService; the loop keeps going
      this.recordError(error instanceof Error ? error.message : 'Unknown error');
    }
  }

  private recordSuccess(): void {
    if (
      this.consecutiveErrors > 0 ||
      this.currentIntervalMs !== this.config.scan.intervalMs
    ) {
      this.logger.log({
        message: 'Scan recovered, interval reset',
        module: 'core',
        data: {
          previousErrors: this.consecutiveErrors,
          intervalMs: this.config.scan.intervalMs,
        },
      });
    }
    this.consecutiveErrors = 0;
    this.currentIntervalMs = this.config.scan.intervalMs;
  }

  private recordError(reason: string): void {
    this.consecutiveErrors++;
    this.logger.warn({
      message: 'Scan cycle counted as failed',
      module: 'core',
      data: { reason, consecutiveErrors: this.consecutiveErrors },
    });

    if (this.consecutiveErrors < this.config.scan.maxConsecutiveErrors) {
      return;
    }

    const previousIntervalMs = this.currentIntervalMs;
    const nextIntervalMs = Math.min(
      previousIntervalMs * 2,
      this.config.scan.maxIntervalMs,
    );
    if (nextIntervalMs === previousIntervalMs) return;

    this.currentIntervalMs = nextIntervalMs;
    this.logger.warn({
      message: `Backing off scan interval to ${nextIntervalMs}ms`,
      module: 'core',
      data: {
        consecutiveErrors: this.consecutiveErrors,
        previousIntervalMs,
        nextIntervalMs,
      },
    });
    this.eventEmitter.emit(
      EVENT_NAMES.SCAN_BACKOFF_APPLIED,
      new ScanBackoffAppliedEvent(
        this.consecutiveErrors,
        previousIntervalMs,
        nextIntervalMs,
      ),
    );
  }
}
