import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { EventEmitter2, OnEvent } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';
import {
  EVENT_NAMES,
  OpportunityAlertEvent,
  SpreadAlertEvent,
  SpreadAlertType,
} from '../../common/events/index.js';
import { VenueId } from '../../common/types/index.js';
import {
  getCorrelationId,
  withCorrelationId,
} from '../../common/services/correlation-context.js';
import { PIPELINE_CONFIG_TOKEN } from '../pipeline-config/pipeline-config.constants.js';
import {
  PipelineConfig,
  SpreadMonitorConfig,
  SpreadMonitorMarket,
} from '../pipeline-config/types/index.js';
import { MarketDepthAnalyzerService } from './market-depth-analyzer.service.js';
import {
  OrderbookDepth,
  SpreadAlert,
  SpreadSnapshot,
  SpreadSummary,
  SpreadTrend,
} from './types/index.js';

export const SPREAD_MONITOR_INTERVAL_NAME = 'spreadMonitor';

function toSnapshot(
  depth: OrderbookDepth,
  venue: VenueId | null,
  observedAt: Date,
): SpreadSnapshot {
  return {
    marketId: depth.marketId,
    venue: depth.venue ?? venue,
    spread: depth.spread,
    spreadPercentage: depth.spreadPercentage,
    midPrice: depth.midPrice,
    totalBidDepth: depth.totalBidDepth,
    totalAskDepth: depth.totalAskDepth,
    depthImbalance: depth.depthImbalance,
    observedAt,
  };
}

/** Relative change between two positive spreads, null otherwise. */
function relativeChange(
  previous: number | null,
  current: number | null,
): number | null {
  if (previous === null || current === null) return null;
  if (previous <= 0 || current <= 0) return null;
  return (current - previous) / previous;
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function trendOf(history: readonly SpreadSnapshot[]): SpreadTrend | null {
  const recent = history
    .map((snapshot) => snapshot.spreadPercentage)
    .filter((spread): spread is number => spread !== null && spread > 0)
    .slice(-3);
  const [first, , last] = recent;
  if (first === undefined || last === undefined) return null;
  if (last < first) return 'narrowing';
  if (last > first) return 'widening';
  return null;
}

/**
 * Polls order-book depth for a watch list of markets and flags spread
 * compression, spread expansion and one-sided books between polls.
 *
 * History is kept per market and trimmed to `historySize`. After any alert a
 * market stays quiet for `cooldownMs`. Polls never overlap.
 */
@Injectable()
export class SpreadMonitorService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(SpreadMonitorService.name);
  private readonly markets = new Map<string, VenueId | null>();
  private readonly history = new Map<string, SpreadSnapshot[]>();
  private readonly lastAlertAt = new Map<string, number>();
  private polling = false;

  constructor(
    private readonly depthAnalyzer: MarketDepthAnalyzerService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PIPELINE_CONFIG_TOKEN) private readonly config: PipelineConfig,
  ) {
    for (const market of config.spreadMonitor.markets) {
      this.markets.set(market.marketId, market.venue);
    }
  }

  private get settings(): SpreadMonitorConfig {
    return this.config.spreadMonitor;
  }

  onApplicationBootstrap(): void {
    if (this.settings.enabled) {
      this.start();
    }
  }

  onApplicationShutdown(): void {
    this.stop();
  }

  start(): void {
    if (this.isRunning()) return;

    const interval = setInterval(() => {
      void this.runScheduledPoll();
    }, this.settings.intervalMs);
    this.schedulerRegistry.addInterval(SPREAD_MONITOR_INTERVAL_NAME, interval);

    this.logger.log({
      message: 'Spread monitor started',
      module: 'market-depth',
      data: {
        intervalMs: this.settings.intervalMs,
        markets: this.markets.size,
      },
    });
  }

  stop(): void {
    if (!this.isRunning()) return;

    this.schedulerRegistry.deleteInterval(SPREAD_MONITOR_INTERVAL_NAME);
    this.logger.log({
      message: 'Spread monitor stopped',
      module: 'market-depth',
    });
  }

  isRunning(): boolean {
    return this.schedulerRegistry.doesExist(
      'interval',
      SPREAD_MONITOR_INTERVAL_NAME,
    );
  }

  /** @returns false when the market is already watched or the list is full */
  addMarket(marketId: string, venue: VenueId | null = null): boolean {
    if (this.markets.has(marketId)) return false;

    if (this.markets.size >= this.settings.maxMarkets) {
      this.logger.warn({
        message: `Spread monitor full, not watching ${marketId}`,
        module: 'market-depth',
        correlationId: getCorrelationId(),
        data: { marketId, maxMarkets: this.settings.maxMarkets },
      });
      return false;
    }

    this.markets.set(marketId, venue);
    this.logger.log({
      message: `Watching spread of ${marketId}`,
      module: 'market-depth',
      correlationId: getCorrelationId(),
      data: { marketId, venue, markets: this.markets.size },
    });
    return true;
  }

  removeMarket(marketId: string): boolean {
    this.history.delete(marketId);
    this.lastAlertAt.delete(marketId);
    return this.markets.delete(marketId);
  }

  getMonitoredMarkets(): SpreadMonitorMarket[] {
    return [...this.markets].map(([marketId, venue]) => ({ marketId, venue }));
  }

  getSpreadHistory(marketId: string): readonly SpreadSnapshot[] {
    return [...(this.history.get(marketId) ?? [])];
  }

  getSpreadSummary(): SpreadSummary[] {
    const summaries: SpreadSummary[] = [];
    for (const [marketId, venue] of this.markets) {
      const history = this.history.get(marketId) ?? [];
      const latest = history[history.length - 1];
      if (!latest) continue;
      summaries.push({
        marketId,
        venue: latest.venue ?? venue,
        spreadPercentage: latest.spreadPercentage,
        totalLiquidity: latest.totalBidDepth + latest.totalAskDepth,
        depthImbalance: latest.depthImbalance,
        trend: trendOf(history),
        lastUpdated: latest.observedAt,
      });
    }
    return summaries;
  }

  @OnEvent(EVENT_NAMES.OPPORTUNITY_ALERT)
  handleOpportunityAlert(event: OpportunityAlertEvent): void {
    if (!this.settings.trackAlertedMarkets) return;
    for (const leg of event.legs) {
      this.addMarket(leg.marketId, leg.venue);
    }
  }

  /**
   * Fetches every watched market once, records the snapshots and emits one
   * SpreadAlertEvent per finding. A market whose fetch fails is skipped.
   */
  async pollOnce(now: Date = new Date()): Promise<SpreadAlert[]> {
    if (this.polling) {
      this.logger.debug({
        message: 'Skipping spread poll - previous poll still running',
        module: 'market-depth',
        correlationId: getCorrelationId(),
        data: { reason: 'poll_in_progress' },
      });
      return [];
    }

    this.polling = true;
    try {
      const fetched = await Promise.all(
        [...this.markets].map(([marketId, venue]) =>
          this.fetchSnapshot(marketId, venue, now),
        ),
      );

      const alerts: SpreadAlert[] = [];
      for (const snapshot of fetched) {
        // Skip failed fetches and markets removed while the fetch was in flight
        if (!snapshot || !this.markets.has(snapshot.marketId)) continue;
        this.record(snapshot);
        alerts.push(...this.analyze(snapshot, now));
      }

      for (const alert of alerts) {
        this.emitAlert(alert);
      }
      if (alerts.length > 0) {
        this.logger.log({
          message: `Spread monitor raised ${alerts.length} alert(s)`,
          module: 'market-depth',
          correlationId: getCorrelationId(),
          data: {
            alerts: alerts.map((alert) => ({
              marketId: alert.marketId,
              type: alert.type,
            })),
          },
        });
      }
      return alerts;
    } finally {
      this.polling = false;
    }
  }

  private async runScheduledPoll(): Promise<void> {
    try {
      await withCorrelationId(() => this.pollOnce());
    } catch (error) {
      this.logger.error({
        message: 'Spread poll failed',
        module: 'market-depth',
        data: {
          error: error instanceof Error ? error.message : 'Unknown error',
        },
      });
    }
  }

  private async fetchSnapshot(
    marketId: string,
    venue: VenueId | null,
    now: Date,
  ): Promise<SpreadSnapshot | null> {
    try {
      const depth = await this.depthAnalyzer.getMarketDepth(marketId, venue);
      return toSnapshot(depth, venue, now);
    } catch (error) {
      this.logger.warn({
        message: `Spread poll skipped ${marketId}`,
        module: 'market-depth',
        correlationId: getCorrelationId(),
        data: {
          marketId,
          venue,
          error: error instanceof Error ? error.message : 'Unknown error',
        },
      });
      return null;
    }
  }

  private record(snapshot: SpreadSnapshot): void {
    const history = this.history.get(snapshot.marketId) ?? [];
    history.push(snapshot);
    while (history.length > this.settings.historySize) {
      history.shift();
    }
    this.history.set(snapshot.marketId, history);
  }

  private analyze(snapshot: SpreadSnapshot, now: Date): SpreadAlert[] {
    const { marketId } = snapshot;
    const lastAlert = this.lastAlertAt.get(marketId);
    if (
      lastAlert !== undefined &&
      now.getTime() - lastAlert < this.settings.cooldownMs
    ) {
      return [];
    }

    const history = this.history.get(marketId) ?? [];
    const previous = history[history.length - 2];
    if (!previous) return [];

    const alerts: SpreadAlert[] = [];
    const change = relativeChange(
      previous.spreadPercentage,
      snapshot.spreadPercentage,
    );
    if (change !== null && change <= -this.settings.compressionThreshold) {
      alerts.push(
        this.buildAlert(
          'compression',
          'medium',
          snapshot,
          previous,
          change,
          now,
          `Spread compressed by ${percent(-change)} on ${marketId}`,
        ),
      );
    } else if (change !== null && change >= this.settings.expansionThreshold) {
      alerts.push(
        this.buildAlert(
          'expansion',
          'low',
          snapshot,
          previous,
          change,
          now,
          `Spread widened by ${percent(change)} on ${marketId}`,
        ),
      );
    }

    const imbalance = snapshot.depthImbalance;
    if (
      imbalance !== null &&
      Math.abs(imbalance) >= this.settings.imbalanceThreshold
    ) {
      const heavySide = imbalance > 0 ? 'Bid' : 'Ask';
      alerts.push(
        this.buildAlert(
          'depth_imbalance',
          'medium',
          snapshot,
          previous,
          null,
          now,
          `${heavySide}-heavy depth imbalance (${percent(Math.abs(imbalance))}) on ${marketId}`,
        ),
      );
    }

    if (alerts.length > 0) {
      this.lastAlertAt.set(marketId, now.getTime());
    }
    return alerts;
  }

  private buildAlert(
    type: SpreadAlertType,
    severity: SpreadAlert['severity'],
    snapshot: SpreadSnapshot,
    previous: SpreadSnapshot,
    spreadChange: number | null,
    raisedAt: Date,
    message: string,
  ): SpreadAlert {
    return {
      type,
      marketId: snapshot.marketId,
      venue: snapshot.venue,
      severity,
      message,
      currentSpreadPercentage: snapshot.spreadPercentage,
      previousSpreadPercentage: previous.spreadPercentage,
      spreadChange,
      depthImbalance: snapshot.depthImbalance,
      raisedAt,
    };
  }

  private emitAlert(alert: SpreadAlert): void {
    this.eventEmitter.emit(
      EVENT_NAMES.SPREAD_ALERT,
      new SpreadAlertEvent(
        alert.type,
        alert.marketId,
        alert.venue,
        alert.severity,
        alert.message,
        alert.currentSpreadPercentage,
        alert.previousSpreadPercentage,
        alert.spreadChange,
        alert.depthImbalance,
      ),
    );
  }
}
