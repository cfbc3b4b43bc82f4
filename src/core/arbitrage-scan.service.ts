import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  MARKET_DATA_ERROR_CODES,
  MarketDataError,
  RETRY_STRATEGIES,
} from '../common/errors/index.js';
import {
  EVENT_NAMES,
  OpportunityAlertEvent,
  OpportunityAssessedEvent,
  OpportunityIdentifiedEvent,
  ScanCycleCompletedEvent,
} from '../common/events/index.js';
import type { IEventSource } from '../common/interfaces/index.js';
import { Event, MatchResult, VenueId } from '../common/types/index.js';
import { FinancialDecimal, withRetry, withTimeout } from '../common/utils/index.js';
import {
  getCorrelationId,
  withCorrelationId,
} from '../common/services/correlation-context.js';
import { EVENT_SOURCE_TOKEN } from '../connectors/connector.constants.js';
import { ArbitrageDetectorService } from '../modules/arbitrage-detection/arbitrage-detector.service.js';
import { ArbitrageOpportunity } from '../modules/arbitrage-detection/types/index.js';
import { EventMatcherService } from '../modules/event-matching/event-matcher.service.js';
import { FeasibilityAssessorService } from '../modules/market-depth/feasibility-assessor.service.js';
import { AssessedOpportunity } from '../modules/market-depth/types/index.js';
import { PIPELINE_CONFIG_TOKEN } from '../modules/pipeline-config/pipeline-config.constants.js';
import { PipelineConfig } from '../modules/pipeline-config/types/index.js';
import { ScanCycleResult } from './types/index.js';

interface VenueListing {
  readonly venue: VenueId;
  readonly events: Event[];
}

function describeOpportunity(
  opportunity: ArbitrageOpportunity,
  netEdge: number,
  size: number,
): string {
  const { legA, legB } = opportunity;
  return (
    `${legA.side} on ${legA.venue} @ ${legA.price.toFixed(4)} + ` +
    `${legB.side} on ${legB.venue} @ ${legB.price.toFixed(4)}, ` +
    `net edge ${new FinancialDecimal(netEdge).mul(100).toFixed(2)}% ` +
    `on ${size} contracts`
  );
}

/** Live-depth figures when there is a verdict, the detector's otherwise. */
function alertFigures(assessed: AssessedOpportunity): {
  netEdge: number;
  size: number;
} {
  const { opportunity, assessment } = assessed;
  if (assessed.pricingSource === 'live_depth' && assessment) {
    return {
      netEdge:
        assessment.netEdgeAfterSlippage ?? opportunity.netEdge.toNumber(),
      size: assessment.maxSize,
    };
  }
  return {
    netEdge: opportunity.netEdge.toNumber(),
    size: opportunity.maxPositionSize.toNumber(),
  };
}

/**
 * Runs one full pass of the pipeline: fetch, match, detect, assess.
 * Venues fail independently; a cycle in which all of them fail still
 * completes and reports allVenuesFailed.
 */
@Injectable()
export class ArbitrageScanService {
  private readonly logger = new Logger(ArbitrageScanService.name);
  private inflightCycles = 0;
  private readonly IDLE_CHECK_INTERVAL_MS = 100;

  constructor(
    @Inject(EVENT_SOURCE_TOKEN) private readonly eventSource: IEventSource,
    private readonly matcher: EventMatcherService,
    private readonly detector: ArbitrageDetectorService,
    private readonly assessor: FeasibilityAssessorService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PIPELINE_CONFIG_TOKEN) private readonly config: PipelineConfig,
  ) {}

  async runCycle(): Promise<ScanCycleResult> {
    return withCorrelationId(async () => {
      this.inflightCycles++;
      const startTime = Date.now();

      this.logger.log({
        message: 'Scan cycle started',
        module: 'core',
        correlationId: getCorrelationId(),
        data: { venues: this.config.scan.venues },
      });

      try {
        // STEP 1: Fetch listings per venue
        const fetchStart = Date.now();
        const { listings, venueFailures } = await this.fetchAllVenues();
        const eventsByVenue: Partial<Record<VenueId, number>> = {};
        for (const listing of listings) {
          eventsByVenue[listing.venue] = listing.events.length;
        }
        const allVenuesFailed =
          venueFailures.length === this.config.scan.venues.length;
        this.logStage('fetch', Date.now() - fetchStart, {
          eventsByVenue,
          venueFailures,
        });

        // STEP 2: Match every pair of venues
        const matchingStart = Date.now();
        const matches = await this.matchAllPairs(listings);
        this.logStage('matching', Date.now() - matchingStart, {
          matches: matches.length,
          flaggedForReview: matches.filter((m) => m.humanReviewRequired)
            .length,
        });

        // STEP 3: Detect
        const detectionStart = Date.now();
        const detected = this.detector.scanForArbitrage(matches);
        for (const opportunity of detected) {
          this.eventEmitter.emit(
            EVENT_NAMES.OPPORTUNITY_IDENTIFIED,
            new OpportunityIdentifiedEvent(
              opportunity.opportunityId,
              opportunity.match.matchId,
              opportunity.arbitrageType,
              opportunity.netEdge,
              opportunity.maxPositionSize,
              opportunity.expectedProfit,
            ),
          );
        }
        this.logStage('detection', Date.now() - detectionStart, {
          opportunities: detected.length,
        });

        // STEP 4: Re-check against live depth
        const assessmentStart = Date.now();
        const opportunities = await Promise.all(
          detected.map((opportunity) =>
            this.assessor.assessOpportunity(opportunity),
          ),
        );
        const actionable = opportunities.filter(
          (assessed) => assessed.assessment?.feasible === true,
        );
        for (const assessed of opportunities) {
          this.emitAssessed(assessed);
        }
        this.emitAlerts(actionable);
        this.logStage('assessment', Date.now() - assessmentStart, {
          assessed: opportunities.length,
          actionable: actionable.length,
          heuristicOnly: opportunities.filter(
            (assessed) => assessed.pricingSource === 'heuristic',
          ).length,
        });

        const durationMs = Date.now() - startTime;
        const eventsFetched = listings.reduce(
          (sum, listing) => sum + listing.events.length,
          0,
        );
        this.eventEmitter.emit(
          EVENT_NAMES.SCAN_CYCLE_COMPLETED,
          new ScanCycleCompletedEvent(
            eventsFetched,
            [...venueFailures],
            matches.length,
            matches.filter((m) => m.humanReviewRequired).length,
            detected.length,
            actionable.length,
            durationMs,
          ),
        );

        this.logger.log({
          message: `Scan cycle completed in ${durationMs}ms`,
          module: 'core',
          correlationId: getCorrelationId(),
          data: {
            cycle: 'complete',
            durationMs,
            eventsFetched,
            venueFailures,
            matches: matches.length,
            opportunities: detected.length,
            actionable: actionable.length,
          },
        });

        return {
          correlationId: getCorrelationId() ?? null,
          eventsByVenue,
          venueFailures,
          allVenuesFailed,
          matches,
          opportunities,
          actionable,
          durationMs,
        };
      } catch (error) {
        this.logger.error({
          message: 'Scan cycle failed',
          module: 'core',
          correlationId: getCorrelationId(),
          data: {
            cycle: 'error',
            durationMs: Date.now() - startTime,
            error: error instanceof Error ? error.message : 'Unknown error',
          },
        });
        throw error;
      } finally {
        this.inflightCycles--;
      }
    });
  }

  /** Used by the scheduler to skip overlapping cycles. */
  isCycleInProgress(): boolean {
    return this.inflightCycles > 0;
  }

  /**
   * Resolves once no cycle is running, or after timeoutMs with a warning.
   * Returns whether the engine went idle in time.
   */
  async waitForIdle(timeoutMs: number): Promise<boolean> {
    const startTime = Date.now();

    while (this.inflightCycles > 0) {
      if (Date.now() - startTime >= timeoutMs) {
        this.logger.warn({
          message: 'Timed out waiting for the scan cycle to finish',
          module: 'core',
          correlationId: getCorrelationId(),
          data: { inflightCycles: this.inflightCycles, timeoutMs },
        });
        return false;
      }
      await new Promise((resolve) =>
        setTimeout(resolve, this.IDLE_CHECK_INTERVAL_MS),
      );
    }
    return true;
  }

  private async fetchAllVenues(): Promise<{
    listings: VenueListing[];
    venueFailures: VenueId[];
  }> {
    const venues = this.config.scan.venues;
    const settled = await Promise.allSettled(
      venues.map((venue) => this.fetchVenueEvents(venue)),
    );

    const listings: VenueListing[] = [];
    const venueFailures: VenueId[] = [];
    settled.forEach((outcome, index) => {
      const venue = venues[index];
      if (venue === undefined) return;
      if (outcome.status === 'fulfilled') {
        listings.push({ venue, events: outcome.value });
        return;
      }
      venueFailures.push(venue);
      const reason: unknown = outcome.reason;
      this.logger.error({
        message: `Event fetch failed for ${venue}, continuing without it`,
        module: 'core',
        correlationId: getCorrelationId(),
        data: {
          venue,
          code: reason instanceof MarketDataError ? reason.code : undefined,
          error: reason instanceof Error ? reason.message : 'Unknown error',
        },
      });
    });

    return { listings, venueFailures };
  }

  private async fetchVenueEvents(venue: VenueId): Promise<Event[]> {
    const timeoutMs = this.config.scan.fetchTimeoutMs;
    try {
      return await withRetry(
        () =>
          withTimeout(
            this.eventSource.listEvents(venue),
            timeoutMs,
            () =>
              new MarketDataError(
                MARKET_DATA_ERROR_CODES.FETCH_TIMEOUT,
                `Event fetch for ${venue} timed out after ${timeoutMs}ms`,
                venue,
                null,
                'warning',
                RETRY_STRATEGIES.EVENT_FETCH,
              ),
          ),
        RETRY_STRATEGIES.EVENT_FETCH,
        {
          onRetry: (attempt, error) => {
            this.logger.warn({
              message: `Retrying event fetch for ${venue}`,
              module: 'core',
              correlationId: getCorrelationId(),
              data: { venue, attempt, error: error.message },
            });
          },
        },
      );
    } catch (error) {
      if (error instanceof MarketDataError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new MarketDataError(
        MARKET_DATA_ERROR_CODES.EVENT_FETCH_FAILED,
        `Event fetch failed for ${venue}: ${message}`,
        venue,
        null,
        'error',
        RETRY_STRATEGIES.EVENT_FETCH,
        { cause: message },
      );
    }
  }

  private async matchAllPairs(
    listings: readonly VenueListing[],
  ): Promise<MatchResult[]> {
    const pairs: [VenueListing, VenueListing][] = [];
    listings.forEach((listingA, i) => {
      for (const listingB of listings.slice(i + 1)) {
        pairs.push([listingA, listingB]);
      }
    });

    const results = await Promise.all(
      pairs.map(([listingA, listingB]) =>
        this.matcher.findMatches(listingA.events, listingB.events),
      ),
    );
    return results.flat();
  }

  private emitAssessed(assessed: AssessedOpportunity): void {
    const { opportunity, assessment } = assessed;
    this.eventEmitter.emit(
      EVENT_NAMES.OPPORTUNITY_ASSESSED,
      new OpportunityAssessedEvent(
        opportunity.opportunityId,
        assessed.pricingSource,
        assessment?.feasible ?? null,
        assessment?.maxSize ?? null,
        assessment?.netEdgeAfterSlippage ?? null,
        assessment ? [...assessment.constraints] : [],
      ),
    );
  }

  private emitAlerts(actionable: readonly AssessedOpportunity[]): void {
    const threshold = this.config.scan.alertEdgeThreshold;
    for (const assessed of actionable) {
      const { opportunity } = assessed;
      const { netEdge, size } = alertFigures(assessed);
      if (netEdge < threshold) continue;

      const summary = describeOpportunity(opportunity, netEdge, size);
      this.logger.log({
        message: `Opportunity alert: ${summary}`,
        module: 'core',
        correlationId: getCorrelationId(),
        data: {
          opportunityId: opportunity.opportunityId,
          pricingSource: assessed.pricingSource,
          netEdge,
          detectorNetEdge: opportunity.netEdge.toString(),
          threshold,
        },
      });
      this.eventEmitter.emit(
        EVENT_NAMES.OPPORTUNITY_ALERT,
        new OpportunityAlertEvent(
          opportunity.opportunityId,
          netEdge,
          threshold,
          summary,
          [opportunity.legA, opportunity.legB].map((leg) => ({
            venue: leg.venue,
            marketId: leg.marketId,
          })),
        ),
      );
    }
  }

  private logStage(
    stage: string,
    durationMs: number,
    data: Record<string, unknown>,
  ): void {
    this.logger.log({
      message: `Stage ${stage} completed in ${durationMs}ms`,
      module: 'core',
      correlationId: getCorrelationId(),
      data: { stage, durationMs, ...data },
    });
  }
}
