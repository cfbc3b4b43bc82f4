import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type { IReviewSink } from '../../common/interfaces/index.js';
import {
  Event,
  MatchResult,
  MatchStrategyName,
} from '../../common/types/index.js';
import { FinancialDecimal } from '../../common/utils/index.js';
import { getCorrelationId } from '../../common/services/correlation-context.js';
import { PIPELINE_CONFIG_TOKEN } from '../pipeline-config/pipeline-config.constants.js';
import { PipelineConfig } from '../pipeline-config/types/index.js';
import { REVIEW_SINK_TOKEN } from './event-matching.constants.js';
import { MatchStrategyRegistry } from './match-strategy.registry.js';
import { detectRiskFactors, requiresHumanReview } from './risk-factors.js';
import { wholeDaysBetween } from './similarity/text-similarity.js';
import { MatchStrategy } from './types/index.js';

interface StrategyOutcome {
  readonly name: MatchStrategyName;
  readonly weight: number;
  readonly score: number | null;
}

/**
 * Links listings across venues by a weighted combination of independent strategies.
 * No single strategy can veto a pair. The risk/review gate is evaluated
 * separately and routes uncertain or risky matches to the review sink.
 */
@Injectable()
export class EventMatcherService {
  private readonly logger = new Logger(EventMatcherService.name);

  constructor(
    private readonly registry: MatchStrategyRegistry,
    @Inject(REVIEW_SINK_TOKEN) private readonly reviewSink: IReviewSink,
    @Inject(PIPELINE_CONFIG_TOKEN) private readonly config: PipelineConfig,
  ) {}

  /**
   * Scores every cross-venue pair concurrently and returns the pairs at or above
   * the confidence threshold. Matches needing review are also enqueued.
   */
  async findMatches(
    eventsA: readonly Event[],
    eventsB: readonly Event[],
  ): Promise<MatchResult[]> {
    const pairs = eventsA.flatMap((eventA) =>
      eventsB
        .filter((eventB) => eventB.venue !== eventA.venue)
        .map((eventB) => [eventA, eventB] as const),
    );

    const evaluated = await Promise.all(
      pairs.map(([eventA, eventB]) => this.evaluatePair(eventA, eventB)),
    );
    const matches = evaluated.filter(
      (match): match is MatchResult => match !== null,
    );

    let queued = 0;
    for (const match of matches) {
      if (match.humanReviewRequired) {
        this.reviewSink.enqueue(match);
        queued++;
      }
    }

    this.logger.log({
      message: `Matching: ${matches.length} matches from ${pairs.length} cross-venue pairs`,
      module: 'event-matching',
      correlationId: getCorrelationId(),
      data: {
        eventsA: eventsA.length,
        eventsB: eventsB.length,
        pairsEvaluated: pairs.length,
        matches: matches.length,
        queuedForReview: queued,
      },
    });

    return matches;
  }

  /**
   * Scores one pair. Null when the events share a venue, no strategy
   * contributed, or the confidence is below threshold.
   */
  async evaluatePair(eventA: Event, eventB: Event): Promise<MatchResult | null> {
    if (eventA.venue === eventB.venue) {
      return null;
    }

    const outcomes = await Promise.all(
      this.registry
        .getWeightedStrategies()
        .map(({ strategy, weight }) =>
          this.runStrategy(strategy, weight, eventA, eventB),
        ),
    );

    const contributing = outcomes.filter(
      (outcome): outcome is StrategyOutcome & { score: number } =>
        outcome.score !== null && outcome.score > 0,
    );
    if (contributing.length === 0) {
      return null;
    }

    const weightedSum = contributing.reduce(
      (sum, outcome) =>
        sum.plus(new FinancialDecimal(outcome.weight).mul(outcome.score)),
      new FinancialDecimal(0),
    );
    const confidenceScore = Math.min(weightedSum.toNumber(), 1);

    if (confidenceScore < this.config.matching.confidenceThreshold) {
      this.logger.debug({
        message: 'Pair below confidence threshold',
        module: 'event-matching',
        correlationId: getCorrelationId(),
        data: {
          eventA: eventA.eventId,
          eventB: eventB.eventId,
          confidence: confidenceScore,
          threshold: this.config.matching.confidenceThreshold,
        },
      });
      return null;
    }

    const deadlineDeltaDays = wholeDaysBetween(eventA.deadline, eventB.deadline);
    const riskFactors = detectRiskFactors(eventA, eventB, deadlineDeltaDays);
    const strategyScores: Partial<Record<MatchStrategyName, number>> = {};
    for (const outcome of contributing) {
      strategyScores[outcome.name] = outcome.score;
    }

    return {
      matchId: uuidv4(),
      eventA,
      eventB,
      confidenceScore,
      matchStrategies: contributing.map((outcome) => outcome.name),
      strategyScores,
      riskFactors,
      humanReviewRequired: requiresHumanReview(
        confidenceScore,
        riskFactors,
        deadlineDeltaDays,
      ),
      evaluatedAt: new Date(),
    };
  }

  private async runStrategy(
    strategy: MatchStrategy,
    weight: number,
    eventA: Event,
    eventB: Event,
  ): Promise<StrategyOutcome> {
    try {
      const raw = await strategy.score(eventA, eventB);
      const score =
        raw === null || !Number.isFinite(raw)
          ? null
          : Math.min(Math.max(raw, 0), 1);
      return { name: strategy.name, weight, score };
    } catch (error) {
      this.logger.warn({
        message: `Match strategy ${strategy.name} failed, skipping`,
        module: 'event-matching',
        correlationId: getCorrelationId(),
        data: {
          strategy: strategy.name,
          eventA: eventA.eventId,
          eventB: eventB.eventId,
          error: error instanceof Error ? error.message : 'Unknown error',
        },
      });
      return { name: strategy.name, weight, score: null };
    }
  }
}
