import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { IReviewSink } from '../../common/interfaces/index.js';
import { MatchResult } from '../../common/types/index.js';
import {
  EVENT_NAMES,
  MatchReviewRequiredEvent,
  MatchReviewResolvedEvent,
  ReviewOutcome,
} from '../../common/events/index.js';
import { getCorrelationId } from '../../common/services/correlation-context.js';
import { MAX_DEQUEUED_AWAITING_DECISION } from './event-matching.constants.js';
import { ReviewDecision } from './types/index.js';

function pairKey(match: MatchResult): string {
  return [match.eventA.eventId, match.eventB.eventId].sort().join('::');
}

/**
 * FIFO queue of matches awaiting a human decision.
 *
 * The only shared mutable structure in the pipeline. All methods are
 * synchronous, so each runs to completion on the event loop without interleaving.
 * A pair already waiting is not queued again by later scan cycles.
 * Dequeued matches stay decidable until MAX_DEQUEUED_AWAITING_DECISION
 * newer ones have been dequeued.
 */
@Injectable()
export class HumanReviewQueueService implements IReviewSink {
  private readonly logger = new Logger(HumanReviewQueueService.name);
  private readonly queue: MatchResult[] = [];
  private readonly pendingPairs = new Set<string>();
  private readonly queuedMatches = new Map<string, MatchResult>();
  // Insertion order doubles as eviction order
  private readonly dequeuedAwaitingDecision = new Map<string, MatchResult>();
  private readonly decisions: ReviewDecision[] = [];

  constructor(private readonly eventEmitter: EventEmitter2) {}

  enqueue(match: MatchResult): void {
    const key = pairKey(match);
    if (this.pendingPairs.has(key)) {
      this.logger.debug({
        message: 'Pair already awaiting review, not queued again',
        module: 'event-matching',
        correlationId: getCorrelationId(),
        data: { matchId: match.matchId, pair: key },
      });
      return;
    }

    this.queue.push(match);
    this.pendingPairs.add(key);
    this.queuedMatches.set(match.matchId, match);

    this.logger.log({
      message: 'Match queued for human review',
      module: 'event-matching',
      correlationId: getCorrelationId(),
      data: {
        matchId: match.matchId,
        confidence: match.confidenceScore,
        riskFactors: match.riskFactors,
        queueDepth: this.queue.length,
      },
    });

    this.eventEmitter.emit(
      EVENT_NAMES.MATCH_REVIEW_REQUIRED,
      new MatchReviewRequiredEvent(
        match.matchId,
        match.eventA.eventId,
        match.eventB.eventId,
        match.confidenceScore,
        [...match.riskFactors],
        this.queue.length,
      ),
    );
  }

  /** Oldest waiting match, or null when the queue is empty. */
  dequeue(): MatchResult | null {
    const match = this.queue.shift();
    if (!match) return null;
    this.pendingPairs.delete(pairKey(match));
    this.queuedMatches.delete(match.matchId);
    this.rememberDequeued(match);
    return match;
  }

  size(): number {
    return this.queue.length;
  }

  peekAll(): readonly MatchResult[] {
    return [...this.queue];
  }

  approve(matchId: string, reviewer?: string): ReviewDecision | null {
    return this.decide(matchId, 'approved', reviewer ?? null, null);
  }

  reject(
    matchId: string,
    reason: string,
    reviewer?: string,
  ): ReviewDecision | null {
    return this.decide(matchId, 'rejected', reviewer ?? null, reason);
  }

  getDecisions(): readonly ReviewDecision[] {
    return [...this.decisions];
  }

  private rememberDequeued(match: MatchResult): void {
    this.dequeuedAwaitingDecision.set(match.matchId, match);
    if (this.dequeuedAwaitingDecision.size <= MAX_DEQUEUED_AWAITING_DECISION) {
      return;
    }
    const oldest = this.dequeuedAwaitingDecision.keys().next();
    if (!oldest.done) {
      this.dequeuedAwaitingDecision.delete(oldest.value);
    }
  }

  private decide(
    matchId: string,
    outcome: ReviewOutcome,
    reviewer: string | null,
    reason: string | null,
  ): ReviewDecision | null {
    const match =
      this.queuedMatches.get(matchId) ??
      this.dequeuedAwaitingDecision.get(matchId);
    if (!match) {
      this.logger.warn({
        message: 'Review decision for unknown match ignored',
        module: 'event-matching',
        correlationId: getCorrelationId(),
        data: { matchId, outcome },
      });
      return null;
    }

    // A decision taken straight from the pending list removes it from the queue
    const index = this.queue.findIndex((queued) => queued.matchId === matchId);
    if (index >= 0) {
      this.queue.splice(index, 1);
      this.pendingPairs.delete(pairKey(match));
    }
    this.queuedMatches.delete(matchId);
    this.dequeuedAwaitingDecision.delete(matchId);

    const decision: ReviewDecision = {
      match,
      outcome,
      reviewer,
      reason,
      decidedAt: new Date(),
    };
    this.decisions.push(decision);

    this.logger.log({
      message: `Match ${outcome} by reviewer`,
      module: 'event-matching',
      correlationId: getCorrelationId(),
      data: { matchId, outcome, reviewer, reason },
    });
    this.eventEmitter.emit(
      EVENT_NAMES.MATCH_REVIEW_RESOLVED,
      new MatchReviewResolvedEvent(matchId, outcome, reviewer, reason),
    );

    return decision;
  }
}
