import { BaseEvent } from './base.event.js';

/**
 * Emitted when a match is placed on the human-review queue.
 * Carries identifiers only, to avoid a common/ → modules/ import.
 */
export class MatchReviewRequiredEvent extends BaseEvent {
  constructor(
    public readonly matchId: string,
    public readonly eventIdA: string,
    public readonly eventIdB: string,
    public readonly confidenceScore: number,
    public readonly riskFactors: string[],
    public readonly queueDepth: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export type ReviewOutcome = 'approved' | 'rejected';

export class MatchReviewResolvedEvent extends BaseEvent {
  constructor(
    public readonly matchId: string,
    public readonly outcome: ReviewOutcome,
    public readonly reviewer: string | null,
    public readonly reason: string | null,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
