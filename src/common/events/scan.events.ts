import { VenueId } from '../types/index.js';
import { BaseEvent } from './base.event.js';

export interface AlertedLeg {
  readonly venue: VenueId;
  readonly marketId: string;
}

/** Hand-off point for alert delivery. */
export class OpportunityAlertEvent extends BaseEvent {
  constructor(
    public readonly opportunityId: string,
    public readonly netEdge: number,
    public readonly alertThreshold: number,
    public readonly summary: string,
    public readonly legs: readonly AlertedLeg[] = [],
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class ScanCycleCompletedEvent extends BaseEvent {
  constructor(
    public readonly eventsFetched: number,
    public readonly venueFailures: string[],
    public readonly matchesFound: number,
    public readonly queuedForReview: number,
    public readonly opportunitiesDetected: number,
    public readonly actionableOpportunities: number,
    public readonly durationMs: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class ScanBackoffAppliedEvent extends BaseEvent {
  constructor(
    public readonly consecutiveErrors: number,
    public readonly previousIntervalMs: number,
    public readonly nextIntervalMs: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
