import Decimal from 'decimal.js';
import { BaseEvent } from './base.event.js';

/**
 * Emitted when an arbitrage opportunity meets the minimum edge threshold.
 */
export class OpportunityIdentifiedEvent extends BaseEvent {
  constructor(
    public readonly opportunityId: string,
    public readonly matchId: string,
    public readonly arbitrageType: string,
    public readonly netEdge: Decimal,
    public readonly maxPositionSize: Decimal,
    public readonly expectedProfit: Decimal,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

/**
 * Emitted after an opportunity is re-priced against live depth.
 * feasible is null when depth could not be fetched and the heuristic numbers stand.
 */
export class OpportunityAssessedEvent extends BaseEvent {
  constructor(
    public readonly opportunityId: string,
    public readonly pricingSource: 'live_depth' | 'heuristic',
    public readonly feasible: boolean | null,
    public readonly maxSize: number | null,
    public readonly netEdgeAfterSlippage: number | null,
    public readonly constraints: string[],
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
