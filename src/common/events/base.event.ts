import { getCorrelationId } from '../services/correlation-context.js';

/**
 * Common envelope of every domain event on the EventEmitter2 bus.
 * Events built during a scan cycle pick up that cycle's correlation id
 * unless one is passed explicitly; outside a cycle it is null.
 */
export abstract class BaseEvent {
  readonly timestamp = new Date();
  readonly correlationId: string | null;

  protected constructor(correlationId?: string) {
    this.correlationId = correlationId ?? getCorrelationId() ?? null;
  }
}
