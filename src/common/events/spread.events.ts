import { VenueId } from '../types/index.js';
import { BaseEvent } from './base.event.js';

export type SpreadAlertType = 'compression' | 'expansion' | 'depth_imbalance';

/**
 * One spread monitor finding for one market.
 * spreadChange is relative: -0.25 means the spread narrowed by a quarter.
 */
export class SpreadAlertEvent extends BaseEvent {
  constructor(
    public readonly alertType: SpreadAlertType,
    public readonly marketId: string,
    public readonly venue: VenueId | null,
    public readonly severity: 'low' | 'medium',
    public readonly message: string,
    public readonly currentSpreadPercentage: number | null,
    public readonly previousSpreadPercentage: number | null,
    public readonly spreadChange: number | null,
    public readonly depthImbalance: number | null,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
