import { Injectable } from '@nestjs/common';
import { Event, MatchStrategyName } from '../../../common/types/index.js';
import { wholeDaysBetween } from '../similarity/text-similarity.js';
import {
  REVIEW_DEADLINE_TOLERANCE_DAYS,
  TEMPORAL_DECAY_DAYS,
} from '../event-matching.constants.js';
import { MatchStrategy } from '../types/index.js';

/**
 * 1 within a day of each other, then linear decay to 0 at TEMPORAL_DECAY_DAYS.
 */
@Injectable()
export class TemporalAlignmentStrategy implements MatchStrategy {
  readonly name = MatchStrategyName.TEMPORAL_ALIGNMENT;

  score(eventA: Event, eventB: Event): number | null {
    const days = wholeDaysBetween(eventA.deadline, eventB.deadline);
    if (days === null) return null;
    if (days <= REVIEW_DEADLINE_TOLERANCE_DAYS) return 1;
    return Math.max(0, 1 - days / TEMPORAL_DECAY_DAYS);
  }
}
