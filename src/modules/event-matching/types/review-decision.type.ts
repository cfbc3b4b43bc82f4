import { MatchResult } from '../../../common/types/index.js';
import { ReviewOutcome } from '../../../common/events/index.js';

export interface ReviewDecision {
  readonly match: MatchResult;
  readonly outcome: ReviewOutcome;
  readonly reviewer: string | null;
  readonly reason: string | null;
  readonly decidedAt: Date;
}
