import { Injectable } from '@nestjs/common';
import { Event, MatchStrategyName } from '../../../common/types/index.js';
import { jaccardSimilarity, tokenize } from '../similarity/text-similarity.js';
import { MatchStrategy } from '../types/index.js';

@Injectable()
export class ResolutionCriteriaStrategy implements MatchStrategy {
  readonly name = MatchStrategyName.RESOLUTION_CRITERIA;

  score(eventA: Event, eventB: Event): number | null {
    const tokensA = new Set(tokenize(eventA.resolutionCriteria));
    const tokensB = new Set(tokenize(eventB.resolutionCriteria));
    // No criteria text on one side: nothing to compare
    if (tokensA.size === 0 || tokensB.size === 0) {
      return null;
    }
    return jaccardSimilarity(tokensA, tokensB);
  }
}
