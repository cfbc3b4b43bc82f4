import { Injectable } from '@nestjs/common';
import { Event, MatchStrategyName } from '../../../common/types/index.js';
import {
  jaccardSimilarity,
  normalizeTitle,
} from '../similarity/text-similarity.js';
import { MatchStrategy } from '../types/index.js';

/**
 * Jaccard overlap of the named entities.
 * Abstains when either listing names none: absence is not evidence of a mismatch.
 */
@Injectable()
export class EntityOverlapStrategy implements MatchStrategy {
  readonly name = MatchStrategyName.ENTITY_OVERLAP;

  score(eventA: Event, eventB: Event): number | null {
    const entitiesA = this.toEntitySet(eventA);
    const entitiesB = this.toEntitySet(eventB);
    if (entitiesA.size === 0 || entitiesB.size === 0) {
      return null;
    }
    return jaccardSimilarity(entitiesA, entitiesB);
  }

  private toEntitySet(event: Event): Set<string> {
    return new Set(
      event.entities
        .map((entity) => normalizeTitle(entity))
        .filter((entity) => entity.length > 0),
    );
  }
}
