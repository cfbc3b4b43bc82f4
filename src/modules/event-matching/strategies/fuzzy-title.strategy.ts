import { Injectable } from '@nestjs/common';
import { Event, MatchStrategyName } from '../../../common/types/index.js';
import {
  levenshteinSimilarity,
  normalizeTitle,
} from '../similarity/text-similarity.js';
import { MatchStrategy } from '../types/index.js';

/** Edit-distance similarity of the normalized titles. */
@Injectable()
export class FuzzyTitleStrategy implements MatchStrategy {
  readonly name = MatchStrategyName.FUZZY_TITLE;

  score(eventA: Event, eventB: Event): number {
    return levenshteinSimilarity(
      normalizeTitle(eventA.title),
      normalizeTitle(eventB.title),
    );
  }
}
