import { Injectable } from '@nestjs/common';
import { Event, MatchStrategyName } from '../../../common/types/index.js';
import { normalizeTitle } from '../similarity/text-similarity.js';
import { MatchStrategy } from '../types/index.js';

@Injectable()
export class ExactTitleStrategy implements MatchStrategy {
  readonly name = MatchStrategyName.EXACT_TITLE;

  score(eventA: Event, eventB: Event): number {
    const titleA = normalizeTitle(eventA.title);
    if (titleA.length === 0) return 0;
    return titleA === normalizeTitle(eventB.title) ? 1 : 0;
  }
}
