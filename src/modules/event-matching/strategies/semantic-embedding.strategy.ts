import { Inject, Injectable } from '@nestjs/common';
import { Event, MatchStrategyName } from '../../../common/types/index.js';
import type { ISemanticSimilarityScorer } from '../../../common/interfaces/index.js';
import { SEMANTIC_SIMILARITY_SCORER_TOKEN } from '../event-matching.constants.js';
import { MatchStrategy } from '../types/index.js';

/** Delegates title similarity to the injected scorer. */
@Injectable()
export class SemanticEmbeddingStrategy implements MatchStrategy {
  readonly name = MatchStrategyName.SEMANTIC_EMBEDDING;

  constructor(
    @Inject(SEMANTIC_SIMILARITY_SCORER_TOKEN)
    private readonly scorer: ISemanticSimilarityScorer,
  ) {}

  score(eventA: Event, eventB: Event): Promise<number | null> {
    return this.scorer.similarity(eventA.title, eventB.title);
  }
}
