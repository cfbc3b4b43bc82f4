import { Module } from '@nestjs/common';
import { EventMatcherService } from './event-matcher.service.js';
import { HumanReviewQueueService } from './human-review-queue.service.js';
import { MatchStrategyRegistry } from './match-strategy.registry.js';
import { LexicalSimilarityScorer } from './similarity/lexical-similarity.scorer.js';
import {
  EntityOverlapStrategy,
  ExactTitleStrategy,
  FuzzyTitleStrategy,
  ResolutionCriteriaStrategy,
  SemanticEmbeddingStrategy,
  TemporalAlignmentStrategy,
} from './strategies/index.js';
import {
  MATCH_STRATEGIES_TOKEN,
  REVIEW_SINK_TOKEN,
  SEMANTIC_SIMILARITY_SCORER_TOKEN,
} from './event-matching.constants.js';
import { MatchStrategy } from './types/index.js';

const STRATEGIES = [
  ExactTitleStrategy,
  FuzzyTitleStrategy,
  EntityOverlapStrategy,
  SemanticEmbeddingStrategy,
  ResolutionCriteriaStrategy,
  TemporalAlignmentStrategy,
];

@Module({
  providers: [
    ...STRATEGIES,
    {
      provide: MATCH_STRATEGIES_TOKEN,
      useFactory: (...strategies: MatchStrategy[]) => strategies,
      inject: STRATEGIES,
    },
    {
      provide: SEMANTIC_SIMILARITY_SCORER_TOKEN,
      useClass: LexicalSimilarityScorer,
    },
    MatchStrategyRegistry,
    HumanReviewQueueService,
    { provide: REVIEW_SINK_TOKEN, useExisting: HumanReviewQueueService },
    EventMatcherService,
  ],
  exports: [EventMatcherService, HumanReviewQueueService, REVIEW_SINK_TOKEN],
})
export class EventMatchingModule {}
