export { ExactTitleStrategy } from './exact-title.strategy.js';
export { FuzzyTitleStrategy } from './fuzzy-title.strategy.js';
export { EntityOverlapStrategy } from './entity-overlap.strategy.js';
export { SemanticEmbeddingStrategy } from './semantic-embedding.strategy.js';
export { ResolutionCriteriaStrategy } from './resolution-criteria.strategy.js';
export { TemporalAlignmentStrategy } from './temporal-alignment.strategy.js';
