export type { IEventSource } from './event-source.interface.js';
export type { IDepthSource } from './depth-source.interface.js';
export type { IReviewSink } from './review-sink.interface.js';
export type { ISemanticSimilarityScorer } from './semantic-similarity.interface.js';
