import { MatchResult } from '../types/index.js';

/**
 * Destination for matches that must not be acted on unattended.
 * Appended to by the matcher, drained front-first by a single reviewer.
 */
export interface IReviewSink {
  enqueue(match: MatchResult): void;
  dequeue(): MatchResult | null;
}
