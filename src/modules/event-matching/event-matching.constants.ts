export const REVIEW_SINK_TOKEN = 'IReviewSink';
export const SEMANTIC_SIMILARITY_SCORER_TOKEN = 'ISemanticSimilarityScorer';
export const MATCH_STRATEGIES_TOKEN = 'MatchStrategies';

/** Matches below this confidence always go to a human, even when accepted */
export const REVIEW_CONFIDENCE_THRESHOLD = 0.9;
/** Deadlines further apart than this (whole days) require review */
export const REVIEW_DEADLINE_TOLERANCE_DAYS = 1;
/** Deadlines further apart than this (whole days) are flagged as a risk factor */
export const DEADLINE_MISMATCH_RISK_DAYS = 7;
/** Temporal alignment score reaches 0 at this many days apart */
export const TEMPORAL_DECAY_DAYS = 30;
/** Dequeued matches kept for a late approve/reject; the oldest is dropped beyond this */
export const MAX_DEQUEUED_AWAITING_DECISION = 100;
