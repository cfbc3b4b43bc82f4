/**
 * Centralized catalog of all domain event names.
 * Use these constants when emitting or subscribing to events.
 *
 * Naming Convention:
 * - Event names: dot.notation.lowercase
 * - Constants: UPPER_SNAKE_CASE
 * - Event classes: PascalCase matching the action (e.g., MatchReviewRequiredEvent)
 */

export const EVENT_NAMES = {
  // ============================================================================
  // MATCHING
  // ============================================================================

  /** Emitted when a cross-venue match is queued for human review */
  MATCH_REVIEW_REQUIRED: 'matching.review.required',

  /** Emitted when a reviewer approves or rejects a queued match */
  MATCH_REVIEW_RESOLVED: 'matching.review.resolved',

  // ============================================================================
  // DETECTION & FEASIBILITY
  // ============================================================================

  /** Emitted when the detector produces an opportunity above the minimum edge */
  OPPORTUNITY_IDENTIFIED: 'detection.opportunity.identified',

  /** Emitted when an opportunity has been checked against live order-book depth */
  OPPORTUNITY_ASSESSED: 'feasibility.opportunity.assessed',

  /** Emitted when the spread monitor sees a market's spread or depth balance shift */
  SPREAD_ALERT: 'depth.spread.alert',

  // ============================================================================
  // SCAN LOOP
  // ============================================================================

  /** Emitted when an actionable opportunity clears the alert edge threshold */
  OPPORTUNITY_ALERT: 'scan.opportunity.alert',

  /** Emitted at the end of every scan cycle with its summary counts */
  SCAN_CYCLE_COMPLETED: 'scan.cycle.completed',

  /** Emitted when repeated cycle failures widen the poll interval */
  SCAN_BACKOFF_APPLIED: 'scan.backoff.applied',
} as const;

/**
 * Type-safe event name type derived from EVENT_NAMES object.
 * Ensures only valid event names can be used in emit/subscribe calls.
 */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
