export { BaseEvent } from './base.event.js';
export { EVENT_NAMES } from './event-catalog.js';
export type { EventName } from './event-catalog.js';
export {
  MatchReviewRequiredEvent,
  MatchReviewResolvedEvent,
} from './matching.events.js';
export type { ReviewOutcome } from './matching.events.js';
export {
  OpportunityIdentifiedEvent,
  OpportunityAssessedEvent,
} from './detection.events.js';
export { SpreadAlertEvent } from './spread.events.js';
export type { SpreadAlertType } from './spread.events.js';
export {
  OpportunityAlertEvent,
  ScanCycleCompletedEvent,
  ScanBackoffAppliedEvent,
} from './scan.events.js';
export type { AlertedLeg } from './scan.events.js';
