import { Event, VenueId } from '../types/index.js';

/**
 * Boundary to venue connectors: listings already normalized into the canonical Event model.
 * Implementations may throw; the scan loop retries with backoff and isolates each venue.
 */
export interface IEventSource {
  listEvents(venue: VenueId): Promise<Event[]>;
}
