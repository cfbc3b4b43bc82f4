import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * Module-level AsyncLocalStorage for correlation IDs.
 * Not a NestJS provider: the storage is a process-wide singleton so that
 * events and plain functions can read it without injection.
 */
const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Runs `fn` inside a correlation context. Every log line and domain event
 * produced during one scan cycle carries the same id.
 *
 * @param correlationId reuse an id handed in from elsewhere; a fresh UUID v4 otherwise
 *
 * @example
 * await withCorrelationId(async () => {
 *   this.logger.log({ message: 'Scan cycle started', correlationId: getCorrelationId() });
 *   await this.matcher.findMatches(a, b);
 * });
 */
export function withCorrelationId<T>(
  fn: () => Promise<T>,
  correlationId: string = uuidv4(),
): Promise<T> {
  return correlationStorage.run(correlationId, fn);
}

/** Current correlation id, or undefined outside any context. */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
