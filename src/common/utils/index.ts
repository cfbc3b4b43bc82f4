export { withRetry } from './with-retry.js';
export type { RetryOptions } from './with-retry.js';
export { withTimeout } from './with-timeout.js';
export { FinancialMath, FinancialDecimal } from './financial-math.js';
export { flattenValidationErrors, isRecord } from './validation.js';
