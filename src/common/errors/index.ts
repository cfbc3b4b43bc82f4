export { SystemError } from './system-error.js';
export type { ErrorSeverity, RetryStrategy } from './system-error.js';
export {
  MarketDataError,
  MARKET_DATA_ERROR_CODES,
  RETRY_STRATEGIES,
} from './market-data-error.js';
export { ConfigValidationError } from './config-validation-error.js';
