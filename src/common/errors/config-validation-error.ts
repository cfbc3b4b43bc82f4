import { SystemError } from './system-error.js';

/**
 * Thrown when pipeline or snapshot configuration fails validation at startup.
 * Code 4010, severity critical: the scanner cannot run on a partial config.
 */
export class ConfigValidationError extends SystemError {
  constructor(
    message: string,
    public readonly validationErrors: string[],
  ) {
    super(4010, message, 'critical', undefined, { validationErrors });
  }
}
