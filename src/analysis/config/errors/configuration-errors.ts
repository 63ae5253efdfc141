/**
 * Configuration Error Definitions
 */

/**
 * Configuration Invalid Error - Fatal
 * Raised at start-up before any document is read
 */
export class ConfigurationInvalidError extends Error {
  constructor(public readonly violations: string[]) {
    super(`Invalid analyzer configuration: ${violations.join('; ')}`);
    this.name = 'ConfigurationInvalidError';
    Error.captureStackTrace(this, this.constructor);
  }
}
