/**
 * Base class for cleansing errors. `code` is stable and machine-readable.
 */
export abstract class CleansingError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown> | undefined;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Invalid label sets or age bounds. Raised while the registry is built,
 * so the application never starts with a broken vocabulary.
 */
export class ConfigurationError extends CleansingError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid cleansing configuration: ${reason}`, 'CONFIGURATION_ERROR', details);
  }
}

/**
 * The classification service could not be reached, timed out or answered
 * with an HTTP error. Recovered per field by the cleansers.
 */
export class ClassifierUnavailableError extends CleansingError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Classification service unavailable: ${reason}`, 'CLASSIFIER_UNAVAILABLE', details);
  }
}
