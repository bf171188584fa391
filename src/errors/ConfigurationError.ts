/**
 * Startup configuration failures.
 *
 * Raised while building the locale registry or the route table. These are
 * never caught by request handling; the process exits.
 */
export class ConfigurationError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  static isConfigurationError(error: unknown): error is ConfigurationError {
    return error instanceof ConfigurationError;
  }
}
