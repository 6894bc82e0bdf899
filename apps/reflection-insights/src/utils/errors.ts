/**
 * Reflection Insights Error Classes
 *
 * The aggregators never throw; these types describe failures at the
 * decode boundary and in configuration.
 */

/**
 * Base application error
 */
export class AnalyticsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AnalyticsError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Encoded input could not be turned into typed records
 */
export class DecodeError extends AnalyticsError {
  constructor(message: string, details?: unknown) {
    super(message, 'DECODE_ERROR', details);
    this.name = 'DecodeError';
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AnalyticsError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Type guard for AnalyticsError
 */
export const isAnalyticsError = (error: unknown): error is AnalyticsError => {
  return error instanceof AnalyticsError;
};

/**
 * Normalize any thrown value into an AnalyticsError
 */
export const handleError = (error: unknown): AnalyticsError => {
  if (isAnalyticsError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AnalyticsError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }

  return new AnalyticsError('An unknown error occurred', 'UNKNOWN_ERROR', {
    originalError: String(error),
  });
};
