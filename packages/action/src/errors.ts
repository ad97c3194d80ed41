/**
 * Error codes for every failure the action can report.
 * Used to identify error types programmatically.
 */
export enum ReportErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // External services
  AUTH_FAILED = 'AUTH_FAILED',
  NOT_FOUND = 'NOT_FOUND',
  SERVICE_FAILED = 'SERVICE_FAILED',

  // Caller input
  INVALID_INPUT = 'INVALID_INPUT',

  // Analysis outcome
  QUALITY_GATE_FAILED = 'QUALITY_GATE_FAILED',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all errors raised by the action
 */
export class ReportError extends Error {
  constructor(
    message: string,
    public readonly code: ReportErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ReportError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for structured logs
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Missing or invalid configuration. Raised before any network call.
 */
export class ConfigError extends ReportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ReportErrorCode.CONFIG_INVALID, context);
    this.name = 'ConfigError';
  }
}

/**
 * A credential was rejected by the analysis service or the code host
 */
export class AuthError extends ReportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ReportErrorCode.AUTH_FAILED, context);
    this.name = 'AuthError';
  }
}

/**
 * The referenced project or pull request does not exist
 */
export class NotFoundError extends ReportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ReportErrorCode.NOT_FOUND, context);
    this.name = 'NotFoundError';
  }
}

/**
 * Any other non-success response, transport failure or malformed payload
 */
export class ServiceError extends ReportError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ReportErrorCode.SERVICE_FAILED, context);
    this.name = 'ServiceError';
  }
}

/**
 * Map an HTTP status from an external service onto the error taxonomy.
 * 401 and 403 both mean the token cannot be used for the call.
 */
export function errorForStatus(
  status: number,
  message: string,
  context: Record<string, unknown>,
): ReportError {
  if (status === 401 || status === 403) {
    return new AuthError(message, context);
  }
  if (status === 404) {
    return new NotFoundError(message, context);
  }
  return new ServiceError(message, context);
}

/**
 * Helper function to wrap unknown errors with context
 * @param error - Unknown error object to wrap
 * @param context - Context message describing what operation failed
 * @param additionalContext - Optional additional context data
 */
export function wrapError(
  error: unknown,
  context: string,
  additionalContext?: Record<string, unknown>,
): ReportError {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;

  const wrappedError = new ReportError(
    `${context}: ${message}`,
    ReportErrorCode.INTERNAL_ERROR,
    additionalContext,
  );

  // Preserve original stack trace if available
  if (stack) {
    wrappedError.stack = `${wrappedError.stack}\n\nCaused by:\n${stack}`;
  }

  return wrappedError;
}

/**
 * Type guard to check if an error is a ReportError
 */
export function isReportError(error: unknown): error is ReportError {
  return error instanceof ReportError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
