/**
 * API Error Class Hierarchy
 *
 * Provides standardized error responses across all endpoints. Each error
 * type maps to an HTTP status code and a machine-readable code; the code
 * doubles as the key of the localized message in the `errors` namespace.
 *
 * ## Usage
 *
 * ```typescript
 * throw new EntityNotFoundError('post', slug);
 *
 * if (error instanceof ApiError) {
 *   res.status(error.statusCode).json(error.toResponse(requestId));
 * }
 * ```
 */

/**
 * Standard API error response structure
 */
export interface ApiErrorResponse {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

/**
 * Error codes for machine-readable error identification
 */
export const ErrorCodes = {
  // Not found errors (404)
  NOT_FOUND: 'NOT_FOUND',
  PAGE_NOT_FOUND: 'PAGE_NOT_FOUND',
  ENTITY_NOT_FOUND: 'ENTITY_NOT_FOUND',

  // Validation errors (400)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  UNSUPPORTED_LOCALE: 'UNSUPPORTED_LOCALE',

  // Conflict errors (409)
  CONFLICT: 'CONFLICT',
  DUPLICATE_ENTRY: 'DUPLICATE_ENTRY',

  // Internal errors (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base API Error class
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to API response format
   *
   * @param message - Localized message replacing the English default
   */
  toResponse(requestId?: string, message?: string): ApiErrorResponse {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: message ?? this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      requestId,
    };
  }

  static isApiError(error: unknown): error is ApiError {
    return error instanceof ApiError;
  }
}

// =============================================================================
// Not Found Errors (404)
// =============================================================================

export class NotFoundError extends ApiError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode = ErrorCodes.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, 404, code, details);
  }
}

export class PageNotFoundError extends NotFoundError {
  constructor(method: string, path: string) {
    super(`No page matches ${method} ${path}`, ErrorCodes.PAGE_NOT_FOUND, { method, path });
  }
}

export class EntityNotFoundError extends NotFoundError {
  constructor(entity: string, id: string) {
    super(`${entity} not found`, ErrorCodes.ENTITY_NOT_FOUND, { entity, id });
  }
}

// =============================================================================
// Validation Errors (400)
// =============================================================================

export class ValidationError extends ApiError {
  constructor(
    message: string = 'Validation failed',
    code: ErrorCode = ErrorCodes.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, 400, code, details);
  }
}

export class UnsupportedLocaleError extends ValidationError {
  constructor(locale: string) {
    super(`Unsupported locale: ${locale}`, ErrorCodes.UNSUPPORTED_LOCALE, { locale });
  }
}

// =============================================================================
// Conflict Errors (409)
// =============================================================================

export class ConflictError extends ApiError {
  constructor(
    message: string = 'Resource conflict',
    code: ErrorCode = ErrorCodes.CONFLICT,
    details?: Record<string, unknown>
  ) {
    super(message, 409, code, details);
  }
}

// =============================================================================
// Internal Errors (500)
// =============================================================================

export class InternalError extends ApiError {
  constructor(
    message: string = 'An unexpected error occurred',
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    isOperational: boolean = false
  ) {
    super(message, 500, code, details, isOperational);
  }
}
