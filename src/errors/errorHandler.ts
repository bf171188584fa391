/**
 * Error Handler Middleware
 *
 * Express middleware for catching and formatting API errors.
 * Converts all errors to standardized ApiErrorResponse format, with the
 * message translated into the request's active locale.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiError, InternalError, ConflictError, PageNotFoundError, ValidationError, ErrorCodes } from './ApiError';
import { i18nService } from '../i18n/i18nService';
import { isForeignKeyViolation, isUniqueViolation } from '../models/db';
import { createLogger } from '../utils/logger';
import { requestContext } from '../utils/requestContext';

const log = createLogger('ErrorHandler');

/**
 * Map database driver errors to API errors
 */
function mapDatabaseError(error: unknown): ApiError | null {
  if (isUniqueViolation(error)) {
    return new ConflictError('A record with this value already exists', ErrorCodes.DUPLICATE_ENTRY);
  }
  if (isForeignKeyViolation(error)) {
    return new ValidationError('Referenced record does not exist', ErrorCodes.INVALID_INPUT);
  }
  return null;
}

/**
 * Message for an error code in the request's locale. Detail values are
 * available to the message as interpolation variables; the English message
 * is used when no translation exists.
 */
function localizedMessage(error: ApiError, req: Request): string {
  const variables: Record<string, string | number | boolean> = {};
  for (const [name, value] of Object.entries(error.details ?? {})) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      variables[name] = value;
    }
  }

  return i18nService.translate('errors', error.code, {
    values: variables,
    locale: req.activeLocale?.locale,
    defaultValue: error.message,
  });
}

function send(error: ApiError, req: Request, res: Response): void {
  const requestId = requestContext.getRequestId();
  res.status(error.statusCode).json(error.toResponse(requestId, localizedMessage(error, req)));
}

/**
 * Main error handler middleware
 *
 * Should be registered last in the middleware chain.
 *
 * ```typescript
 * app.use(errorHandler);
 * ```
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const databaseError = mapDatabaseError(error);
  if (databaseError) {
    log.warn(`Database constraint violation: ${databaseError.code}`, { message: error.message });
    send(databaseError, req, res);
    return;
  }

  // Handle API errors
  if (error instanceof ApiError) {
    // Log operational errors at warn level, programming errors at error level
    if (error.isOperational) {
      log.warn(`API Error: ${error.code}`, {
        message: error.message,
        statusCode: error.statusCode,
        details: error.details,
      });
    } else {
      log.error(`Unexpected API Error: ${error.code}`, {
        message: error.message,
        stack: error.stack,
        details: error.details,
      });
    }

    send(error, req, res);
    return;
  }

  // Handle unknown errors
  log.error('Unhandled error', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });

  send(new InternalError(), req, res);
}

/**
 * Async handler wrapper
 *
 * Wraps async route handlers to automatically catch and forward errors.
 *
 * ```typescript
 * router.get('/blog/:slug', asyncHandler(async (req, res) => {
 *   const post = await content.getPostBySlug(locale, req.params.slug);
 *   if (!post) throw new EntityNotFoundError('post', req.params.slug);
 *   res.json(post);
 * }));
 * ```
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found handler for undefined routes
 *
 * Should be registered after all routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  send(new PageNotFoundError(req.method, req.path), req, res);
}
