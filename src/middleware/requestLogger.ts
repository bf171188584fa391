/**
 * Request Logger Middleware
 *
 * Provides request correlation IDs and request lifecycle logging.
 * - Assigns unique request ID to each incoming request
 * - Logs request start and completion with duration
 * - Makes request context available throughout the request lifecycle
 * - Sets X-Request-ID response header for client correlation
 */

import { Request, Response, NextFunction } from 'express';
import { requestContext, type RequestContextData } from '../utils/requestContext';
import { createLogger } from '../utils/logger';

const log = createLogger('HTTP');

/**
 * Paths to exclude from detailed logging (health checks, etc.)
 */
const EXCLUDED_PATHS = ['/health', '/favicon.ico'];

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.length > 0 ? first : undefined;
}

/**
 * Request logger middleware
 *
 * Wraps each request in a context with a unique request ID.
 * Logs request start and completion with timing information.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  // Generate or use existing request ID (from load balancer/proxy)
  const requestId =
    headerValue(req.headers['x-request-id']) ??
    headerValue(req.headers['x-correlation-id']) ??
    requestContext.generateRequestId();

  const context: RequestContextData = {
    requestId,
    startTime: Date.now(),
    path: req.path,
    method: req.method,
  };

  res.setHeader('X-Request-ID', requestId);

  const isExcluded = EXCLUDED_PATHS.includes(req.path);

  requestContext.run(context, () => {
    if (!isExcluded) {
      log.info(`${req.method} ${req.path}`, {
        ip: headerValue(req.headers['x-forwarded-for']) ?? req.socket.remoteAddress,
        userAgent: req.headers['user-agent']?.substring(0, 50),
      });
    }

    res.on('finish', () => {
      if (isExcluded) return;

      const statusCode = res.statusCode;
      const logData = {
        status: statusCode,
        duration: `${Date.now() - context.startTime}ms`,
        locale: context.locale,
      };

      if (statusCode >= 500) {
        log.error(`${req.method} ${req.path} completed`, logData);
      } else if (statusCode >= 400) {
        log.warn(`${req.method} ${req.path} completed`, logData);
      } else {
        log.info(`${req.method} ${req.path} completed`, logData);
      }
    });

    next();
  });
}
