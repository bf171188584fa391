/**
 * Logger Utility
 *
 * Module-scoped logging with verbosity levels.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): Tracing route resolution, cache hits and misses.
 *   - INFO  (1): Startup, route table construction, routine events. Default level.
 *   - WARN  (2): Recoverable problems such as missing translations.
 *   - ERROR (3): Failures that prevent an operation from completing.
 *
 * Set LOG_LEVEL (debug | info | warn | error) to control verbosity.
 *
 * USAGE:
 *
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('ROUTES');
 *
 *   log.info('Route table built', { entries: 20, locales: 4 });
 *   log.error('Upsert failed', { entityId: '42', error: err.message });
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] [REQ_ID] Message key=value key=value
 *
 *   Example:
 *   [2024-01-15T10:30:45.123Z] INFO  [ROUTES] [a1b2c3d4] Route matched name=about.fr locale=fr
 *
 * When running within a request context (set up by the requestLogger
 * middleware), the request ID and active locale are included automatically.
 */

import { requestContext } from './requestContext';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

// Get log level from environment, default to INFO
const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && LOG_LEVEL_MAP[envLevel] !== undefined
    ? LOG_LEVEL_MAP[envLevel]
    : LogLevel.INFO;
};

let currentLogLevel = getLogLevel();

// ANSI escape codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export type LogContext = Record<string, unknown>;

/**
 * Format context object as key=value pairs
 * Objects are JSON stringified, primitives are converted to strings
 */
const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  const formatted = Object.entries(context)
    .map(([key, value]) => {
      if (value === undefined || value === null) {
        return `${key}=null`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` ${colors.dim}${formatted}${colors.reset}`;
};

/**
 * Core logging function - writes formatted log entry to stdout
 */
const log = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < currentLogLevel) return;

  const timestamp = new Date().toISOString();

  const reqCtx = requestContext.get();
  const requestId = reqCtx?.requestId;
  const requestIdStr = requestId ? ` ${colors.dim}[${requestId}]${colors.reset}` : '';

  const enrichedContext: LogContext = {
    ...context,
    ...(reqCtx?.locale && context?.locale === undefined ? { locale: reqCtx.locale } : {}),
  };
  const contextStr = formatContext(enrichedContext);

  console.log(
    `${colors.gray}[${timestamp}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset}${requestIdStr} ${message}${contextStr}`
  );
};

/**
 * Logger interface returned by createLogger
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a specific prefix/module name
 *
 * @param prefix - Module identifier shown in log output (e.g., 'ROUTES', 'STORE')
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message: string, context?: LogContext) => {
      log(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },

    info: (message: string, context?: LogContext) => {
      log(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },

    warn: (message: string, context?: LogContext) => {
      log(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },

    error: (message: string, context?: LogContext) => {
      log(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

/**
 * Update log level at runtime
 *
 * @example
 * setLogLevel('debug');
 * setLogLevel(LogLevel.WARN);
 */
export const setLogLevel = (level: LogLevel | string): void => {
  if (typeof level === 'string') {
    const parsedLevel = LOG_LEVEL_MAP[level.toLowerCase()];
    if (parsedLevel !== undefined) {
      currentLogLevel = parsedLevel;
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Get current log level as string
 */
export const getConfiguredLogLevel = (): string => {
  const current = Object.entries(LOG_LEVEL_MAP).find(([, v]) => v === currentLogLevel);
  return current ? current[0] : 'info';
};

/**
 * Extract error information in a standardized format for logging
 *
 * @example
 * try {
 *   await translationStore.put(id, 'fr', fields);
 * } catch (error) {
 *   log.error('Upsert failed', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  if (error instanceof Error) {
    return {
      error: error.message,
      ...(error.name !== 'Error' ? { errorName: error.name } : {}),
    };
  }
  return { error: String(error) };
}
