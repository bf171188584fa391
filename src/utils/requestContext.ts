/**
 * Request Context
 *
 * Provides request-scoped context using AsyncLocalStorage so correlation IDs
 * reach log lines without explicit parameter passing.
 *
 * The active locale is recorded here for logging only; handlers receive the
 * ActiveLocale value explicitly and never read it back from this store.
 *
 * Usage:
 *   requestContext.run({ requestId: 'abc123', startTime: Date.now() }, next);
 *   const ctx = requestContext.get();
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContextData {
  /** Unique request correlation ID for tracing */
  requestId: string;
  /** Request start time for duration calculation */
  startTime: number;
  /** Request path */
  path?: string;
  /** Request method */
  method?: string;
  /** Locale activated for this request */
  locale?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

export const requestContext = {
  /**
   * Run a function within a request context
   */
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Get the current request context (undefined outside request scope)
   */
  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  /**
   * Get the current request ID (returns 'no-request' if not in request scope)
   */
  getRequestId(): string {
    return asyncLocalStorage.getStore()?.requestId ?? 'no-request';
  },

  /**
   * Record the locale activated for the current request
   */
  setLocale(locale: string): void {
    const store = asyncLocalStorage.getStore();
    if (store) {
      store.locale = locale;
    }
  },

  /**
   * Generate a new request ID
   */
  generateRequestId(): string {
    // Short format: 8 characters from UUID for readability in logs
    return randomUUID().split('-')[0];
  },
};
