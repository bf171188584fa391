/**
 * Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createLogger, extractError, getConfiguredLogLevel, setLogLevel } from '../../../src/utils/logger';
import { requestContext } from '../../../src/utils/requestContext';

const GRAY = '\x1b[90m';
const DIM = '\x1b[2m';
const BLUE = '\x1b[34m';
const CYAN = '\x1b[36m';
const RESET = '\x1b[0m';

describe('logger', () => {
  let output: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T10:30:45.123Z'));
    output = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('debug');
  });

  afterEach(() => {
    setLogLevel('error');
    vi.useRealTimers();
  });

  it('writes prefix, message and context', () => {
    createLogger('ROUTES').info('Route table built', { entries: 20, locales: ['en', 'fr'] });

    expect(output).toHaveBeenCalledWith(
      `${GRAY}[2024-01-15T10:30:45.123Z]${RESET} ${BLUE}INFO ${RESET} ${CYAN}[ROUTES]${RESET} Route table built ` +
        `${DIM}entries=20 locales=["en","fr"]${RESET}`
    );
  });

  it('adds the request ID and active locale inside a request', () => {
    requestContext.run({ requestId: 'abc12345', startTime: 0, locale: 'fr' }, () => {
      createLogger('ROUTES').info('Route matched', { name: 'about.fr' });
    });

    expect(output).toHaveBeenCalledWith(
      `${GRAY}[2024-01-15T10:30:45.123Z]${RESET} ${BLUE}INFO ${RESET} ${CYAN}[ROUTES]${RESET} ` +
        `${DIM}[abc12345]${RESET} Route matched ${DIM}name=about.fr locale=fr${RESET}`
    );
  });

  it('filters messages below the configured level', () => {
    setLogLevel('warn');
    const log = createLogger('TEST');

    log.info('hidden');
    log.warn('shown');

    expect(output).toHaveBeenCalledTimes(1);
    expect(getConfiguredLogLevel()).toBe('warn');
  });

  it('ignores unknown level names', () => {
    setLogLevel('warn');
    setLogLevel('verbose');

    expect(getConfiguredLogLevel()).toBe('warn');
  });
});

describe('extractError', () => {
  it('keeps the message and a non-default name', () => {
    expect(extractError(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
    expect(extractError(new Error('plain'))).toEqual({ error: 'plain' });
    expect(extractError('text')).toEqual({ error: 'text' });
  });
});
