/**
 * Vitest Test Setup
 *
 * Runs before each test file. Sets the environment the config loader reads
 * and keeps log output to errors.
 */

import { afterEach } from 'vitest';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.SUPPORTED_LOCALES = 'en,pt,fr,jp';
process.env.DEFAULT_LOCALE = 'en';
process.env.FALLBACK_LOCALE = 'en';
process.env.DATABASE_CLIENT = 'better-sqlite3';
process.env.DATABASE_URL = ':memory:';

afterEach(() => {
  vi.clearAllMocks();
});
