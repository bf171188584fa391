/**
 * Database Connection
 *
 * Knex instance for the translation tables. PostgreSQL (pg) in production,
 * better-sqlite3 for local runs and tests.
 *
 * Features:
 * - Connection retry logic for startup resilience
 * - Slow query detection
 * - Foreign keys switched on for SQLite connections so cascades apply
 */

import { knex, type Knex } from 'knex';
import type { DatabaseConfig } from '../config/types';
import { createLogger } from '../utils/logger';

const log = createLogger('DB');

// Slow query threshold in milliseconds
const SLOW_QUERY_THRESHOLD_MS = 100;

// Connection retry configuration
const MAX_RETRIES = 5;
const INITIAL_RETRY_DELAY_MS = 1000;
const MAX_RETRY_DELAY_MS = 30000;

interface SqliteConnection {
  pragma(source: string): unknown;
}

interface QueryEvent {
  __knexQueryUid?: string;
  sql?: string;
}

/**
 * Create a Knex instance for the configured client
 */
export function createDatabase(config: DatabaseConfig): Knex {
  const db =
    config.client === 'better-sqlite3'
      ? knex({
          client: 'better-sqlite3',
          connection: { filename: config.url },
          useNullAsDefault: true,
          pool: {
            afterCreate: (conn: SqliteConnection, done: (err: Error | null, conn: SqliteConnection) => void) => {
              conn.pragma('foreign_keys = ON');
              done(null, conn);
            },
          },
        })
      : knex({
          client: 'pg',
          connection: config.url,
          pool: { min: 0, max: 10 },
        });

  trackSlowQueries(db);
  return db;
}

function trackSlowQueries(db: Knex): void {
  const started = new Map<string, number>();

  db.on('query', (query: QueryEvent) => {
    if (query.__knexQueryUid) {
      started.set(query.__knexQueryUid, Date.now());
    }
  });

  const finish = (query: QueryEvent) => {
    if (!query.__knexQueryUid) return;
    const start = started.get(query.__knexQueryUid);
    started.delete(query.__knexQueryUid);
    if (start === undefined) return;

    const duration = Date.now() - start;
    if (duration > SLOW_QUERY_THRESHOLD_MS) {
      log.warn(`Slow query (${duration}ms)`, { sql: query.sql, duration });
    }
  };

  db.on('query-response', (_response: unknown, query: QueryEvent) => finish(query));
  db.on('query-error', (_error: unknown, query: QueryEvent) => finish(query));
}

/**
 * Connect to database with retry logic
 * Implements exponential backoff for resilience during startup
 */
export async function connectWithRetry(db: Knex): Promise<void> {
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
    try {
      log.info(`Connecting to database (attempt ${attempt}/${MAX_RETRIES})...`);
      await db.raw('select 1');
      log.info('Database connection established');
      return;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const delay = Math.min(INITIAL_RETRY_DELAY_MS * Math.pow(2, attempt - 1), MAX_RETRY_DELAY_MS);

      if (attempt < MAX_RETRIES) {
        log.warn(`Database connection failed, retrying in ${delay}ms...`, {
          attempt,
          maxRetries: MAX_RETRIES,
          error: lastError.message,
        });
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  log.error('Failed to connect to database after all retries', {
    error: lastError?.message,
  });
  throw lastError ?? new Error('Database connection failed');
}

/**
 * Close all pooled connections
 */
export async function disconnect(db: Knex): Promise<void> {
  await db.destroy();
  log.info('Database connection closed');
}

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // PostgreSQL unique_violation
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

const FOREIGN_KEY_VIOLATION_CODES = new Set([
  '23503', // PostgreSQL foreign_key_violation
  'SQLITE_CONSTRAINT_FOREIGNKEY',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && UNIQUE_VIOLATION_CODES.has(code);
}

export function isForeignKeyViolation(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && FOREIGN_KEY_VIOLATION_CODES.has(code);
}
