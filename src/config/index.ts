/**
 * Server Configuration
 *
 * Centralized configuration management for all environment variables
 * and application settings.
 */

import dotenv from 'dotenv';
import path from 'path';
import { assertValidConfig } from './schema';
import type { AppConfig } from './types';

// Load environment variables
dotenv.config({ path: path.join(__dirname, '../../.env') });

const DEFAULT_SUPPORTED_LOCALES = ['en', 'pt', 'fr', 'jp'];

/**
 * Parse a comma-separated list from the environment
 */
function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

/**
 * Build and validate the configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaultLocale = env.DEFAULT_LOCALE || 'en';

  const candidate = {
    server: {
      nodeEnv: env.NODE_ENV || 'development',
      port: parseInt(env.PORT || '3000', 10),
      corsAllowedOrigins: parseList(env.CORS_ALLOWED_ORIGINS, []),
    },
    locales: {
      supported: parseList(env.SUPPORTED_LOCALES, DEFAULT_SUPPORTED_LOCALES),
      default: defaultLocale,
      fallback: env.FALLBACK_LOCALE || defaultLocale,
    },
    database: {
      client: env.DATABASE_CLIENT || 'better-sqlite3',
      url: env.DATABASE_URL || path.join(__dirname, '../../data/content.sqlite'),
    },
    translationCache: {
      ttlMs: parseInt(env.TRANSLATION_CACHE_TTL_MS || '300000', 10), // 5 minutes
      maxItems: parseInt(env.TRANSLATION_CACHE_MAX || '5000', 10),
    },
    logging: {
      level: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  assertValidConfig(candidate);
  return candidate;
}

export type { AppConfig } from './types';
