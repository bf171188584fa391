/**
 * Configuration Type Definitions
 *
 * Centralized types for all application configuration.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type DatabaseClient = 'pg' | 'better-sqlite3';

export interface ServerConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  corsAllowedOrigins: string[];
}

export interface LocaleConfig {
  /** Supported locale codes, in route-table order */
  supported: string[];
  /** Locale served without a URL prefix */
  default: string;
  /** Last locale tried when a translation is missing */
  fallback: string;
}

export interface DatabaseConfig {
  client: DatabaseClient;
  /** Connection string for pg, file name (or ':memory:') for better-sqlite3 */
  url: string;
}

export interface TranslationCacheConfig {
  ttlMs: number;
  maxItems: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface AppConfig {
  server: ServerConfig;
  locales: LocaleConfig;
  database: DatabaseConfig;
  translationCache: TranslationCacheConfig;
  logging: LoggingConfig;
}
