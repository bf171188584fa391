/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of application configuration.
 * Provides detailed error messages when configuration is invalid.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/ConfigurationError';

// =============================================================================
// Basic Type Schemas
// =============================================================================

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export const DatabaseClientSchema = z.enum(['pg', 'better-sqlite3']);

// =============================================================================
// Component Schemas
// =============================================================================

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  port: z.number().int().min(1).max(65535),
  corsAllowedOrigins: z.array(z.string()),
});

export const LocaleConfigSchema = z.object({
  supported: z.array(z.string().min(1)).min(1, 'at least one locale is required'),
  default: z.string().min(1),
  fallback: z.string().min(1),
});

export const DatabaseConfigSchema = z.object({
  client: DatabaseClientSchema,
  url: z.string().min(1, 'DATABASE_URL is required'),
});

export const TranslationCacheConfigSchema = z.object({
  ttlMs: z.number().int().min(0),
  maxItems: z.number().int().min(1),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

// =============================================================================
// Main Config Schema
// =============================================================================

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  locales: LocaleConfigSchema,
  database: DatabaseConfigSchema,
  translationCache: TranslationCacheConfigSchema,
  logging: LoggingConfigSchema,
});

// =============================================================================
// Validation Functions
// =============================================================================

export type ConfigValidationResult = {
  success: boolean;
  errors: string[];
};

/**
 * Validate configuration and return detailed errors
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = AppConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, errors: [] };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { success: false, errors };
}

/**
 * Validate configuration and throw if invalid
 */
export function assertValidConfig(config: unknown): asserts config is ValidatedConfig {
  const result = validateConfigSchema(config);

  if (!result.success) {
    console.error('');
    console.error('================================================================================');
    console.error('CONFIGURATION VALIDATION FAILED');
    console.error('================================================================================');
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
    console.error('');
    console.error('Please check your .env file and environment variables.');
    console.error('================================================================================');

    throw new ConfigurationError(`Configuration validation failed: ${result.errors.join('; ')}`, {
      errors: result.errors,
    });
  }
}

export type ValidatedConfig = z.infer<typeof AppConfigSchema>;
