/**
 * Health Check API
 *
 * Liveness at /health and component status at /api/v1/health.
 */

import { Router, Request, Response } from 'express';
import type { Knex } from 'knex';
import type { ContentService } from '../services/contentService';
import { asyncHandler } from '../errors/errorHandler';
import { createLogger, extractError } from '../utils/logger';

const log = createLogger('HEALTH');

export type HealthStatus = 'healthy' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  message?: string;
  latency?: number;
  details?: Record<string, unknown>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  components: {
    database: ComponentHealth;
    translationCache: ComponentHealth;
  };
}

const startTime = Date.now();

/**
 * Check database connectivity
 */
async function checkDatabase(db: Knex): Promise<ComponentHealth> {
  const start = Date.now();
  try {
    await db.raw('select 1');
    return { status: 'healthy', latency: Date.now() - start };
  } catch (error) {
    log.error('Database health check failed', extractError(error));
    return {
      status: 'unhealthy',
      message: error instanceof Error ? error.message : String(error),
      latency: Date.now() - start,
    };
  }
}

function checkTranslationCache(content: ContentService): ComponentHealth {
  return {
    status: 'healthy',
    details: {
      categories: content.categories.getCacheStats(),
      posts: content.posts.getCacheStats(),
    },
  };
}

export function createHealthRouter(db: Knex, content: ContentService): Router {
  const router = Router();

  /**
   * GET /api/v1/health
   */
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const database = await checkDatabase(db);
    const translationCache = checkTranslationCache(content);

    const response: HealthResponse = {
      status: database.status,
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - startTime) / 1000),
      components: { database, translationCache },
    };

    res.status(response.status === 'healthy' ? 200 : 503).json(response);
  }));

  return router;
}
