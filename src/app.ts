/**
 * Express Application
 *
 * Builds the HTTP app from already-initialized collaborators, so tests can
 * create it against an in-memory database without starting a listener.
 */

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { errorHandler, notFoundHandler } from './errors/errorHandler';
import { localeResolver } from './middleware/localeResolver';
import { requestLogger } from './middleware/requestLogger';
import { registerRoutes, type RouteDeps } from './routes';

export type AppDeps = RouteDeps;

export function createApp(deps: AppDeps): Express {
  const app: Express = express();

  // Trust first proxy for accurate client IP in logs
  app.set('trust proxy', 1);

  // ========================================
  // MIDDLEWARE
  // ========================================

  // JSON API only
  app.use(helmet());

  const { corsAllowedOrigins, nodeEnv } = deps.server;
  app.use(cors({
    origin: corsAllowedOrigins.length > 0 ? corsAllowedOrigins : nodeEnv === 'development',
  }));

  app.use(express.json({ limit: '1mb' }));

  // Request logging and correlation IDs
  app.use(requestLogger);

  // Active locale from the first path segment
  app.use(localeResolver(deps.registry));

  // ========================================
  // ROUTES
  // ========================================

  registerRoutes(app, deps);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
