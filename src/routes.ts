/**
 * Route Registration
 *
 * Centralizes route mounting to keep app.ts focused on middleware wiring.
 * Localized pages are mounted last so API paths always win.
 */

import type { Express, Request, Response, RequestHandler } from 'express';
import type { Knex } from 'knex';
import { createHealthRouter } from './api/health';
import { createMetaRouter } from './api/meta';
import type { ServerConfig } from './config/types';
import type { LocaleRegistry } from './i18n/localeRegistry';
import { registerLocalizedRoutes } from './middleware/localizedRoutes';
import type { PageHandler } from './pages/types';
import type { RouteTable } from './routing/routeTable';
import type { ContentService } from './services/contentService';

type RouteDefinition = {
  method: 'use' | 'get';
  path: string;
  handler: RequestHandler;
};

export interface RouteDeps {
  server: ServerConfig;
  registry: LocaleRegistry;
  routes: RouteTable<PageHandler>;
  content: ContentService;
  db: Knex;
}

function healthHandler(environment: string): RequestHandler {
  return (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment,
    });
  };
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const routes: RouteDefinition[] = [
    { method: 'get', path: '/health', handler: healthHandler(deps.server.nodeEnv) },
    { method: 'use', path: '/api/v1/health', handler: createHealthRouter(deps.db, deps.content) },
    { method: 'use', path: '/api/v1', handler: createMetaRouter(deps) },
    { method: 'use', path: '/', handler: registerLocalizedRoutes(deps) },
  ];

  for (const route of routes) {
    if (route.method === 'get') {
      app.get(route.path, route.handler);
    } else {
      app.use(route.path, route.handler);
    }
  }
}
