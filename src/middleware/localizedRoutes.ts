/**
 * Localized Route Registration
 *
 * Mounts every route table entry on an Express router at `/{fullPath}`.
 * Each handler is called with the request's ActiveLocale and the entry it
 * was registered for.
 *
 * @module middleware/localizedRoutes
 */

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '../errors/errorHandler';
import { i18nService } from '../i18n/i18nService';
import type { LocaleRegistry } from '../i18n/localeRegistry';
import type { PageHandler } from '../pages/types';
import { resolveLocale } from '../routing/localeResolver';
import type { RouteTable } from '../routing/routeTable';
import type { RouteEntry } from '../routing/types';
import type { ContentService } from '../services/contentService';
import { createLogger } from '../utils/logger';

const log = createLogger('ROUTES');

export interface LocalizedRoutesDeps {
  routes: RouteTable<PageHandler>;
  registry: LocaleRegistry;
  content: ContentService;
}

function stringParams(params: Record<string, unknown>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(params)) {
    if (typeof value === 'string') {
      result[name] = value;
    }
  }
  return result;
}

export function registerLocalizedRoutes(deps: LocalizedRoutesDeps): Router {
  // Locale segments are case sensitive, so paths are too
  const router = Router({ caseSensitive: true });

  const dispatch = (entry: RouteEntry<PageHandler>) =>
    asyncHandler(async (req: Request, res: Response) => {
      const active = req.activeLocale ?? resolveLocale(req.path, deps.registry);
      log.debug('Route matched', { name: entry.name, locale: active.locale });

      const body = await entry.handlerRef(active, entry, {
        params: stringParams(req.params),
        routes: deps.routes,
        locales: deps.registry,
        content: deps.content,
        t: (key, options) => i18nService.translate('common', key, { ...options, locale: active.locale }),
      });

      res.json(body);
    });

  for (const entry of deps.routes.entries) {
    router[entry.method](`/${entry.fullPath}`, dispatch(entry));
  }

  log.info('Localized routes registered', { entries: deps.routes.entries.length });
  return router;
}
