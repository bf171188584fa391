/**
 * Locale and Route Metadata API
 *
 * Read-only views of the locale registry and the route table, used by
 * clients to build language switchers and by operators to inspect routing.
 *
 * @module api/meta
 */

import { Router, Request, Response } from 'express';
import { UnsupportedLocaleError, ValidationError, ErrorCodes } from '../errors/ApiError';
import { i18nService } from '../i18n/i18nService';
import type { LocaleRegistry } from '../i18n/localeRegistry';
import type { PageHandler } from '../pages/types';
import { resolveLocale } from '../routing/localeResolver';
import type { RouteTable } from '../routing/routeTable';

export interface MetaRouterDeps {
  registry: LocaleRegistry;
  routes: RouteTable<PageHandler>;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createMetaRouter({ registry, routes }: MetaRouterDeps): Router {
  const router = Router();

  /**
   * GET /locales
   * Supported locales with their display names and URL prefixes
   */
  router.get('/locales', (req: Request, res: Response) => {
    const defaultLocale = registry.defaultLocale();
    res.json({
      default: defaultLocale,
      fallback: registry.fallbackLocale(),
      supported: registry.supportedLocales().map(code => ({
        code,
        name: i18nService.translate('common', 'language.name', { locale: code }),
        prefix: code === defaultLocale ? '' : `/${code}`,
      })),
    });
  });

  /**
   * GET /routes?locale=fr
   * Route table entries, optionally for a single locale
   */
  router.get('/routes', (req: Request, res: Response) => {
    const locale = queryString(req.query.locale);
    if (locale !== undefined && !registry.isSupported(locale)) {
      throw new UnsupportedLocaleError(locale);
    }

    const entries = routes.entries
      .filter(entry => locale === undefined || entry.locale === locale)
      .map(entry => ({
        name: entry.name,
        key: entry.key,
        locale: entry.locale,
        method: entry.method.toUpperCase(),
        path: `/${entry.fullPath}`,
      }));

    res.json({ count: entries.length, routes: entries });
  });

  /**
   * GET /routes/resolve?path=/fr/a-propos
   * Active locale and matched route for a request path
   */
  router.get('/routes/resolve', (req: Request, res: Response) => {
    const path = queryString(req.query.path);
    if (path === undefined) {
      throw new ValidationError('Query parameter "path" is required', ErrorCodes.INVALID_INPUT, {
        parameter: 'path',
      });
    }

    const normalized = path.startsWith('/') ? path : `/${path}`;
    const active = resolveLocale(normalized, registry);
    const match = routes.match('GET', normalized);

    res.json({
      active,
      match: match ? { name: match.entry.name, key: match.entry.key, params: match.params } : null,
    });
  });

  return router;
}
