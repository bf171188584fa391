/**
 * Locale Resolver Middleware
 *
 * Activates a locale from the first path segment and stores it on the
 * request as `req.activeLocale`. Downstream handlers receive it from there
 * rather than from any shared state.
 *
 * A request prefixed with the default locale (`/en/about`) is redirected to
 * its unprefixed path on this host, since default-locale routes are
 * registered without a prefix. GET and HEAD get a 301; other methods get a
 * 308 so the method and body are kept.
 *
 * @module middleware/localeResolver
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { LocaleRegistry } from '../i18n/localeRegistry';
import type { ActiveLocale } from '../i18n/types';
import { resolveLocale } from '../routing/localeResolver';
import { createLogger } from '../utils/logger';
import { requestContext } from '../utils/requestContext';

const log = createLogger('LOCALE');

declare global {
  namespace Express {
    interface Request {
      activeLocale?: ActiveLocale;
    }
  }
}

export interface LocaleResolverOptions {
  /** Redirect `/{default}/...` to `/...` (default: true) */
  redirectDefaultPrefix?: boolean;
}

export function localeResolver(
  registry: LocaleRegistry,
  options: LocaleResolverOptions = {}
): RequestHandler {
  const redirectDefaultPrefix = options.redirectDefaultPrefix ?? true;

  return (req: Request, res: Response, next: NextFunction): void => {
    const active = resolveLocale(req.path, registry);

    if (redirectDefaultPrefix && active.prefixed && active.locale === registry.defaultLocale()) {
      // Leading slashes or backslashes would make the Location protocol-relative
      const path = '/' + active.path.replace(/^[/\\]+/, '');
      const query = req.originalUrl.indexOf('?');
      const target = query === -1 ? path : path + req.originalUrl.slice(query);
      const status = req.method === 'GET' || req.method === 'HEAD' ? 301 : 308;
      log.debug('Redirecting default-locale prefix', { from: req.path, to: target, status });
      res.redirect(status, target);
      return;
    }

    req.activeLocale = active;
    requestContext.setLocale(active.locale);
    next();
  };
}
