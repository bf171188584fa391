/**
 * Route Table Builder
 *
 * Expands every logical route into one entry per supported locale. The
 * default locale is served unprefixed; every other locale carries its code as
 * the first path segment.
 *
 * @module routing/routeTableBuilder
 */

import { ConfigurationError } from '../errors/ConfigurationError';
import type { LocaleRegistry } from '../i18n/localeRegistry';
import type { PathTranslator } from '../i18n/pathTranslator';
import type { LogicalRoute, RouteEntry } from './types';

/**
 * Strip leading and trailing slashes from a translated segment
 */
export function normalizeSegment(segment: string): string {
  return segment.replace(/^\/+|\/+$/g, '');
}

/**
 * Build the route table.
 *
 * Entries are ordered route by route, and within a route by registry order.
 *
 * @throws ConfigurationError on a duplicate name, a duplicate method and path,
 * or a default-locale path whose first segment is itself a locale code
 */
export function buildRouteTable<H>(
  routes: readonly LogicalRoute<H>[],
  registry: LocaleRegistry,
  translator: PathTranslator
): RouteEntry<H>[] {
  const entries: RouteEntry<H>[] = [];
  const names = new Map<string, RouteEntry<H>>();
  const paths = new Map<string, RouteEntry<H>>();
  const defaultLocale = registry.defaultLocale();

  for (const route of routes) {
    for (const locale of registry.supportedLocales()) {
      const segment = normalizeSegment(translator.resolve(route.key, locale));

      let fullPath: string;
      if (locale === defaultLocale) {
        const firstSegment = segment.split('/')[0];
        if (registry.isSupported(firstSegment)) {
          throw new ConfigurationError(
            `Route "${route.key}" would be shadowed by the "${firstSegment}" locale prefix`,
            { key: route.key, path: segment }
          );
        }
        fullPath = segment;
      } else {
        fullPath = segment.length > 0 ? `${locale}/${segment}` : locale;
      }

      const entry: RouteEntry<H> = {
        method: route.method,
        fullPath,
        handlerRef: route.handler,
        name: `${route.key}.${locale}`,
        key: route.key,
        locale,
      };

      const sameName = names.get(entry.name);
      if (sameName) {
        throw new ConfigurationError(`Duplicate route name: ${entry.name}`, { name: entry.name });
      }

      const pathKey = `${entry.method} ${entry.fullPath}`;
      const samePath = paths.get(pathKey);
      if (samePath) {
        throw new ConfigurationError(`Duplicate route path: ${entry.method.toUpperCase()} /${entry.fullPath}`, {
          path: entry.fullPath,
          routes: [samePath.name, entry.name],
        });
      }

      names.set(entry.name, entry);
      paths.set(pathKey, entry);
      entries.push(entry);
    }
  }

  return entries;
}
