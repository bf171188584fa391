/**
 * Locale Resolver
 *
 * Picks the active locale from the first segment of a request path. A
 * segment naming a supported locale is consumed; anything else leaves the
 * path untouched and activates the default locale. Never throws.
 *
 * @module routing/localeResolver
 */

import type { LocaleRegistry } from '../i18n/localeRegistry';
import type { ActiveLocale } from '../i18n/types';

export function resolveLocale(requestPath: string, registry: LocaleRegistry): ActiveLocale {
  const trimmed = requestPath.startsWith('/') ? requestPath.slice(1) : requestPath;
  const slash = trimmed.indexOf('/');
  const first = slash === -1 ? trimmed : trimmed.slice(0, slash);

  if (first.length > 0 && registry.isSupported(first)) {
    const rest = slash === -1 ? '' : trimmed.slice(slash + 1);
    return { locale: first, prefixed: true, path: `/${rest}` };
  }

  return { locale: registry.defaultLocale(), prefixed: false, path: requestPath };
}
