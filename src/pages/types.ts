/**
 * Page Types
 *
 * @module pages/types
 */

import type { TranslateOptions } from '../i18n/i18nService';
import type { LocaleRegistry } from '../i18n/localeRegistry';
import type { ActiveLocale, Locale } from '../i18n/types';
import type { RouteTable } from '../routing/routeTable';
import type { RouteEntry } from '../routing/types';
import type { ContentService } from '../services/contentService';

/**
 * JSON body of a localized page
 */
export interface PageBody {
  page: string;
  locale: Locale;
  title: string;
  /** URL of this page in every locale it exists in */
  alternates: Record<Locale, string>;
  [key: string]: unknown;
}

export interface PageContext {
  params: Record<string, string>;
  routes: RouteTable<PageHandler>;
  locales: LocaleRegistry;
  content: ContentService;
  /** UI string in the active locale */
  t(key: string, options?: Omit<TranslateOptions, 'locale'>): string;
}

export interface PageHandler {
  (active: ActiveLocale, route: RouteEntry<PageHandler>, context: PageContext): Promise<PageBody>;
}
