/**
 * Routing Types
 *
 * @module routing/types
 */

import type { Locale } from '../i18n/types';

export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

/**
 * A language-independent route. Its path per locale comes from the
 * PathTranslator; the key doubles as the path when no translation exists.
 */
export interface LogicalRoute<H> {
  key: string;
  method: HttpMethod;
  handler: H;
}

/**
 * One concrete route for a (logical route, locale) pair
 */
export interface RouteEntry<H> {
  method: HttpMethod;
  /** Path without leading slash; unprefixed for the default locale */
  fullPath: string;
  handlerRef: H;
  /** "{key}.{locale}" */
  name: string;
  key: string;
  locale: Locale;
}

export interface RouteMatch<H> {
  entry: RouteEntry<H>;
  params: Record<string, string>;
}

export type RouteParams = Record<string, string | number>;
