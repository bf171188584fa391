/**
 * Logical page routes
 *
 * Keys are language independent; each locale's path comes from
 * `i18n/locales/<locale>/routes.json` and defaults to the key itself.
 */

import type { LogicalRoute } from '../routing/types';
import { aboutPage, blogPage, categoriesPage, contactPage, postPage } from './handlers';
import type { PageHandler } from './types';

export const pageRoutes: readonly LogicalRoute<PageHandler>[] = [
  { key: 'about', method: 'get', handler: aboutPage },
  { key: 'contact', method: 'get', handler: contactPage },
  { key: 'blog', method: 'get', handler: blogPage },
  { key: 'post', method: 'get', handler: postPage },
  { key: 'categories', method: 'get', handler: categoriesPage },
];

export type { PageBody, PageContext, PageHandler } from './types';
