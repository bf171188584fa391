/**
 * Service wiring
 *
 * Usage:
 *   const content = createContentService(createRepositories(db), registry, config.translationCache);
 */

import type { TranslationCacheConfig } from '../config/types';
import type { LocaleRegistry } from '../i18n/localeRegistry';
import type { Repositories } from '../repositories';
import { ContentService } from './contentService';
import { TranslationStore } from './translationStore';

export function createContentService(
  repositories: Repositories,
  registry: LocaleRegistry,
  cacheConfig: TranslationCacheConfig
): ContentService {
  return new ContentService(
    new TranslationStore(repositories.category, registry, cacheConfig),
    new TranslationStore(repositories.post, registry, cacheConfig)
  );
}

export { ContentService } from './contentService';
export type { CategoryInput, CategoryView, PostInput, PostPage, PostView } from './contentService';
export { TranslationStore } from './translationStore';
