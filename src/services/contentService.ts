/**
 * Content Service
 *
 * Categories and posts read and written through their translation stores.
 * Views carry the locale actually served, which differs from the requested
 * one when the fallback chain was used.
 */

import { EntityNotFoundError } from '../errors/ApiError';
import type { Locale } from '../i18n/types';
import type {
  CategoryAttributes,
  CategoryFields,
  PostAttributes,
  PostFields,
} from '../models/entities';
import type { Translation } from '../repositories/types';
import { createLogger } from '../utils/logger';
import { slugify } from '../utils/slugify';
import type { TranslationStore } from './translationStore';

const log = createLogger('CONTENT');

export type CategoryStore = TranslationStore<CategoryFields, CategoryAttributes>;
export type PostStore = TranslationStore<PostFields, PostAttributes>;

/** Localized fields where the slug may be derived from the title or name */
export type CategoryInput = Omit<CategoryFields, 'slug'> & { slug?: string };
export type PostInput = Omit<PostFields, 'slug'> & { slug?: string };

export interface CategoryView {
  id: string;
  locale: Locale;
  name: string;
  slug: string;
}

export interface PostView {
  id: string;
  categoryId: string;
  locale: Locale;
  title: string;
  slug: string;
  content: string;
  updatedAt: string;
}

export interface PostPage {
  post: PostView;
  /** Slug of the post in every locale it is translated to */
  slugs: Record<Locale, string>;
}

function toCategoryView(translation: Translation<CategoryFields>): CategoryView {
  return {
    id: translation.entityId,
    locale: translation.locale,
    name: translation.fields.name,
    slug: translation.fields.slug,
  };
}

function toPostView(categoryId: string, translation: Translation<PostFields>): PostView {
  return {
    id: translation.entityId,
    categoryId,
    locale: translation.locale,
    title: translation.fields.title,
    slug: translation.fields.slug,
    content: translation.fields.content,
    updatedAt: translation.updatedAt,
  };
}

export class ContentService {
  constructor(
    readonly categories: CategoryStore,
    readonly posts: PostStore
  ) {}

  // ========================================
  // CATEGORIES
  // ========================================

  async listCategories(locale: Locale): Promise<CategoryView[]> {
    const entities = await this.categories.listEntities();
    const translations = await this.categories.getMany(
      entities.map(entity => entity.id),
      locale
    );
    return entities.flatMap(entity => {
      const translation = translations.get(entity.id);
      return translation ? [toCategoryView(translation)] : [];
    });
  }

  async getCategory(id: string, locale: Locale): Promise<CategoryView | null> {
    const translation = await this.categories.get(id, locale);
    return translation ? toCategoryView(translation) : null;
  }

  /**
   * Create a category with its translations. Nothing is kept when any
   * translation is rejected.
   *
   * @param translations - Localized fields keyed by locale
   */
  async createCategory(translations: Record<Locale, CategoryInput>): Promise<string> {
    const entity = await this.categories.create({});
    try {
      for (const [locale, input] of Object.entries(translations)) {
        await this.translateCategory(entity.id, locale, input);
      }
    } catch (error) {
      await this.categories.remove(entity.id);
      log.warn('Category creation rolled back', { categoryId: entity.id });
      throw error;
    }
    return entity.id;
  }

  async translateCategory(id: string, locale: Locale, input: CategoryInput): Promise<CategoryView> {
    const saved = await this.categories.put(id, locale, {
      name: input.name,
      slug: input.slug ?? slugify(input.name),
    });
    return toCategoryView(saved);
  }

  /**
   * Delete a category together with its posts
   */
  async deleteCategory(id: string): Promise<boolean> {
    const posts = await this.posts.listEntities({ categoryId: id });
    const removed = await this.categories.remove(id);
    this.posts.evict(posts.map(post => post.id));
    if (removed) {
      log.info('Category deleted', { categoryId: id, posts: posts.length });
    }
    return removed;
  }

  // ========================================
  // POSTS
  // ========================================

  async listPosts(locale: Locale, categoryId?: string): Promise<PostView[]> {
    const entities = await this.posts.listEntities(categoryId ? { categoryId } : undefined);
    const translations = await this.posts.getMany(
      entities.map(entity => entity.id),
      locale
    );
    return entities.flatMap(entity => {
      const translation = translations.get(entity.id);
      return translation ? [toPostView(entity.attributes.categoryId, translation)] : [];
    });
  }

  /**
   * Post addressed by its slug, shown in the requested locale when
   * translated and otherwise along the fallback chain
   */
  async getPostBySlug(locale: Locale, slug: string): Promise<PostPage | null> {
    const match = await this.posts.findBySlug(locale, slug);
    if (!match) {
      return null;
    }

    const entity = await this.posts.findEntity(match.entityId);
    if (!entity) {
      return null;
    }

    const translation = (await this.posts.get(entity.id, locale)) ?? match;
    const all = await this.posts.getAll(entity.id);
    const slugs: Record<Locale, string> = {};
    for (const [translated, value] of all) {
      slugs[translated] = value.fields.slug;
    }

    return { post: toPostView(entity.attributes.categoryId, translation), slugs };
  }

  /**
   * Create a post in a category. Nothing is kept when any translation is
   * rejected.
   */
  async createPost(categoryId: string, translations: Record<Locale, PostInput>): Promise<string> {
    const category = await this.categories.findEntity(categoryId);
    if (!category) {
      throw new EntityNotFoundError('category', categoryId);
    }

    const entity = await this.posts.create({ categoryId });
    try {
      for (const [locale, input] of Object.entries(translations)) {
        await this.translatePost(entity.id, locale, input);
      }
    } catch (error) {
      await this.posts.remove(entity.id);
      log.warn('Post creation rolled back', { postId: entity.id });
      throw error;
    }
    return entity.id;
  }

  async translatePost(id: string, locale: Locale, input: PostInput): Promise<PostView> {
    const entity = await this.posts.findEntity(id);
    if (!entity) {
      throw new EntityNotFoundError('post', id);
    }

    const saved = await this.posts.put(id, locale, {
      title: input.title,
      slug: input.slug ?? slugify(input.title),
      content: input.content,
    });
    return toPostView(entity.attributes.categoryId, saved);
  }

  async deletePost(id: string): Promise<boolean> {
    return this.posts.remove(id);
  }
}
