/**
 * Page Handlers
 *
 * One handler per logical route. Handlers never read ambient locale state:
 * the active locale and the matched route entry arrive as arguments.
 *
 * @module pages/handlers
 */

import { EntityNotFoundError } from '../errors/ApiError';
import type { Locale } from '../i18n/types';
import type { PostView } from '../services/contentService';
import type { PageHandler, PageContext } from './types';

function postLink(context: PageContext, locale: Locale, post: PostView) {
  return {
    id: post.id,
    title: post.title,
    locale: post.locale,
    url: context.routes.urlFor('post', locale, { slug: post.slug }),
  };
}

/**
 * Static text page whose strings live under `pages.<key>`
 */
function staticPage(key: string): PageHandler {
  return async (active, route, context) => ({
    page: route.key,
    locale: active.locale,
    title: context.t(`pages.${key}.title`),
    body: context.t(`pages.${key}.body`),
    alternates: context.routes.alternates(route.key),
  });
}

export const aboutPage = staticPage('about');

export const contactPage = staticPage('contact');

export const blogPage: PageHandler = async (active, route, context) => {
  const posts = await context.content.listPosts(active.locale);
  return {
    page: route.key,
    locale: active.locale,
    title: context.t('pages.blog.title'),
    posts: posts.map(post => postLink(context, active.locale, post)),
    ...(posts.length === 0 ? { empty: context.t('pages.blog.empty') } : {}),
    alternates: context.routes.alternates(route.key),
  };
};

export const postPage: PageHandler = async (active, route, context) => {
  const slug = context.params.slug ?? '';
  const found = await context.content.getPostBySlug(active.locale, slug);
  if (!found) {
    throw new EntityNotFoundError('post', slug);
  }

  const { post, slugs } = found;
  const category = await context.content.getCategory(post.categoryId, active.locale);

  return {
    page: route.key,
    locale: active.locale,
    title: post.title,
    post: {
      id: post.id,
      locale: post.locale,
      title: post.title,
      slug: post.slug,
      content: post.content,
      updatedAt: post.updatedAt,
      category: category ? { id: category.id, name: category.name } : null,
    },
    // Untranslated locales link to the slug their fallback chain resolves to
    alternates: context.routes.alternates(route.key, locale => {
      const slug = context.locales
        .fallbackChain(locale)
        .map(candidate => slugs[candidate])
        .find(value => value !== undefined);
      return slug === undefined ? null : { slug };
    }),
  };
};

export const categoriesPage: PageHandler = async (active, route, context) => {
  const categories = await context.content.listCategories(active.locale);
  const posts = await context.content.listPosts(active.locale);

  return {
    page: route.key,
    locale: active.locale,
    title: context.t('pages.categories.title'),
    categories: categories.map(category => ({
      id: category.id,
      name: category.name,
      slug: category.slug,
      locale: category.locale,
      posts: posts
        .filter(post => post.categoryId === category.id)
        .map(post => postLink(context, active.locale, post)),
    })),
    ...(categories.length === 0 ? { empty: context.t('pages.categories.empty') } : {}),
    alternates: context.routes.alternates(route.key),
  };
};
