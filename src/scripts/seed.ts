/**
 * Seed sample content
 *
 * Loads categories and posts from seed-content.json into the configured
 * database. Does nothing when categories already exist.
 *
 * Usage: npm run seed
 */

import { z } from 'zod';
import { loadConfig } from '../config';
import { LocaleRegistry } from '../i18n/localeRegistry';
import { createDatabase, disconnect } from '../models/db';
import { ensureSchema } from '../models/schema';
import { createRepositories } from '../repositories';
import { createContentService } from '../services';
import { createLogger, extractError } from '../utils/logger';
import seedContent from './seed-content.json';

const log = createLogger('SEED');

const seedSchema = z.object({
  categories: z.array(
    z.object({
      translations: z.record(z.object({ name: z.string(), slug: z.string().optional() })),
      posts: z.array(
        z.object({
          translations: z.record(
            z.object({ title: z.string(), slug: z.string().optional(), content: z.string() })
          ),
        })
      ),
    })
  ),
});

async function seed(): Promise<void> {
  const config = loadConfig();
  const registry = LocaleRegistry.create(config.locales);
  const db = createDatabase(config.database);

  try {
    await ensureSchema(db);
    const content = createContentService(createRepositories(db), registry, config.translationCache);

    const existing = await content.categories.listEntities();
    if (existing.length > 0) {
      log.info('Content already present, skipping', { categories: existing.length });
      return;
    }

    const { categories } = seedSchema.parse(seedContent);
    let posts = 0;
    for (const category of categories) {
      const categoryId = await content.createCategory(category.translations);
      for (const post of category.posts) {
        await content.createPost(categoryId, post.translations);
        posts++;
      }
    }

    log.info('Seeded content', { categories: categories.length, posts });
  } finally {
    await disconnect(db);
  }
}

seed().catch((error: unknown) => {
  log.error('Seeding failed', extractError(error));
  process.exit(1);
});
