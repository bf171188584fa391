/**
 * Table definitions
 *
 * Primary tables hold only the locale-independent id (plus non-localized
 * references). Localized fields live in `<entity>_translations`, one row per
 * (entity_id, locale). Dependent rows point at primary ids, never at a
 * translation row.
 *
 * ensureSchema creates missing tables; it does not alter existing ones.
 */

import type { Knex } from 'knex';
import { createLogger } from '../utils/logger';

const log = createLogger('SCHEMA');

export async function ensureSchema(db: Knex): Promise<void> {
  const created: string[] = [];

  if (!(await db.schema.hasTable('categories'))) {
    await db.schema.createTable('categories', table => {
      table.string('id', 36).primary();
      table.string('created_at', 32).notNullable();
    });
    created.push('categories');
  }

  if (!(await db.schema.hasTable('category_translations'))) {
    await db.schema.createTable('category_translations', table => {
      table.increments('id');
      table
        .string('entity_id', 36)
        .notNullable()
        .references('id')
        .inTable('categories')
        .onDelete('CASCADE');
      table.string('locale', 16).notNullable();
      table.string('name', 255).notNullable();
      table.string('slug', 255).notNullable();
      table.string('updated_at', 32).notNullable();
      table.unique(['entity_id', 'locale']);
      table.unique(['locale', 'slug']);
    });
    created.push('category_translations');
  }

  if (!(await db.schema.hasTable('posts'))) {
    await db.schema.createTable('posts', table => {
      table.string('id', 36).primary();
      table
        .string('category_id', 36)
        .notNullable()
        .references('id')
        .inTable('categories')
        .onDelete('CASCADE');
      table.string('created_at', 32).notNullable();
      table.index(['category_id']);
    });
    created.push('posts');
  }

  if (!(await db.schema.hasTable('post_translations'))) {
    await db.schema.createTable('post_translations', table => {
      table.increments('id');
      table
        .string('entity_id', 36)
        .notNullable()
        .references('id')
        .inTable('posts')
        .onDelete('CASCADE');
      table.string('locale', 16).notNullable();
      table.string('title', 255).notNullable();
      table.string('slug', 255).notNullable();
      table.text('content').notNullable();
      table.string('updated_at', 32).notNullable();
      table.unique(['entity_id', 'locale']);
      table.unique(['locale', 'slug']);
    });
    created.push('post_translations');
  }

  if (created.length > 0) {
    log.info('Created tables', { tables: created });
  }
}
