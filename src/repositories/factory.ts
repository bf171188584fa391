/**
 * Repository Factory
 *
 * Creates the repositories over an injectable Knex instance, so tests can
 * hand in an in-memory SQLite database.
 *
 * Usage:
 *   const repositories = createRepositories(db);
 *   const post = await repositories.post.findEntity(id);
 */

import type { Knex } from 'knex';
import {
  categoryDefinition,
  postDefinition,
  type CategoryAttributes,
  type CategoryFields,
  type PostAttributes,
  type PostFields,
} from '../models/entities';
import { createTranslatableRepository } from './translatableRepository';
import type { TranslatableRepository } from './types';

export interface Repositories {
  category: TranslatableRepository<CategoryFields, CategoryAttributes>;
  post: TranslatableRepository<PostFields, PostAttributes>;
}

export function createRepositories(db: Knex): Repositories {
  return {
    category: createTranslatableRepository(db, categoryDefinition),
    post: createTranslatableRepository(db, postDefinition),
  };
}
