/**
 * Repository Layer
 *
 * Usage:
 *   import { createRepositories } from '../repositories';
 *   const { category, post } = createRepositories(db);
 */

export { createRepositories, type Repositories } from './factory';
export { createTranslatableRepository } from './translatableRepository';

export type {
  DependentTable,
  EntityDefinition,
  EntityRecord,
  SluggedFields,
  TranslatableRepository,
  Translation,
} from './types';
