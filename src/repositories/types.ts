/**
 * Repository Types
 *
 * Shared shapes for translatable entities and their translation rows.
 */

import type { z } from 'zod';
import type { Locale } from '../i18n/types';

/**
 * Every translation carries a per-locale slug
 */
export interface SluggedFields {
  slug: string;
}

/**
 * A table whose rows reference the entity and are removed with it
 */
export interface DependentTable {
  table: string;
  translationTable: string;
  foreignKey: string;
}

export interface EntityDefinition<F extends SluggedFields, A> {
  /** Name used in logs, cache keys and error details */
  type: string;
  table: string;
  translationTable: string;
  fieldsSchema: z.ZodType<F, z.ZodTypeDef, unknown>;
  /** Translation table columns holding localized fields, named as the fields */
  fieldColumns: readonly string[];
  attributesSchema: z.ZodType<A, z.ZodTypeDef, unknown>;
  /** Attribute name to primary-table column */
  attributeColumns: Readonly<Record<string, string>>;
  dependents: readonly DependentTable[];
}

export interface EntityRecord<A> {
  id: string;
  createdAt: string;
  attributes: A;
}

export interface Translation<F> {
  entityId: string;
  locale: Locale;
  fields: F;
  updatedAt: string;
}

/**
 * Data access for one translatable entity type
 */
export interface TranslatableRepository<F extends SluggedFields, A> {
  readonly definition: EntityDefinition<F, A>;

  createEntity(id: string, attributes: A, createdAt: string): Promise<EntityRecord<A>>;
  findEntity(id: string): Promise<EntityRecord<A> | null>;
  /** Entities whose attributes equal the filter values, oldest first */
  listEntities(filter?: Record<string, string>): Promise<EntityRecord<A>[]>;
  /** Remove the entity, its translations and its dependents; false when absent */
  deleteEntity(id: string): Promise<boolean>;

  findTranslations(entityId: string): Promise<Translation<F>[]>;
  findTranslationsFor(entityIds: readonly string[], locales: readonly Locale[]): Promise<Translation<F>[]>;
  findTranslationBySlug(locale: Locale, slug: string): Promise<Translation<F> | null>;
  /** Insert or overwrite the row for (entityId, locale) in one statement */
  upsertTranslation(entityId: string, locale: Locale, fields: F, updatedAt: string): Promise<Translation<F>>;
}
