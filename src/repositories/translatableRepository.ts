/**
 * Translatable Repository
 *
 * Knex data access for an entity table and its satellite translation table.
 * Rows are decoded through zod so column drift surfaces as a parse error
 * instead of a malformed record.
 */

import type { Knex } from 'knex';
import { z } from 'zod';
import type { Locale } from '../i18n/types';
import type {
  EntityDefinition,
  EntityRecord,
  SluggedFields,
  TranslatableRepository,
  Translation,
} from './types';

const rowSchema = z.record(z.unknown());

const entityRowSchema = z.object({
  id: z.string(),
  created_at: z.string(),
});

const translationRowSchema = z.object({
  entity_id: z.string(),
  locale: z.string(),
  updated_at: z.string(),
});

const columnValuesSchema = z.record(z.union([z.string(), z.null()]));

const idListSchema = z.array(z.string());

export function createTranslatableRepository<F extends SluggedFields, A>(
  db: Knex,
  definition: EntityDefinition<F, A>
): TranslatableRepository<F, A> {
  const toEntity = (raw: unknown): EntityRecord<A> => {
    const row = rowSchema.parse(raw);
    const base = entityRowSchema.parse(row);
    const attributes = Object.fromEntries(
      Object.entries(definition.attributeColumns).map(([attribute, column]) => [attribute, row[column]])
    );
    return {
      id: base.id,
      createdAt: base.created_at,
      attributes: definition.attributesSchema.parse(attributes),
    };
  };

  const toTranslation = (raw: unknown): Translation<F> => {
    const row = rowSchema.parse(raw);
    const base = translationRowSchema.parse(row);
    const fields = Object.fromEntries(definition.fieldColumns.map(column => [column, row[column]]));
    return {
      entityId: base.entity_id,
      locale: base.locale,
      fields: definition.fieldsSchema.parse(fields),
      updatedAt: base.updated_at,
    };
  };

  const attributeRow = (attributes: A): Record<string, string | null> => {
    const values = columnValuesSchema.parse(attributes);
    const row: Record<string, string | null> = {};
    for (const [attribute, column] of Object.entries(definition.attributeColumns)) {
      row[column] = values[attribute] ?? null;
    }
    return row;
  };

  return {
    definition,

    async createEntity(id, attributes, createdAt) {
      await db(definition.table).insert({ id, created_at: createdAt, ...attributeRow(attributes) });
      return { id, createdAt, attributes };
    },

    async findEntity(id) {
      const row: unknown = await db(definition.table).where({ id }).first();
      return row ? toEntity(row) : null;
    },

    async listEntities(filter = {}) {
      const query = db(definition.table).select('*');
      for (const [attribute, value] of Object.entries(filter)) {
        const column = definition.attributeColumns[attribute];
        if (!column) {
          throw new Error(`Unknown ${definition.type} attribute: ${attribute}`);
        }
        query.where(column, value);
      }
      const rows: unknown[] = await query.orderBy([{ column: 'created_at' }, { column: 'id' }]);
      return rows.map(toEntity);
    },

    async deleteEntity(id) {
      return db.transaction(async trx => {
        for (const dependent of definition.dependents) {
          const ids = idListSchema.parse(
            await trx(dependent.table).where(dependent.foreignKey, id).pluck('id')
          );
          if (ids.length > 0) {
            await trx(dependent.translationTable).whereIn('entity_id', ids).del();
            await trx(dependent.table).whereIn('id', ids).del();
          }
        }

        await trx(definition.translationTable).where({ entity_id: id }).del();
        const removed = await trx(definition.table).where({ id }).del();
        return removed > 0;
      });
    },

    async findTranslations(entityId) {
      const rows: unknown[] = await db(definition.translationTable)
        .select('*')
        .where({ entity_id: entityId })
        .orderBy('locale');
      return rows.map(toTranslation);
    },

    async findTranslationsFor(entityIds, locales) {
      if (entityIds.length === 0 || locales.length === 0) {
        return [];
      }
      const rows: unknown[] = await db(definition.translationTable)
        .select('*')
        .whereIn('entity_id', [...entityIds])
        .whereIn('locale', [...locales]);
      return rows.map(toTranslation);
    },

    async findTranslationBySlug(locale, slug) {
      const row: unknown = await db(definition.translationTable).where({ locale, slug }).first();
      return row ? toTranslation(row) : null;
    },

    async upsertTranslation(entityId, locale, fields, updatedAt) {
      await db(definition.translationTable)
        .insert({ ...fields, entity_id: entityId, locale, updated_at: updatedAt })
        .onConflict(['entity_id', 'locale'])
        .merge();
      return { entityId, locale, fields, updatedAt };
    },
  };
}
