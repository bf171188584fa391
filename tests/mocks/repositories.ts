/**
 * In-memory TranslatableRepository for service tests
 *
 * Mirrors the database constraints the services depend on: one row per
 * (entity, locale) and unique slugs per locale.
 */

import { z } from 'zod';
import type {
  EntityDefinition,
  EntityRecord,
  SluggedFields,
  TranslatableRepository,
  Translation,
} from '../../src/repositories/types';

const attributesSchema = z.record(z.unknown());

export function uniqueViolation(): Error {
  return Object.assign(new Error('UNIQUE constraint failed: translations.locale, translations.slug'), {
    code: 'SQLITE_CONSTRAINT_UNIQUE',
  });
}

export class InMemoryRepository<F extends SluggedFields, A> implements TranslatableRepository<F, A> {
  readonly entities = new Map<string, EntityRecord<A>>();
  readonly rows = new Map<string, Translation<F>>();
  readonly calls = { findTranslationsFor: 0, upsertTranslation: 0 };
  /** Called with the id of every deleted entity */
  readonly onDelete: Array<(id: string) => void> = [];

  constructor(readonly definition: EntityDefinition<F, A>) {}

  async createEntity(id: string, attributes: A, createdAt: string): Promise<EntityRecord<A>> {
    const entity = { id, createdAt, attributes };
    this.entities.set(id, entity);
    return entity;
  }

  async findEntity(id: string): Promise<EntityRecord<A> | null> {
    return this.entities.get(id) ?? null;
  }

  async listEntities(filter: Record<string, string> = {}): Promise<EntityRecord<A>[]> {
    return [...this.entities.values()].filter(entity => {
      const attributes = attributesSchema.parse(entity.attributes);
      return Object.entries(filter).every(([name, value]) => attributes[name] === value);
    });
  }

  async deleteEntity(id: string): Promise<boolean> {
    if (!this.entities.delete(id)) {
      return false;
    }
    for (const key of [...this.rows.keys()]) {
      if (key.startsWith(`${id}:`)) this.rows.delete(key);
    }
    this.onDelete.forEach(listener => listener(id));
    return true;
  }

  /** Delete entities (and their rows) matching a predicate, as a cascade would */
  removeWhere(predicate: (entity: EntityRecord<A>) => boolean): void {
    for (const entity of [...this.entities.values()]) {
      if (predicate(entity)) {
        this.entities.delete(entity.id);
        for (const key of [...this.rows.keys()]) {
          if (key.startsWith(`${entity.id}:`)) this.rows.delete(key);
        }
      }
    }
  }

  async findTranslations(entityId: string): Promise<Translation<F>[]> {
    return [...this.rows.values()]
      .filter(row => row.entityId === entityId)
      .sort((a, b) => a.locale.localeCompare(b.locale));
  }

  async findTranslationsFor(entityIds: readonly string[], locales: readonly string[]): Promise<Translation<F>[]> {
    this.calls.findTranslationsFor++;
    return [...this.rows.values()].filter(
      row => entityIds.includes(row.entityId) && locales.includes(row.locale)
    );
  }

  async findTranslationBySlug(locale: string, slug: string): Promise<Translation<F> | null> {
    return [...this.rows.values()].find(row => row.locale === locale && row.fields.slug === slug) ?? null;
  }

  async upsertTranslation(entityId: string, locale: string, fields: F, updatedAt: string): Promise<Translation<F>> {
    this.calls.upsertTranslation++;
    const taken = [...this.rows.values()].some(
      row => row.locale === locale && row.fields.slug === fields.slug && row.entityId !== entityId
    );
    if (taken) {
      throw uniqueViolation();
    }
    const row = { entityId, locale, fields, updatedAt };
    this.rows.set(`${entityId}:${locale}`, row);
    return row;
  }
}
