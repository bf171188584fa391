/**
 * Translation Store
 *
 * Keyed access from (entity id, locale) to a localized record for one entity
 * type, in front of its repository.
 *
 * - Reads go through an LRU cache, including negative (missing) results.
 *   A store-wide generation counter keeps a read that overlapped a write
 *   from caching what it read; the next read fills the cache instead.
 * - `get` follows the registry fallback chain (requested, default, fallback)
 *   with one repository query for every uncached locale of that chain.
 * - Writes for the same (entity, locale) are serialized in process and land
 *   as a single upsert statement; the last writer wins.
 *
 * @module services/translationStore
 */

import { randomUUID } from 'crypto';
import type { TranslationCacheConfig } from '../config/types';
import {
  ConflictError,
  EntityNotFoundError,
  ErrorCodes,
  UnsupportedLocaleError,
  ValidationError,
} from '../errors/ApiError';
import type { LocaleRegistry } from '../i18n/localeRegistry';
import type { Locale } from '../i18n/types';
import { isForeignKeyViolation, isUniqueViolation } from '../models/db';
import type {
  EntityRecord,
  SluggedFields,
  TranslatableRepository,
  Translation,
} from '../repositories/types';
import { KeyedMutex } from '../utils/async';
import { ApplicationCache, type CacheStats } from '../utils/cache';
import { createLogger } from '../utils/logger';

const log = createLogger('TRANSLATIONS');

interface CachedTranslation<F> {
  value: Translation<F> | null;
}

export class TranslationStore<F extends SluggedFields, A> {
  private readonly cache: ApplicationCache<CachedTranslation<F>>;
  private readonly writes = new KeyedMutex();
  private generation = 0;

  constructor(
    private readonly repository: TranslatableRepository<F, A>,
    private readonly registry: LocaleRegistry,
    cacheConfig: TranslationCacheConfig
  ) {
    this.cache = new ApplicationCache<CachedTranslation<F>>({
      name: `${repository.definition.type}-translations`,
      ttlMs: cacheConfig.ttlMs,
      maxItems: cacheConfig.maxItems,
    });
  }

  get type(): string {
    return this.repository.definition.type;
  }

  // ========================================
  // ENTITIES
  // ========================================

  async create(attributes: A, id: string = randomUUID()): Promise<EntityRecord<A>> {
    const entity = await this.repository.createEntity(id, attributes, new Date().toISOString());
    log.info('Entity created', { type: this.type, entityId: id });
    return entity;
  }

  async findEntity(entityId: string): Promise<EntityRecord<A> | null> {
    return this.repository.findEntity(entityId);
  }

  async listEntities(filter?: Record<string, string>): Promise<EntityRecord<A>[]> {
    return this.repository.listEntities(filter);
  }

  /**
   * Delete the entity with all of its translations
   *
   * @returns false when the entity did not exist
   */
  async remove(entityId: string): Promise<boolean> {
    const removed = await this.repository.deleteEntity(entityId);
    this.evict([entityId]);
    if (removed) {
      log.info('Entity removed', { type: this.type, entityId });
    }
    return removed;
  }

  /**
   * Drop cached translations of entities removed elsewhere (cascades)
   */
  evict(entityIds: readonly string[]): void {
    this.generation++;
    for (const entityId of entityIds) {
      this.cache.invalidatePrefix(`${entityId}:`);
    }
  }

  // ========================================
  // LOOKUPS
  // ========================================

  /**
   * Exact lookup, no fallback
   */
  async find(entityId: string, locale: Locale): Promise<Translation<F> | null> {
    const found = await this.load([entityId], [locale]);
    return found.get(this.cacheKey(entityId, locale)) ?? null;
  }

  /**
   * Translation for a locale, falling back to the default and then the
   * fallback locale. Null when none of them is translated.
   */
  async get(entityId: string, locale: Locale): Promise<Translation<F> | null> {
    const chain = this.registry.fallbackChain(locale);
    const found = await this.load([entityId], chain);
    const translation = this.pick(found, entityId, chain);

    if (!translation) {
      log.debug('No translation in fallback chain', { type: this.type, entityId, chain });
    } else if (translation.locale !== locale) {
      log.debug('Served fallback translation', {
        type: this.type,
        entityId,
        requested: locale,
        served: translation.locale,
      });
    }

    return translation;
  }

  /**
   * `get` for several entities with one query. Entities without any
   * translation in the chain are absent from the result.
   */
  async getMany(entityIds: readonly string[], locale: Locale): Promise<Map<string, Translation<F>>> {
    const chain = this.registry.fallbackChain(locale);
    const found = await this.load(entityIds, chain);
    const result = new Map<string, Translation<F>>();
    for (const entityId of entityIds) {
      const translation = this.pick(found, entityId, chain);
      if (translation) {
        result.set(entityId, translation);
      }
    }
    return result;
  }

  /**
   * Every stored translation of an entity, keyed by locale
   */
  async getAll(entityId: string): Promise<Map<Locale, Translation<F>>> {
    const translations = await this.repository.findTranslations(entityId);
    return new Map(translations.map(translation => [translation.locale, translation]));
  }

  /**
   * Translation addressed by a slug. A slug unknown in the requested locale
   * is looked up in the default and then the fallback locale.
   */
  async findBySlug(locale: Locale, slug: string): Promise<Translation<F> | null> {
    for (const candidate of this.registry.fallbackChain(locale)) {
      const translation = await this.repository.findTranslationBySlug(candidate, slug);
      if (translation) {
        return translation;
      }
    }
    return null;
  }

  // ========================================
  // WRITES
  // ========================================

  /**
   * Insert or overwrite the translation for (entityId, locale)
   *
   * @throws UnsupportedLocaleError, ValidationError, EntityNotFoundError,
   * ConflictError when the slug is taken by another entity in that locale
   */
  async put(entityId: string, locale: Locale, fields: F): Promise<Translation<F>> {
    if (!this.registry.isSupported(locale)) {
      throw new UnsupportedLocaleError(locale);
    }

    const parsed = this.repository.definition.fieldsSchema.safeParse(fields);
    if (!parsed.success) {
      throw new ValidationError(`Invalid ${this.type} translation`, ErrorCodes.INVALID_INPUT, {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    const values = parsed.data;

    return this.writes.run(this.cacheKey(entityId, locale), async () => {
      const entity = await this.repository.findEntity(entityId);
      if (!entity) {
        throw new EntityNotFoundError(this.type, entityId);
      }

      try {
        const saved = await this.repository.upsertTranslation(
          entityId,
          locale,
          values,
          new Date().toISOString()
        );
        log.info('Translation saved', { type: this.type, entityId, locale });
        return saved;
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new ConflictError(
            `Slug "${values.slug}" is already used by another ${this.type} in ${locale}`,
            ErrorCodes.DUPLICATE_ENTRY,
            { type: this.type, locale, slug: values.slug }
          );
        }
        if (isForeignKeyViolation(error)) {
          throw new EntityNotFoundError(this.type, entityId);
        }
        throw error;
      } finally {
        this.evict([entityId]);
      }
    });
  }

  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }

  // ========================================
  // INTERNALS
  // ========================================

  private cacheKey(entityId: string, locale: Locale): string {
    return `${entityId}:${locale}`;
  }

  private pick(
    found: Map<string, Translation<F> | null>,
    entityId: string,
    chain: readonly Locale[]
  ): Translation<F> | null {
    for (const locale of chain) {
      const translation = found.get(this.cacheKey(entityId, locale));
      if (translation) {
        return translation;
      }
    }
    return null;
  }

  /**
   * Resolve every (entity, locale) pair from cache, querying the repository
   * once for the entities with any uncached pair.
   */
  private async load(
    entityIds: readonly string[],
    locales: readonly Locale[]
  ): Promise<Map<string, Translation<F> | null>> {
    const found = new Map<string, Translation<F> | null>();
    const missing = new Set<string>();

    for (const entityId of entityIds) {
      for (const locale of locales) {
        const cached = this.cache.get(this.cacheKey(entityId, locale));
        if (cached) {
          found.set(this.cacheKey(entityId, locale), cached.value);
        } else {
          missing.add(entityId);
        }
      }
    }

    if (missing.size === 0) {
      return found;
    }

    const missingIds = [...missing];
    const generation = this.generation;
    const rows = await this.repository.findTranslationsFor(missingIds, locales);

    for (const entityId of missingIds) {
      for (const locale of locales) {
        found.set(this.cacheKey(entityId, locale), null);
      }
    }
    for (const row of rows) {
      found.set(this.cacheKey(row.entityId, row.locale), row);
    }

    if (this.generation !== generation) {
      return found; // written while we were reading
    }
    for (const entityId of missingIds) {
      for (const locale of locales) {
        const key = this.cacheKey(entityId, locale);
        this.cache.set(key, { value: found.get(key) ?? null });
      }
    }

    return found;
  }
}
