/**
 * Path Translator
 *
 * Maps a logical route key and a locale to the URL path segment used for that
 * locale. A missing translation yields the key itself, so a locale without a
 * table (or without an entry) reuses the key as its path.
 *
 * @module i18n/pathTranslator
 */

import type { Locale, PathTranslationTable } from './types';

export class PathTranslator {
  private readonly tables: ReadonlyMap<Locale, ReadonlyMap<string, string>>;

  constructor(table: PathTranslationTable) {
    const tables = new Map<Locale, ReadonlyMap<string, string>>();
    for (const [locale, entries] of Object.entries(table)) {
      tables.set(locale, new Map(Object.entries(entries)));
    }
    this.tables = tables;
  }

  resolve(logicalKey: string, locale: Locale): string {
    return this.tables.get(locale)?.get(logicalKey) ?? logicalKey;
  }

  /**
   * Whether an explicit translation exists for the pair
   */
  has(logicalKey: string, locale: Locale): boolean {
    return this.tables.get(locale)?.has(logicalKey) ?? false;
  }
}
