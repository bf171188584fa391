/**
 * Locale Registry
 *
 * The process-wide set of supported locales, the default (unprefixed) locale
 * and the fallback locale used for missing translations. Built once at startup
 * and immutable afterwards.
 *
 * @module i18n/localeRegistry
 */

import { ConfigurationError } from '../errors/ConfigurationError';
import type { LocaleConfig } from '../config/types';
import { LOCALE_CODE_PATTERN, type Locale } from './types';

export class LocaleRegistry {
  private readonly locales: readonly Locale[];
  private readonly lookup: ReadonlySet<Locale>;
  private readonly defaultCode: Locale;
  private readonly fallbackCode: Locale;

  private constructor(locales: Locale[], defaultCode: Locale, fallbackCode: Locale) {
    this.locales = Object.freeze([...locales]);
    this.lookup = new Set(locales);
    this.defaultCode = defaultCode;
    this.fallbackCode = fallbackCode;
  }

  /**
   * Validate a locale configuration and build the registry.
   *
   * @throws ConfigurationError when the list is empty, holds duplicates or
   * malformed codes, or when the default or fallback is not supported
   */
  static create(config: LocaleConfig): LocaleRegistry {
    const { supported } = config;

    if (supported.length === 0) {
      throw new ConfigurationError('At least one supported locale is required');
    }

    const malformed = supported.filter(code => !LOCALE_CODE_PATTERN.test(code));
    if (malformed.length > 0) {
      throw new ConfigurationError('Malformed locale codes', { locales: malformed });
    }

    const seen = new Set<Locale>();
    for (const code of supported) {
      if (seen.has(code)) {
        throw new ConfigurationError(`Duplicate locale: ${code}`, { locale: code });
      }
      seen.add(code);
    }

    if (!seen.has(config.default)) {
      throw new ConfigurationError(`Default locale "${config.default}" is not supported`, {
        defaultLocale: config.default,
        supported,
      });
    }

    if (!seen.has(config.fallback)) {
      throw new ConfigurationError(`Fallback locale "${config.fallback}" is not supported`, {
        fallbackLocale: config.fallback,
        supported,
      });
    }

    return new LocaleRegistry(supported, config.default, config.fallback);
  }

  /** Supported locales in configured order */
  supportedLocales(): readonly Locale[] {
    return this.locales;
  }

  defaultLocale(): Locale {
    return this.defaultCode;
  }

  fallbackLocale(): Locale {
    return this.fallbackCode;
  }

  isSupported(code: string): boolean {
    return this.lookup.has(code);
  }

  /**
   * Lookup order for content in a given locale: the locale itself, then the
   * default locale, then the fallback locale, without repeats.
   */
  fallbackChain(locale: Locale): Locale[] {
    return [...new Set([locale, this.defaultCode, this.fallbackCode])];
  }
}
