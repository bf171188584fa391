/**
 * Internationalization Service
 *
 * UI string translation using i18next. Locale is passed on every call rather
 * than stored as instance state, so concurrent requests never share one.
 *
 * @module i18n/i18nService
 */

import i18next, { type i18n as I18nInstance } from 'i18next';
import { createLogger } from '../utils/logger';
import type { LocaleRegistry } from './localeRegistry';
import type { Locale, TranslationNamespace, TranslationOptions } from './types';
import { uiResources } from './locales';

const log = createLogger('I18N');

/**
 * Target locale, interpolation values and the text used when no locale has the key
 */
export interface TranslateOptions {
  locale?: Locale;
  defaultValue?: string;
  values?: TranslationOptions;
}

export class I18nService {
  private instance: I18nInstance | null = null;
  private defaultLocale: Locale = 'en';

  /**
   * Initialize i18next for the registry's locales.
   * Calling again replaces the previous instance.
   */
  async initialize(registry: LocaleRegistry): Promise<void> {
    const instance = i18next.createInstance();

    await instance.init({
      lng: registry.defaultLocale(),
      fallbackLng: [...new Set([registry.defaultLocale(), registry.fallbackLocale()])],
      supportedLngs: [...registry.supportedLocales()],

      ns: ['common', 'errors'],
      defaultNS: 'common',

      resources: uiResources,

      interpolation: {
        escapeValue: false, // JSON responses, not HTML
      },

      returnNull: false,
      returnEmptyString: false,
    });

    this.instance = instance;
    this.defaultLocale = registry.defaultLocale();

    log.info('I18n service initialized', {
      defaultLocale: registry.defaultLocale(),
      supportedLocales: registry.supportedLocales(),
    });
  }

  get initialized(): boolean {
    return this.instance !== null;
  }

  /**
   * Translate a namespaced key for an explicit locale
   *
   * @example
   * i18nService.translate('common', 'pages.about.title', { locale: 'fr' }) // 'À propos'
   * i18nService.translate('errors', 'ENTITY_NOT_FOUND', { locale: 'fr', values: { entity: 'post' } })
   */
  translate(namespace: TranslationNamespace, key: string, options: TranslateOptions = {}): string {
    const fullKey = `${namespace}:${key}`;

    if (!this.instance) {
      log.warn('I18n not initialized, returning key', { key: fullKey });
      return options.defaultValue ?? fullKey;
    }

    const result = this.instance.t(fullKey, {
      ...options.values,
      ...(options.defaultValue !== undefined ? { defaultValue: options.defaultValue } : {}),
      lng: options.locale ?? this.defaultLocale,
    });

    return typeof result === 'string' && result.length > 0 ? result : fullKey;
  }
}

// Singleton instance
export const i18nService = new I18nService();
