/**
 * Internationalization Types
 *
 * @module i18n/types
 */

/**
 * A locale code such as "en", "fr" or "pt-BR".
 * Membership in the supported set is checked by the LocaleRegistry, not by the type.
 */
export type Locale = string;

/**
 * Accepted shape for configured locale codes
 */
export const LOCALE_CODE_PATTERN = /^[a-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;

/**
 * Locale chosen for a request, with the path left for routing
 */
export interface ActiveLocale {
  locale: Locale;
  /** True when the locale came from a leading path segment */
  prefixed: boolean;
  /** Request path with the locale segment removed (always starts with '/') */
  path: string;
}

/**
 * Interpolation values for UI strings
 */
export interface TranslationOptions {
  [key: string]: string | number | boolean | undefined;
}

/**
 * Translation namespaces for UI strings
 */
export type TranslationNamespace = 'common' | 'errors';

/**
 * Per-locale path segment tables, keyed by logical route key
 */
export type PathTranslationTable = Record<Locale, Record<string, string>>;
