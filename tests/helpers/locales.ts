import { LocaleRegistry } from '../../src/i18n/localeRegistry';
import type { LocaleConfig } from '../../src/config/types';

export const defaultLocaleConfig: LocaleConfig = {
  supported: ['en', 'pt', 'fr', 'jp'],
  default: 'en',
  fallback: 'en',
};

export function createRegistry(overrides: Partial<LocaleConfig> = {}): LocaleRegistry {
  return LocaleRegistry.create({ ...defaultLocaleConfig, ...overrides });
}
