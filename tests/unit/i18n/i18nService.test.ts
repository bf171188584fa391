/**
 * I18n Service Tests
 */

import { describe, it, expect, vi, beforeAll } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => mockLogger,
}));

import { I18nService } from '../../../src/i18n/i18nService';
import { createRegistry } from '../../helpers/locales';

describe('I18nService', () => {
  describe('before initialization', () => {
    it('returns the default value and warns', () => {
      const service = new I18nService();

      expect(service.initialized).toBe(false);
      expect(service.translate('common', 'pages.about.title', { defaultValue: 'About' })).toBe('About');
      expect(mockLogger.warn).toHaveBeenCalledWith('I18n not initialized, returning key', {
        key: 'common:pages.about.title',
      });
    });

    it('returns the namespaced key without a default', () => {
      expect(new I18nService().translate('errors', 'NOT_FOUND')).toBe('errors:NOT_FOUND');
    });
  });

  describe('after initialization', () => {
    const service = new I18nService();

    beforeAll(async () => {
      await service.initialize(createRegistry());
    });

    it('translates for an explicit locale', () => {
      expect(service.initialized).toBe(true);
      expect(service.translate('common', 'pages.about.title', { locale: 'fr' })).toBe('À propos');
      expect(service.translate('common', 'pages.about.title', { locale: 'pt' })).toBe('Sobre nós');
    });

    it('uses the default locale when none is given', () => {
      expect(service.translate('common', 'pages.about.title')).toBe('About us');
    });

    it('interpolates values', () => {
      expect(
        service.translate('errors', 'ENTITY_NOT_FOUND', { locale: 'fr', values: { entity: 'post' } })
      ).toBe('post introuvable');
    });

    it('falls back to the default locale for keys the locale lacks', () => {
      expect(
        service.translate('errors', 'UNSUPPORTED_LOCALE', {
          locale: 'jp',
          values: { locale: 'de' },
          defaultValue: 'unused',
        })
      ).toBe('Unsupported locale: de');
    });

    it('returns the default value for unknown keys', () => {
      expect(service.translate('common', 'nope', { locale: 'fr', defaultValue: 'Fallback' })).toBe('Fallback');
    });
  });
});
