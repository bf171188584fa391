import { describe, it, expect } from 'vitest';
import { slugify } from '../../../src/utils/slugify';

describe('slugify', () => {
  it('lowercases and hyphenates words', () => {
    expect(slugify('A week in Lisbon')).toBe('a-week-in-lisbon');
  });

  it('drops accents', () => {
    expect(slugify('Écrire en français')).toBe('ecrire-en-francais');
    expect(slugify('Culinária')).toBe('culinaria');
  });

  it('removes punctuation and collapses separators', () => {
    expect(slugify('  Flour, water -- salt!  ')).toBe('flour-water-salt');
  });

  it('keeps letters of other scripts', () => {
    expect(slugify('東京 旅行')).toBe('東京-旅行');
  });

  it('returns an empty string when nothing is left', () => {
    expect(slugify('!?')).toBe('');
  });
});
