/**
 * Route Table Tests
 */

import { describe, it, expect } from 'vitest';
import { RouteTable, toHttpMethod } from '../../../src/routing/routeTable';
import { buildRouteTable } from '../../../src/routing/routeTableBuilder';
import { PathTranslator } from '../../../src/i18n/pathTranslator';
import { routeSegments } from '../../../src/i18n/locales';
import type { LogicalRoute } from '../../../src/routing/types';
import { createRegistry } from '../../helpers/locales';

const routes: LogicalRoute<string>[] = [
  { key: 'about', method: 'get', handler: 'about' },
  { key: 'blog', method: 'get', handler: 'blog' },
  { key: 'post', method: 'get', handler: 'post' },
];

function createTable(): RouteTable<string> {
  return new RouteTable(buildRouteTable(routes, createRegistry(), new PathTranslator(routeSegments)));
}

describe('toHttpMethod', () => {
  it('normalizes case and maps HEAD to GET', () => {
    expect(toHttpMethod('GET')).toBe('get');
    expect(toHttpMethod('HEAD')).toBe('get');
    expect(toHttpMethod('delete')).toBe('delete');
    expect(toHttpMethod('OPTIONS')).toBeUndefined();
  });
});

describe('RouteTable', () => {
  const table = createTable();

  describe('lookup by name', () => {
    it('finds an entry by name and by key and locale', () => {
      expect(table.byName('about.fr')?.fullPath).toBe('fr/a-propos');
      expect(table.entry('about', 'pt')?.fullPath).toBe('pt/sobre');
      expect(table.byName('about.de')).toBeUndefined();
    });

    it('exposes entries read-only', () => {
      expect(table.entries).toHaveLength(12);
      expect(Object.isFrozen(table.entries)).toBe(true);
    });
  });

  describe('match', () => {
    it('matches static paths', () => {
      const match = table.match('GET', '/fr/a-propos');

      expect(match?.entry.name).toBe('about.fr');
      expect(match?.params).toEqual({});
    });

    it('ignores trailing slashes', () => {
      expect(table.match('GET', '/about/')?.entry.name).toBe('about.en');
    });

    it('matches parameterized paths and decodes parameters', () => {
      const match = table.match('GET', '/pt/blog/uma%20semana');

      expect(match?.entry.name).toBe('post.pt');
      expect(match?.params).toEqual({ slug: 'uma semana' });
    });

    it('prefers a static path over a parameterized one', () => {
      expect(table.match('GET', '/blog')?.entry.name).toBe('blog.en');
    });

    it('returns null for unknown paths and methods', () => {
      expect(table.match('GET', '/fr/about')).toBeNull();
      expect(table.match('POST', '/about')).toBeNull();
      expect(table.match('OPTIONS', '/about')).toBeNull();
    });

    it('returns null for malformed percent-encoding', () => {
      expect(table.match('GET', '/blog/%E0%A4%A')).toBeNull();
    });
  });

  describe('urlFor', () => {
    it('builds absolute paths', () => {
      expect(table.urlFor('about', 'en')).toBe('/about');
      expect(table.urlFor('about', 'fr')).toBe('/fr/a-propos');
    });

    it('fills and encodes parameters', () => {
      expect(table.urlFor('post', 'jp', { slug: 'ryori' })).toBe('/jp/blog/ryori');
      expect(table.urlFor('post', 'en', { slug: 'a b' })).toBe('/blog/a%20b');
      expect(table.urlFor('post', 'fr', { slug: 42 })).toBe('/fr/blog/42');
    });

    it('throws on unknown routes and missing parameters', () => {
      expect(() => table.urlFor('missing', 'en')).toThrow('Unknown route: missing.en');
      expect(() => table.urlFor('post', 'en')).toThrow('Missing parameter "slug" for route post.en');
    });
  });

  describe('alternates', () => {
    it('lists the route in every locale', () => {
      expect(table.alternates('about')).toEqual({
        en: '/about',
        pt: '/pt/sobre',
        fr: '/fr/a-propos',
        jp: '/jp/about',
      });
    });

    it('resolves parameters per locale and skips locales resolved to null', () => {
      const slugs: Record<string, string> = { en: 'bread', fr: 'pain' };

      expect(
        table.alternates('post', locale => (slugs[locale] ? { slug: slugs[locale] } : null))
      ).toEqual({ en: '/blog/bread', fr: '/fr/blog/pain' });
    });

    it('is empty for unknown keys', () => {
      expect(table.alternates('missing')).toEqual({});
    });
  });
});
