/**
 * Route Table
 *
 * Read-only index over built route entries: lookup by name, request
 * matching and URL generation for language switchers.
 *
 * Static paths match through a single map lookup. Paths with `:param`
 * segments are grouped by method and segment count and compared segment by
 * segment.
 *
 * @module routing/routeTable
 */

import type { Locale } from '../i18n/types';
import type { HttpMethod, RouteEntry, RouteMatch, RouteParams } from './types';

interface CompiledRoute<H> {
  entry: RouteEntry<H>;
  segments: string[];
}

const METHODS: readonly HttpMethod[] = ['get', 'post', 'put', 'patch', 'delete'];

function isParam(segment: string): boolean {
  return segment.startsWith(':') && segment.length > 1;
}

function splitPath(path: string): string[] {
  return path.split('/').filter(segment => segment.length > 0);
}

export function toHttpMethod(method: string): HttpMethod | undefined {
  const lower = method.toLowerCase();
  if (lower === 'head') return 'get';
  return METHODS.find(m => m === lower);
}

export class RouteTable<H> {
  private readonly all: readonly RouteEntry<H>[];
  private readonly byNameIndex = new Map<string, RouteEntry<H>>();
  private readonly staticIndex = new Map<string, RouteEntry<H>>();
  private readonly dynamicIndex = new Map<string, CompiledRoute<H>[]>();

  constructor(entries: readonly RouteEntry<H>[]) {
    this.all = Object.freeze([...entries]);

    for (const entry of entries) {
      this.byNameIndex.set(entry.name, entry);

      const segments = splitPath(entry.fullPath);
      if (segments.some(isParam)) {
        const bucket = `${entry.method} ${segments.length}`;
        const compiled = this.dynamicIndex.get(bucket) ?? [];
        compiled.push({ entry, segments });
        this.dynamicIndex.set(bucket, compiled);
      } else {
        this.staticIndex.set(`${entry.method} /${segments.join('/')}`, entry);
      }
    }
  }

  get entries(): readonly RouteEntry<H>[] {
    return this.all;
  }

  byName(name: string): RouteEntry<H> | undefined {
    return this.byNameIndex.get(name);
  }

  entry(key: string, locale: Locale): RouteEntry<H> | undefined {
    return this.byNameIndex.get(`${key}.${locale}`);
  }

  /**
   * Match a request against the table.
   * Static entries win over parameterized ones.
   */
  match(method: string, path: string): RouteMatch<H> | null {
    const httpMethod = toHttpMethod(method);
    if (!httpMethod) return null;

    const segments = splitPath(path);
    const staticEntry = this.staticIndex.get(`${httpMethod} /${segments.join('/')}`);
    if (staticEntry) {
      return { entry: staticEntry, params: {} };
    }

    const candidates = this.dynamicIndex.get(`${httpMethod} ${segments.length}`) ?? [];
    for (const candidate of candidates) {
      const params = matchSegments(candidate.segments, segments);
      if (params) {
        return { entry: candidate.entry, params };
      }
    }

    return null;
  }

  /**
   * Absolute URL path of a logical route in a locale
   *
   * @throws Error when the route is unknown or a path parameter is missing
   */
  urlFor(key: string, locale: Locale, params: RouteParams = {}): string {
    const entry = this.entry(key, locale);
    if (!entry) {
      throw new Error(`Unknown route: ${key}.${locale}`);
    }

    const filled = splitPath(entry.fullPath).map(segment => {
      if (!isParam(segment)) return segment;
      const name = segment.slice(1);
      const value = params[name];
      if (value === undefined) {
        throw new Error(`Missing parameter "${name}" for route ${entry.name}`);
      }
      return encodeURIComponent(String(value));
    });

    return `/${filled.join('/')}`;
  }

  /**
   * URL of the same logical route in every locale that has an entry.
   * A params resolver returning null leaves that locale out.
   */
  alternates(
    key: string,
    params: RouteParams | ((locale: Locale) => RouteParams | null) = {}
  ): Record<Locale, string> {
    const result: Record<Locale, string> = {};
    for (const entry of this.all) {
      if (entry.key !== key) continue;
      const localeParams = typeof params === 'function' ? params(entry.locale) : params;
      if (localeParams === null) continue;
      result[entry.locale] = this.urlFor(key, entry.locale, localeParams);
    }
    return result;
  }
}

function matchSegments(pattern: string[], actual: string[]): Record<string, string> | null {
  const params: Record<string, string> = {};
  for (let i = 0; i < pattern.length; i++) {
    const expected = pattern[i];
    if (isParam(expected)) {
      try {
        params[expected.slice(1)] = decodeURIComponent(actual[i]);
      } catch {
        return null;
      }
    } else if (expected !== actual[i]) {
      return null;
    }
  }
  return params;
}
