/**
 * Locale Resolver Middleware Tests
 */

import { describe, it, expect } from 'vitest';
import express, { Express, Request, Response } from 'express';
import request from 'supertest';
import { localeResolver, type LocaleResolverOptions } from '../../../src/middleware/localeResolver';
import { requestContext } from '../../../src/utils/requestContext';
import { createRegistry } from '../../helpers/locales';

function createTestApp(options?: LocaleResolverOptions): Express {
  const app = express();
  app.use((req, res, next) => {
    requestContext.run({ requestId: 'test-request', startTime: Date.now() }, next);
  });
  app.use(localeResolver(createRegistry(), options));
  app.use((req: Request, res: Response) => {
    res.json({ active: req.activeLocale ?? null, contextLocale: requestContext.get()?.locale ?? null });
  });
  return app;
}

describe('localeResolver middleware', () => {
  it('stores the active locale on the request', async () => {
    const response = await request(createTestApp()).get('/fr/a-propos');

    expect(response.body).toEqual({
      active: { locale: 'fr', prefixed: true, path: '/a-propos' },
      contextLocale: 'fr',
    });
  });

  it('activates the default locale for unprefixed paths', async () => {
    const response = await request(createTestApp()).get('/about');

    expect(response.body.active).toEqual({ locale: 'en', prefixed: false, path: '/about' });
  });

  it('redirects a default-locale prefix to the unprefixed path', async () => {
    const response = await request(createTestApp()).get('/en/blog/night-trains?page=2');

    expect(response.status).toBe(301);
    expect(response.headers.location).toBe('/blog/night-trains?page=2');
  });

  it('redirects the bare default locale to the root', async () => {
    const response = await request(createTestApp()).get('/en');

    expect(response.status).toBe(301);
    expect(response.headers.location).toBe('/');
  });

  it('keeps the redirect on this host when the path starts with extra slashes', async () => {
    const response = await request(createTestApp()).get('/en//other.example/x');

    expect(response.status).toBe(301);
    expect(response.headers.location).toBe('/other.example/x');
  });

  it('leaves an encoded backslash in the redirected path', async () => {
    const response = await request(createTestApp()).get('/en/%5Cother.example');

    expect(response.status).toBe(301);
    expect(response.headers.location).toBe('/%5Cother.example');
  });

  it('preserves the method of non-GET requests with a 308', async () => {
    const response = await request(createTestApp()).post('/en/contact').send({ name: 'test' });

    expect(response.status).toBe(308);
    expect(response.headers.location).toBe('/contact');
  });

  it('can leave default-locale prefixes in place', async () => {
    const response = await request(createTestApp({ redirectDefaultPrefix: false })).get('/en/about');

    expect(response.status).toBe(200);
    expect(response.body.active).toEqual({ locale: 'en', prefixed: true, path: '/about' });
  });
});
