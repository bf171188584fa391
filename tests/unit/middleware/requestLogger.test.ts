/**
 * Request Logger Middleware Tests
 */

import { describe, it, expect, vi } from 'vitest';
import express, { Express, Request, Response } from 'express';
import request from 'supertest';

const mockLogger = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../../../src/utils/logger', () => ({
  createLogger: () => mockLogger,
}));

import { requestLogger } from '../../../src/middleware/requestLogger';
import { requestContext } from '../../../src/utils/requestContext';

function createTestApp(status = 200): Express {
  const app = express();
  app.use(requestLogger);
  app.use((req: Request, res: Response) => {
    requestContext.setLocale('fr');
    res.status(status).json({ requestId: requestContext.getRequestId() });
  });
  return app;
}

describe('requestLogger', () => {
  it('generates a request ID and exposes it', async () => {
    const response = await request(createTestApp()).get('/fr/a-propos');

    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f]{8}$/);
    expect(response.body.requestId).toBe(response.headers['x-request-id']);
  });

  it('reuses an incoming request ID', async () => {
    const response = await request(createTestApp()).get('/about').set('X-Request-ID', 'upstream-id');

    expect(response.headers['x-request-id']).toBe('upstream-id');
    expect(response.body.requestId).toBe('upstream-id');
  });

  it('logs start and completion with the active locale', async () => {
    await request(createTestApp()).get('/fr/a-propos');

    expect(mockLogger.info).toHaveBeenCalledWith('GET /fr/a-propos', expect.any(Object));
    expect(mockLogger.info).toHaveBeenCalledWith(
      'GET /fr/a-propos completed',
      expect.objectContaining({ status: 200, locale: 'fr' })
    );
  });

  it('logs client errors as warnings', async () => {
    await request(createTestApp(404)).get('/nope');

    expect(mockLogger.warn).toHaveBeenCalledWith('GET /nope completed', expect.objectContaining({ status: 404 }));
  });

  it('logs server errors as errors', async () => {
    await request(createTestApp(500)).get('/broken');

    expect(mockLogger.error).toHaveBeenCalledWith('GET /broken completed', expect.objectContaining({ status: 500 }));
  });

  it('skips health checks', async () => {
    await request(createTestApp()).get('/health');

    expect(mockLogger.info).not.toHaveBeenCalled();
  });
});
