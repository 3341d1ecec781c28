/**
 * Request Logger Middleware Tests
 *
 * One record per finished request with correlation ID, client address and user.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import express from 'express';
import request from 'supertest';

import type { TokenClaims } from '../../server/auth/claims';
import { setRequestIdentity } from '../../server/middleware/request-context';
import { createRequestLogger, normalizeAddress } from '../../server/middleware/request-logger';
import { createMockLogger, type MockLogger } from '../support/logger';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const CLAIMS: TokenClaims = {
  userId: 'user-42',
  roles: [],
  metadata: {},
  issuer: 'api-gateway',
  audience: ['api-gateway'],
  subject: 'user-42',
  expiresAt: new Date(Date.now() + 60_000),
};

describe('Request Logger Middleware', () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  function createApp() {
    const app = express();
    app.use(createRequestLogger(logger));
    app.get('/ok', (_req, res) => {
      res.send('ok');
    });
    app.get('/me', (_req, res) => {
      setRequestIdentity(res, CLAIMS);
      res.send('me');
    });
    app.get('/boom', (_req, res) => {
      res.status(502).send('bad gateway');
    });
    return app;
  }

  describe('correlation ID', () => {
    it('should generate a correlation ID when absent', async () => {
      const response = await request(createApp()).get('/ok');
      expect(response.headers['x-correlation-id']).toMatch(UUID_PATTERN);
    });

    it('should echo an incoming correlation ID', async () => {
      const response = await request(createApp()).get('/ok').set('X-Correlation-ID', 'corr-123');
      expect(response.headers['x-correlation-id']).toBe('corr-123');
    });
  });

  describe('completed request record', () => {
    it('should log successful requests at info with request fields', async () => {
      await request(createApp())
        .get('/ok')
        .set('User-Agent', 'gateway-test')
        .set('X-Correlation-ID', 'corr-1');

      await vi.waitFor(() => expect(logger.info).toHaveBeenCalledTimes(1));
      expect(logger.info).toHaveBeenCalledWith(
        {
          event: 'request_completed',
          method: 'GET',
          path: '/ok',
          statusCode: 200,
          duration: expect.any(Number),
          clientIp: '127.0.0.1',
          userAgent: 'gateway-test',
          correlationId: 'corr-1',
          userId: undefined,
        },
        expect.stringMatching(/^← GET \/ok 200 \(\d+ms\)$/)
      );
    });

    it('should log client errors at warn', async () => {
      await request(createApp()).get('/missing');

      await vi.waitFor(() => expect(logger.warn).toHaveBeenCalledTimes(1));
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ path: '/missing', statusCode: 404 }),
        expect.any(String)
      );
    });

    it('should log server errors at error', async () => {
      await request(createApp()).get('/boom');

      await vi.waitFor(() => expect(logger.error).toHaveBeenCalledTimes(1));
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ path: '/boom', statusCode: 502 }),
        expect.any(String)
      );
    });

    it('should include the authenticated user', async () => {
      await request(createApp()).get('/me');

      await vi.waitFor(() => expect(logger.info).toHaveBeenCalledTimes(1));
      expect(logger.info).toHaveBeenCalledWith(expect.objectContaining({ userId: 'user-42' }), expect.any(String));
    });

    it('should prefer the first X-Forwarded-For entry', async () => {
      await request(createApp())
        .get('/ok')
        .set('X-Forwarded-For', '203.0.113.7, 10.0.0.1')
        .set('X-Real-IP', '198.51.100.2');

      await vi.waitFor(() => expect(logger.info).toHaveBeenCalledTimes(1));
      expect(logger.info).toHaveBeenCalledWith(expect.objectContaining({ clientIp: '203.0.113.7' }), expect.any(String));
    });

    it('should fall back to X-Real-IP', async () => {
      await request(createApp()).get('/ok').set('X-Real-IP', '198.51.100.2');

      await vi.waitFor(() => expect(logger.info).toHaveBeenCalledTimes(1));
      expect(logger.info).toHaveBeenCalledWith(expect.objectContaining({ clientIp: '198.51.100.2' }), expect.any(String));
    });
  });

  describe('normalizeAddress', () => {
    it('should strip the IPv4-mapped prefix', () => {
      expect(normalizeAddress('::ffff:10.1.2.3')).toBe('10.1.2.3');
      expect(normalizeAddress('::1')).toBe('::1');
      expect(normalizeAddress(undefined)).toBe('');
    });
  });
});
