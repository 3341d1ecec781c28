/**
 * Per-Backend Proxy Tests
 *
 * Runs against an in-process mock backend on an ephemeral port.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import express from 'express';
import { readFileSync } from 'fs';
import { createServer as createHttpsServer } from 'https';
import request from 'supertest';

import type { TokenClaims } from '../../server/auth/claims';
import { setRequestIdentity } from '../../server/middleware/request-context';
import { BackendProxy, DEFAULT_PROXY_TIMEOUT_MS } from '../../server/proxy/backend-proxy';
import { startMockBackend, type RunningBackend } from '../support/mock-backend';
import { createMockLogger, type MockLogger } from '../support/logger';

const TLS_CERT = readFileSync(new URL('../fixtures/tls/test-cert.pem', import.meta.url));
const TLS_KEY = readFileSync(new URL('../fixtures/tls/test-key.pem', import.meta.url));

function claimsFor(userId: string): TokenClaims {
  return {
    userId,
    roles: [],
    metadata: {},
    issuer: 'api-gateway',
    audience: ['api-gateway'],
    subject: userId,
    expiresAt: new Date(Date.now() + 60_000),
  };
}

describe('BackendProxy', () => {
  let backend: RunningBackend;
  let logger: MockLogger;

  beforeAll(async () => {
    backend = await startMockBackend('crm');
  });

  afterAll(async () => {
    await backend.close();
  });

  beforeEach(() => {
    logger = createMockLogger();
  });

  function createApp(proxy: BackendProxy, userId?: string) {
    const app = express();
    app.use((_req, res, next) => {
      if (userId) {
        setRequestIdentity(res, claimsFor(userId));
      }
      next();
    });
    app.use('/crm', proxy.handle);
    return app;
  }

  function createProxy(target: string, timeoutMs?: number) {
    return new BackendProxy({ name: 'crm', target: new URL(target), timeoutMs, logger });
  }

  describe('construction', () => {
    it('should default the timeout', () => {
      expect(createProxy('http://127.0.0.1:1').timeoutMs).toBe(DEFAULT_PROXY_TIMEOUT_MS);
      expect(createProxy('http://127.0.0.1:1', 0).timeoutMs).toBe(DEFAULT_PROXY_TIMEOUT_MS);
      expect(createProxy('http://127.0.0.1:1', 250).timeoutMs).toBe(250);
    });
  });

  describe('forwarding', () => {
    it('should forward the path below the mount point with its query', async () => {
      const response = await request(createApp(createProxy(backend.url))).get('/crm/api/echo?page=2');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        service: 'crm',
        method: 'GET',
        path: '/api/echo',
        url: '/api/echo?page=2',
      });
    });

    it('should forward the bare prefix as the root path', async () => {
      const response = await request(createApp(createProxy(backend.url))).get('/crm');

      expect(response.body).toMatchObject({ path: '/', message: 'catch-all handler' });
    });

    it('should relay upstream status codes and bodies', async () => {
      const app = createApp(createProxy(backend.url));

      const created = await request(app).post('/crm/api/users').send({ name: 'new' });
      const failed = await request(app).get('/crm/api/error');

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ message: 'user created', method: 'POST' });
      expect(failed.status).toBe(500);
      expect(failed.body).toEqual({ error: 'internal_error', message: 'simulated backend error' });
    });

    it('should log each proxied response', async () => {
      await request(createApp(createProxy(backend.url))).get('/crm/api/echo');

      expect(logger.info).toHaveBeenCalledWith(
        {
          event: 'proxy_response',
          method: 'GET',
          path: '/crm/api/echo',
          upstreamPath: '/api/echo',
          statusCode: 200,
        },
        'Proxied GET /crm/api/echo -> 200'
      );
      expect(logger.child).toHaveBeenCalledWith({ upstream: 'crm', target: backend.url });
    });
  });

  // ============================================
  // HEADER TRUST BOUNDARY
  // ============================================
  describe('trusted headers', () => {
    it('should replace client-supplied forwarding headers', async () => {
      const response = await request(createApp(createProxy(backend.url)))
        .get('/crm/api/echo')
        .set('Host', 'gateway.example.test')
        .set('X-Real-IP', '203.0.113.66')
        .set('X-Forwarded-For', '203.0.113.66, 10.0.0.1')
        .set('X-Forwarded-Proto', 'https')
        .set('X-Forwarded-Host', 'evil.example.test')
        .set('X-User-Id', 'admin');

      const headers = response.body.headers;
      expect(headers['x-real-ip']).toBe('127.0.0.1');
      expect(headers['x-forwarded-for']).toBe('127.0.0.1');
      expect(headers['x-forwarded-proto']).toBe('http');
      expect(headers['x-forwarded-host']).toBe('gateway.example.test');
      expect(headers['x-user-id']).toBeUndefined();
    });

    it('should report https to the backend when the client connected over TLS', async () => {
      const server = createHttpsServer({ key: TLS_KEY, cert: TLS_CERT }, createApp(createProxy(backend.url)));

      const response = await request(server)
        .get('/crm/api/echo')
        .ca(TLS_CERT)
        .set('X-Forwarded-Proto', 'http');

      expect(response.status).toBe(200);
      expect(response.body.headers['x-forwarded-proto']).toBe('https');
      expect(response.body.headers['x-real-ip']).toBe('127.0.0.1');
    });

    it('should rewrite Host to the upstream', async () => {
      const response = await request(createApp(createProxy(backend.url)))
        .get('/crm/api/echo')
        .set('Host', 'gateway.example.test');

      expect(response.body.headers.host).toBe(new URL(backend.url).host);
    });

    it('should pass Authorization and other headers through', async () => {
      const response = await request(createApp(createProxy(backend.url)))
        .get('/crm/api/echo')
        .set('Authorization', 'Bearer test-token')
        .set('X-Request-Source', 'unit-test');

      expect(response.body.headers.authorization).toBe('Bearer test-token');
      expect(response.body.headers['x-request-source']).toBe('unit-test');
    });

    it('should inject the authenticated user id', async () => {
      const response = await request(createApp(createProxy(backend.url), 'user-7'))
        .get('/crm/api/protected')
        .set('Authorization', 'Bearer test-token')
        .set('X-User-Id', 'admin');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('protected resource accessed by user user-7');
      expect(response.body.headers['x-user-id']).toBe('user-7');
    });
  });

  // ============================================
  // FAILURES
  // ============================================
  describe('failures', () => {
    it('should answer 504 when the upstream misses the deadline', async () => {
      const response = await request(createApp(createProxy(backend.url, 100))).get('/crm/api/slow?ms=2000');

      expect(response.status).toBe(504);
      expect(response.body).toEqual({ error: 'gateway timeout' });
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ event: 'proxy_error', statusCode: 504, path: '/crm/api/slow?ms=2000' }),
        'Proxy gateway timeout: GET /crm/api/slow?ms=2000'
      );
    });

    it('should not time out a response that arrives in time', async () => {
      const response = await request(createApp(createProxy(backend.url, 1000))).get('/crm/api/slow?ms=20');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('slow response after 20ms');
    });

    it('should answer 502 when the upstream refuses connections', async () => {
      const closed = await startMockBackend('gone');
      await closed.close();

      const response = await request(createApp(createProxy(closed.url))).get('/crm/api/echo');

      expect(response.status).toBe(502);
      expect(response.body).toEqual({ error: 'bad gateway' });
      await vi.waitFor(() =>
        expect(logger.error).toHaveBeenCalledWith(
          expect.objectContaining({ event: 'proxy_error', statusCode: 502 }),
          'Proxy bad gateway: GET /crm/api/echo'
        )
      );
    });
  });
});
