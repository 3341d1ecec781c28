/**
 * Authentication Middleware Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';

import { TokenManager } from '../../server/auth/token-manager';
import { createAuthMiddleware } from '../../server/middleware/authenticate';
import { getRequestIdentity } from '../../server/middleware/request-context';
import { createMockLogger, type MockLogger } from '../support/logger';

const SECRET = 'test-secret';
const DAY = 24 * 60 * 60 * 1000;

describe('Authentication Middleware', () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  function createApp(secret = SECRET) {
    const app = express();
    app.use(createAuthMiddleware({ secret, logger }));
    app.get('/whoami', (_req, res) => {
      const identity = getRequestIdentity(res);
      res.json({ userId: identity?.userId, roles: identity?.claims.roles });
    });
    return app;
  }

  it('should attach the identity and continue for a valid token', async () => {
    const token = new TokenManager({ secret: SECRET }).issueWithClaims({ userId: 'user-123', roles: ['reader'] });

    const response = await request(createApp()).get('/whoami').set('Authorization', `Bearer ${token}`);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ userId: 'user-123', roles: ['reader'] });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should reject a request without credentials', async () => {
    const response = await request(createApp()).get('/whoami');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'missing authorization header' });
    expect(logger.warn).toHaveBeenCalledWith(
      {
        event: 'auth_failed',
        method: 'GET',
        path: '/whoami',
        reason: 'missing authorization header',
        userId: undefined,
      },
      'Authentication failed: missing authorization header'
    );
  });

  it('should reject a non-bearer scheme', async () => {
    const response = await request(createApp()).get('/whoami').set('Authorization', 'Basic dXNlcjpwYXNz');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'invalid authorization scheme (expected Bearer)' });
  });

  it('should report an expired token and log the best-effort user id', async () => {
    const issuedAt = Date.now() - 2 * DAY;
    const token = new TokenManager({ secret: SECRET, clock: () => issuedAt }).issue('user-123');

    const response = await request(createApp()).get('/whoami').set('Authorization', `Bearer ${token}`);

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'token has expired' });
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ reason: 'token has expired', userId: 'user-123' }),
      'Authentication failed: token has expired'
    );
  });

  it('should not leak the failure cause to the client', async () => {
    const token = new TokenManager({ secret: 'other-test-secret' }).issue('user-123');

    const response = await request(createApp()).get('/whoami').set('Authorization', `Bearer ${token}`);

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'invalid or expired token' });
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ reason: 'invalid token: invalid signature', userId: undefined }),
      'Authentication failed: invalid or expired token'
    );
  });

  it('should answer 500 when the token manager cannot be built', async () => {
    const app = createApp('');

    const response = await request(app).get('/whoami');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'internal server error' });
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'auth_init_failed' }),
      'configuration validation failed: secret cannot be empty'
    );
  });
});
