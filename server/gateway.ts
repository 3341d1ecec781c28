/**
 * Gateway Application
 *
 * Assembles the request pipeline:
 * request logger -> CORS -> /health -> service routes -> 404 -> error handler
 *
 * Dispatch depends on the registry:
 * - only `default` configured: every path is authenticated and forwarded as-is
 * - named services: `/{name}` and `/{name}/*` are authenticated (unless auth
 *   is skipped), stripped of the prefix and forwarded; `default`, when also
 *   present, takes every other path and is always authenticated
 */

import express, { type Express, type RequestHandler } from 'express';
import type { Config } from './config';
import healthRoutes from './api/health-routes';
import { createLogger, type ComponentLogger } from './lib/logger';
import { createAuthMiddleware } from './middleware/authenticate';
import { createCorsMiddleware } from './middleware/cors';
import { createErrorHandler, notFoundHandler } from './middleware/error-handler';
import { createRequestLogger } from './middleware/request-logger';
import { DEFAULT_SERVICE, type ProxyRegistry } from './proxy/registry';

export interface GatewayOptions {
  config: Pick<Config, 'cors' | 'jwt' | 'auth'>;
  registry: ProxyRegistry;
  logger?: ComponentLogger;
}

export interface RouteDescription {
  prefix: string;
  service: string;
  authenticated: boolean;
}

/**
 * Routes in match order. The catch-all for `default` is listed last as `/*`.
 */
export function describeRoutes(registry: ProxyRegistry, skipAuth: boolean): RouteDescription[] {
  if (registry.isSingleTarget) {
    return [{ prefix: '/*', service: DEFAULT_SERVICE, authenticated: true }];
  }

  const routes: RouteDescription[] = registry
    .names()
    .filter((name) => name !== DEFAULT_SERVICE)
    .map((name) => ({ prefix: `/${name}`, service: name, authenticated: !skipAuth }));

  if (registry.has(DEFAULT_SERVICE)) {
    routes.push({ prefix: '/*', service: DEFAULT_SERVICE, authenticated: true });
  }
  return routes;
}

export function createGateway(options: GatewayOptions): Express {
  const { config, registry } = options;
  const logger = options.logger ?? createLogger('gateway');

  const app = express();
  app.disable('x-powered-by');
  app.set('case sensitive routing', true);

  app.use(createRequestLogger(logger.child({ component: 'http' })));
  app.use(createCorsMiddleware(config.cors, logger.child({ component: 'cors' })));
  app.use(healthRoutes);

  const authenticate = createAuthMiddleware({
    secret: config.jwt.secret,
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
    expirationMs: config.jwt.expirationMs,
    logger: logger.child({ component: 'auth' }),
  });

  const router = express.Router({ caseSensitive: true });

  for (const route of describeRoutes(registry, config.auth.skip)) {
    const proxy = registry.lookup(route.service);
    if (!proxy) {
      continue;
    }

    const handlers: RequestHandler[] = route.authenticated ? [authenticate, proxy.handle] : [proxy.handle];
    if (route.prefix === '/*') {
      router.use(...handlers);
    } else {
      router.use(route.prefix, ...handlers);
    }

    if (!route.authenticated) {
      logger.warn(
        { event: 'auth_skipped', upstream: route.service, prefix: route.prefix },
        `Authentication disabled for ${route.prefix}`
      );
    }
    logger.info(
      {
        event: 'route_registered',
        prefix: route.prefix,
        upstream: route.service,
        target: proxy.target.origin,
        authenticated: route.authenticated,
      },
      `Route ${route.prefix} -> ${proxy.target.origin}`
    );
  }

  app.use(router);
  app.use(notFoundHandler);
  app.use(createErrorHandler(logger.child({ component: 'error-handler' })));

  return app;
}
