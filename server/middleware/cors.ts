/**
 * CORS Middleware
 *
 * Allow-list driven CORS headers. Preflight requests are answered here,
 * before authentication or proxying.
 */

import type { Request, Response, NextFunction } from 'express';
import type { CorsConfig } from '../config';
import { createLogger, type ComponentLogger } from '../lib/logger';

export function isOriginAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some((allowed) => allowed === '*' || allowed === origin);
}

export function createCorsMiddleware(
  config: CorsConfig,
  logger: ComponentLogger = createLogger('cors')
) {
  const methods = config.allowedMethods.join(', ');
  const headers = config.allowedHeaders.join(', ');

  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.headers.origin;

    if (origin && isOriginAllowed(origin, config.allowedOrigins)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.vary('Origin');
      if (config.allowCredentials) {
        res.setHeader('Access-Control-Allow-Credentials', 'true');
      }
      res.setHeader('Access-Control-Allow-Methods', methods);
      res.setHeader('Access-Control-Allow-Headers', headers);
      if (config.maxAge > 0) {
        res.setHeader('Access-Control-Max-Age', String(config.maxAge));
      }
    } else if (origin) {
      logger.debug({ origin }, 'CORS: origin not in allow-list');
    }

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  };
}
