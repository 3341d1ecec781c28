/**
 * Authentication Middleware
 *
 * Validates the bearer token on every request it guards and attaches the
 * caller's identity to the response locals. Failures end the request here.
 */

import type { Request, Response, NextFunction } from 'express';
import { TokenManager, type TokenManagerOptions } from '../auth/token-manager';
import { AuthError, InternalServerError } from '../lib/errors';
import { createLogger, logError, type ComponentLogger } from '../lib/logger';
import { setRequestIdentity } from './request-context';

export interface AuthMiddlewareOptions extends TokenManagerOptions {
  logger?: ComponentLogger;
}

type Middleware = (req: Request, res: Response, next: NextFunction) => void;

/**
 * Build the auth middleware. The token manager is constructed once; if that
 * fails, every guarded request is answered with 500.
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions): Middleware {
  const { logger = createLogger('auth'), ...managerOptions } = options;

  let manager: TokenManager;
  try {
    manager = new TokenManager(managerOptions);
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    logError(logger, failure, { event: 'auth_init_failed' });
    return (_req, res) => {
      const internal = new InternalServerError();
      res.status(internal.statusCode).json(internal.toJSON());
    };
  }

  return (req, res, next) => {
    const header = req.headers.authorization;
    try {
      const claims = manager.validateRequest(header);
      setRequestIdentity(res, claims);
    } catch (error) {
      if (!(error instanceof AuthError)) {
        next(error);
        return;
      }
      logger.warn(
        {
          event: 'auth_failed',
          method: req.method,
          path: req.originalUrl,
          reason: error.cause instanceof Error ? error.cause.message : error.message,
          userId: bestEffortUserId(manager, header) || undefined,
        },
        `Authentication failed: ${error.message}`
      );
      res.status(error.statusCode).json(error.toJSON());
      return;
    }
    next();
  };
}

function bestEffortUserId(manager: TokenManager, header: string | undefined): string {
  const separator = header?.indexOf(' ') ?? -1;
  if (!header || separator === -1) {
    return '';
  }
  return manager.extractUserId(header.slice(separator + 1).trim());
}
