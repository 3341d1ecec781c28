/**
 * Request Logging Middleware
 *
 * Logs every request once it has finished, with correlation IDs and the
 * authenticated user. Trace context is merged in by the component logger.
 */

import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { createLogger, type ComponentLogger } from '../lib/logger';
import { getUserId } from './request-context';

const CORRELATION_HEADER = 'x-correlation-id';

// ============================================
// REQUEST LOGGER MIDDLEWARE
// ============================================

export function createRequestLogger(logger: ComponentLogger = createLogger('http')) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = firstHeaderValue(req.headers[CORRELATION_HEADER]) || randomUUID();
    req.headers[CORRELATION_HEADER] = correlationId;
    res.setHeader('X-Correlation-ID', correlationId);

    const startTime = Date.now();
    // Captured now: routers rewrite req.url while stripping prefixes
    const path = req.path;

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      const level = getLogLevel(res.statusCode);

      logger[level](
        {
          event: 'request_completed',
          method: req.method,
          path,
          statusCode: res.statusCode,
          duration,
          clientIp: getClientIp(req),
          userAgent: req.headers['user-agent'],
          correlationId,
          userId: getUserId(res),
        },
        `← ${req.method} ${path} ${res.statusCode} (${duration}ms)`
      );
    });

    next();
  };
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

function getLogLevel(statusCode: number): 'info' | 'warn' | 'error' {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return 'info';
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Strip the IPv4-mapped IPv6 prefix Node reports for IPv4 peers
 */
export function normalizeAddress(address: string | undefined): string {
  if (!address) {
    return '';
  }
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

/**
 * Client address for logging: first X-Forwarded-For entry, then X-Real-IP,
 * then the transport address.
 */
export function getClientIp(req: Request): string {
  const forwardedFor = firstHeaderValue(req.headers['x-forwarded-for']);
  if (forwardedFor) {
    const first = forwardedFor.split(',')[0]?.trim();
    if (first) {
      return first;
    }
  }
  const realIp = firstHeaderValue(req.headers['x-real-ip'])?.trim();
  if (realIp) {
    return realIp;
  }
  return normalizeAddress(req.socket.remoteAddress);
}
