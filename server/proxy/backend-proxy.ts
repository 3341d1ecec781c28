/**
 * Per-Backend Proxy
 *
 * Forwards requests to one fixed upstream origin. Owns the header trust
 * boundary (client-supplied forwarding headers are replaced with values
 * the gateway observed) and the per-request deadline.
 */

import { ServerResponse, type ClientRequest } from 'http';
import { TLSSocket } from 'tls';
import type { Request, Response } from 'express';
import { createProxyMiddleware, type Plugin, type RequestHandler } from 'http-proxy-middleware';
import { BadGatewayError, GatewayTimeoutError, writeErrorResponse } from '../lib/errors';
import { createLogger, type ComponentLogger } from '../lib/logger';
import { getUserId } from '../middleware/request-context';
import { normalizeAddress } from '../middleware/request-logger';

export const DEFAULT_PROXY_TIMEOUT_MS = 30_000;

/** Headers only the gateway may set; inbound values are always dropped */
export const TRUSTED_HEADERS = [
  'x-real-ip',
  'x-forwarded-for',
  'x-forwarded-proto',
  'x-forwarded-host',
  'x-user-id',
] as const;

export interface BackendProxyOptions {
  name: string;
  target: URL;
  timeoutMs?: number;
  logger?: ComponentLogger;
}

export class BackendProxy {
  readonly name: string;
  readonly target: URL;
  readonly timeoutMs: number;
  /** Express handler forwarding `req.url` (mount prefix already stripped) */
  readonly handle: RequestHandler<Request, Response>;

  private readonly logger: ComponentLogger;

  constructor(options: BackendProxyOptions) {
    this.name = options.name;
    this.target = options.target;
    this.timeoutMs =
      options.timeoutMs !== undefined && options.timeoutMs > 0
        ? options.timeoutMs
        : DEFAULT_PROXY_TIMEOUT_MS;
    this.logger = (options.logger ?? createLogger('proxy')).child({
      upstream: this.name,
      target: this.target.origin,
    });

    this.handle = createProxyMiddleware<Request, Response>({
      target: this.target.href,
      changeOrigin: true,
      xfwd: false,
      // The default error-response plugin would answer a second time
      ejectPlugins: true,
      plugins: [this.gatewayPlugin()],
    });
  }

  private gatewayPlugin(): Plugin<Request, Response> {
    return (proxyServer) => {
      proxyServer.on('proxyReq', (proxyReq, req, res) => {
        this.rewriteTrustedHeaders(proxyReq, req, res);
        this.startDeadline(proxyReq);
      });

      proxyServer.on('proxyRes', (proxyRes, req, res) => {
        this.logger.info(
          {
            event: 'proxy_response',
            method: req.method,
            path: req.originalUrl,
            upstreamPath: req.url,
            statusCode: proxyRes.statusCode,
          },
          `Proxied ${req.method} ${req.originalUrl} -> ${proxyRes.statusCode}`
        );
        // Client went away mid-body: stop reading from upstream
        res.on('close', () => {
          if (!res.writableEnded) {
            proxyRes.destroy();
          }
        });
      });

      proxyServer.on('error', (err, req, res) => {
        const failure =
          err instanceof GatewayTimeoutError
            ? err
            : new BadGatewayError(this.name, this.target.origin, err);

        this.logger.error(
          {
            event: 'proxy_error',
            method: req.method,
            path: req.originalUrl,
            upstreamPath: req.url,
            statusCode: failure.statusCode,
            err: { name: err.name, message: err.message },
          },
          `Proxy ${failure.message}: ${req.method} ${req.originalUrl}`
        );

        if (res instanceof ServerResponse) {
          writeErrorResponse(res, failure);
        } else {
          res.destroy();
        }
      });
    };
  }

  /**
   * Replace client-supplied forwarding headers with what the gateway saw
   */
  private rewriteTrustedHeaders(proxyReq: ClientRequest, req: Request, res: Response): void {
    for (const header of TRUSTED_HEADERS) {
      proxyReq.removeHeader(header);
    }

    const clientIp = normalizeAddress(req.socket.remoteAddress);
    if (clientIp) {
      proxyReq.setHeader('X-Real-IP', clientIp);
      proxyReq.setHeader('X-Forwarded-For', clientIp);
    }
    proxyReq.setHeader('X-Forwarded-Proto', req.socket instanceof TLSSocket ? 'https' : 'http');
    if (req.headers.host) {
      proxyReq.setHeader('X-Forwarded-Host', req.headers.host);
    }

    const userId = getUserId(res);
    if (userId) {
      proxyReq.setHeader('X-User-Id', userId);
    }
  }

  /**
   * Abort the upstream request if no response headers arrive in time.
   * The destroy error surfaces through the proxy's error event.
   */
  private startDeadline(proxyReq: ClientRequest): void {
    const timer = setTimeout(() => {
      proxyReq.destroy(new GatewayTimeoutError(this.name, this.target.origin, this.timeoutMs));
    }, this.timeoutMs);

    const clear = () => clearTimeout(timer);
    proxyReq.once('response', clear);
    proxyReq.once('close', clear);
  }
}
