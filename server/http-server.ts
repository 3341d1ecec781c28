/**
 * HTTP server lifecycle: listen with configured timeouts, drain on shutdown.
 */

import { createServer, type Server, type RequestListener } from 'http';
import type { Socket } from 'net';
import type { ServerConfig } from './config';
import { createLogger, type ComponentLogger } from './lib/logger';

const defaultLogger = createLogger('server');

export type ListenOptions = Pick<
  ServerConfig,
  'host' | 'port' | 'readTimeoutMs' | 'writeTimeoutMs' | 'idleTimeoutMs'
>;

export function startServer(
  app: RequestListener,
  options: ListenOptions,
  logger: ComponentLogger = defaultLogger
): Promise<Server> {
  const server = createServer(app);
  server.requestTimeout = options.readTimeoutMs;
  server.headersTimeout = options.readTimeoutMs;
  server.keepAliveTimeout = options.idleTimeoutMs;

  // Sockets with a request in flight are left to the proxy deadline
  const busySockets = new WeakSet<Socket>();
  server.on('request', (req, res) => {
    busySockets.add(req.socket);
    res.once('close', () => busySockets.delete(req.socket));
  });
  server.setTimeout(options.writeTimeoutMs, (socket) => {
    if (!busySockets.has(socket)) {
      socket.destroy();
    }
  });

  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(options.port, options.host, () => {
      server.off('error', onError);
      logger.info(
        { event: 'server_listening', host: options.host, port: options.port },
        `Gateway listening on ${options.host}:${options.port}`
      );
      resolve(server);
    });
  });
}

/**
 * Stop accepting connections, let in-flight requests finish, and
 * force-close whatever is still open once the grace period ends.
 */
export function stopServer(
  server: Server,
  graceMs: number,
  logger: ComponentLogger = defaultLogger
): Promise<void> {
  return new Promise((resolve, reject) => {
    const forceTimer = setTimeout(() => {
      logger.warn({ event: 'shutdown_forced', graceMs }, 'Grace period elapsed, closing open connections');
      server.closeAllConnections();
    }, graceMs);

    server.close((error) => {
      clearTimeout(forceTimer);
      if (error) {
        reject(error);
        return;
      }
      logger.info({ event: 'server_stopped' }, 'Server stopped');
      resolve();
    });
    server.closeIdleConnections();
  });
}
