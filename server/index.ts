/**
 * Gateway entry point
 *
 * Loads configuration, builds the proxy registry and the request pipeline,
 * then serves until SIGINT/SIGTERM.
 */

import { loadConfig, type Config } from './config';
import { ConfigError, RegistryError } from './lib/errors';
import { createLogger, flushLogs } from './lib/logger';
import { handleUncaughtException, handleUnhandledRejection } from './middleware/error-handler';
import { ProxyRegistry } from './proxy/registry';
import { createGateway } from './gateway';
import { startServer, stopServer } from './http-server';

const logger = createLogger('main');

function exitWith(message: string, issues: object): never {
  logger.fatal(issues, message);
  flushLogs();
  process.exit(1);
}

async function main(): Promise<void> {
  handleUnhandledRejection();
  handleUncaughtException();

  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      exitWith('Invalid configuration', { issues: error.issues });
    }
    throw error;
  }

  let registry: ProxyRegistry;
  try {
    registry = ProxyRegistry.build(config.proxy.targets, { timeoutMs: config.proxy.timeoutMs });
  } catch (error) {
    if (error instanceof RegistryError) {
      exitWith('Failed to build proxy registry', { reason: error.message });
    }
    throw error;
  }

  logger.info(
    { env: config.env, services: registry.names(), timeoutMs: config.proxy.timeoutMs },
    'Starting gateway'
  );

  const app = createGateway({ config, registry });
  const server = await startServer(app, config.server);

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal, graceMs: config.server.shutdownGraceMs }, 'Shutting down');
    stopServer(server, config.server.shutdownGraceMs)
      .then(() => {
        flushLogs();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ err: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
        flushLogs();
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error instanceof Error ? error.message : String(error) }, 'Gateway failed to start');
  flushLogs();
  process.exit(1);
});
