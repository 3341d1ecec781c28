#!/usr/bin/env tsx
/**
 * Run the mock backend standalone for local gateway testing.
 *
 * Usage:
 *   SERVICE_NAME=crm PORT=9001 npm run mock-backend
 */

import { createLogger } from '../server/lib/logger';
import { startMockBackend } from '../tests/support/mock-backend';

const logger = createLogger('mock-backend');

const serviceName = process.env.SERVICE_NAME || 'mock-backend';
const port = Number.parseInt(process.env.PORT || '9000', 10);

startMockBackend(serviceName, port, '0.0.0.0')
  .then(({ url }) => {
    logger.info({ service: serviceName, url }, `Mock backend '${serviceName}' listening`);
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error instanceof Error ? error.message : String(error) }, 'Failed to start mock backend');
    process.exit(1);
  });
