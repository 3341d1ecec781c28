/**
 * Global Error Handler Middleware
 *
 * Catches all errors, logs them appropriately, and formats consistent error responses.
 * Should be registered as the last middleware in the Express app.
 */

import type { Request, Response, NextFunction } from 'express';

import { AppError, NotFoundError, isOperationalError, wrapError } from '../lib/errors';
import { createLogger, logError, type ComponentLogger } from '../lib/logger';

const defaultLogger = createLogger('error-handler');

// ============================================
// ERROR HANDLER MIDDLEWARE
// ============================================

export function createErrorHandler(logger: ComponentLogger = defaultLogger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    // Express closes the connection itself once headers are out
    if (res.headersSent) {
      next(err);
      return;
    }

    const requestContext = {
      method: req.method,
      path: req.originalUrl,
      correlationId: req.headers['x-correlation-id'],
    };

    if (err instanceof AppError) {
      logAppError(logger, err, requestContext);
    } else {
      const failure = err instanceof Error ? err : new Error(String(err));
      logError(logger, failure, { ...requestContext, event: 'unhandled_error' });
    }

    const appError = wrapError(err);
    res.status(appError.statusCode).json(appError.toJSON());
  };
}

export const errorHandler = createErrorHandler();

/**
 * Operational 4xx are expected traffic; 5xx and programming errors are not
 */
function logAppError(logger: ComponentLogger, error: AppError, context: object): void {
  const logData = { ...error.toLogContext(), ...context };

  if (!isOperationalError(error)) {
    logError(logger, error, logData);
  } else if (error.statusCode < 500) {
    logger.warn(logData, error.message);
  } else {
    logger.error(logData, error.message);
  }
}

// ============================================
// NOT FOUND HANDLER
// ============================================

/**
 * 404 for paths no route claimed. Register before the error handler.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(req.method, req.path));
}

// ============================================
// PROCESS-LEVEL HANDLERS
// ============================================

export function handleUnhandledRejection(logger: ComponentLogger = defaultLogger): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal(
      {
        err:
          reason instanceof Error
            ? { message: reason.message, stack: reason.stack, name: reason.name }
            : { reason: String(reason) },
      },
      'Unhandled Promise Rejection'
    );
    process.exit(1);
  });
}

export function handleUncaughtException(logger: ComponentLogger = defaultLogger): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal(
      { err: { message: error.message, stack: error.stack, name: error.name } },
      'Uncaught Exception'
    );
    process.exit(1);
  });
}
