/**
 * Structured Logging Service
 *
 * Provides structured JSON logging with OpenTelemetry trace context integration.
 * Uses Pino, with pino-pretty console output for development.
 */

import pino, { type Logger } from 'pino';
import { trace, type Span } from '@opentelemetry/api';
import { loadLoggingConfig } from '../config';

// ============================================
// LOGGER CONFIGURATION
// ============================================

const loggingConfig = loadLoggingConfig();

/**
 * Pretty output goes through the pino-pretty transport; otherwise
 * records are written to stdout as JSON with no worker thread involved.
 */
function buildTransportConfig(): pino.TransportSingleOptions | undefined {
  if (!loggingConfig.pretty) {
    return undefined;
  }
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
      messageFormat: '[{component}] {msg}',
    },
  };
}

const transportConfig = buildTransportConfig();

const pinoConfig: pino.LoggerOptions = {
  level: loggingConfig.level,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { service: loggingConfig.componentName },
  transport: transportConfig,

  // Pino rejects custom level formatters when a transport is configured
  ...(transportConfig ? {} : {
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
  }),
};

const baseLogger = pino(pinoConfig);

// ============================================
// TRACE CONTEXT HELPER
// ============================================

/**
 * Extract OpenTelemetry trace context from active span
 */
function getTraceContext(): { traceId?: string; spanId?: string } {
  const span: Span | undefined = trace.getActiveSpan();
  const spanContext = span?.spanContext();

  if (spanContext && spanContext.traceId && spanContext.spanId) {
    return {
      traceId: spanContext.traceId,
      spanId: spanContext.spanId,
    };
  }

  return {};
}

// ============================================
// LOGGER FACTORY
// ============================================

export interface ComponentLogger {
  trace(obj: object, msg?: string): void;
  trace(msg: string): void;
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;
  fatal(obj: object, msg?: string): void;
  fatal(msg: string): void;
  child: (bindings: object) => ComponentLogger;
}

type LogMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Create a logger for a specific component with automatic trace context
 *
 * @param component - Component name (e.g., 'http', 'proxy', 'auth')
 * @param defaultBindings - Additional default bindings to include in all logs
 *
 * @example
 * const logger = createLogger('proxy', { upstream: 'crm' });
 * logger.info({ status: 200 }, 'Proxied request');
 */
export function createLogger(
  component: string,
  defaultBindings: object = {}
): ComponentLogger {
  const componentLogger: Logger = baseLogger.child({
    component,
    ...defaultBindings,
  });

  // Wrapper that automatically injects trace context
  const wrapLogMethod = (method: LogMethod) => {
    return (objOrMsg: object | string, msg?: string): void => {
      const traceContext = getTraceContext();

      if (typeof objOrMsg === 'string') {
        componentLogger[method](traceContext, objOrMsg);
        return;
      }
      componentLogger[method]({ ...objOrMsg, ...traceContext }, msg);
    };
  };

  return {
    trace: wrapLogMethod('trace'),
    debug: wrapLogMethod('debug'),
    info: wrapLogMethod('info'),
    warn: wrapLogMethod('warn'),
    error: wrapLogMethod('error'),
    fatal: wrapLogMethod('fatal'),
    child: (bindings: object) => createLogger(component, { ...defaultBindings, ...bindings }),
  };
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/**
 * Log an error with full stack trace and context
 */
export function logError(
  logger: ComponentLogger,
  error: Error,
  context?: object
): void {
  logger.error({
    err: {
      message: error.message,
      name: error.name,
      stack: error.stack,
    },
    ...context,
  }, error.message);
}

/**
 * Flush buffered records before the process exits
 */
export function flushLogs(): void {
  baseLogger.flush();
}
