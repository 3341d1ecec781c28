/**
 * Custom Error Classes
 *
 * Standardized error handling with proper status codes and serialization.
 * All gateway errors should extend AppError.
 */

import type { ServerResponse } from 'http';

// ============================================
// BASE ERROR CLASS
// ============================================

export interface ErrorBody {
  error: string;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: unknown,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });

    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for API response.
   * Only the message leaves the process; code, details and cause stay in logs.
   */
  toJSON(): ErrorBody {
    return { error: this.message };
  }

  /**
   * Fields worth logging alongside the message
   */
  toLogContext(): Record<string, unknown> {
    const context: Record<string, unknown> = {
      code: this.code,
      statusCode: this.statusCode,
    };
    if (this.details !== undefined) {
      context.details = this.details;
    }
    if (this.cause instanceof Error) {
      context.cause = this.cause.message;
    }
    return context;
  }
}

// ============================================
// CLIENT ERROR CLASSES (4xx)
// ============================================

/**
 * 400 Bad Request - Invalid input
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', true, details);
  }
}

export type AuthStatus = 401 | 403;

/**
 * 401/403 - Authentication or authorization failure.
 * The wrapped cause is for logs only and is never serialized.
 */
export class AuthError extends AppError {
  constructor(statusCode: AuthStatus, message: string, cause?: unknown) {
    super(
      message,
      statusCode,
      statusCode === 403 ? 'FORBIDDEN' : 'UNAUTHORIZED',
      true,
      undefined,
      cause
    );
  }

  static unauthorized(message: string, cause?: unknown): AuthError {
    return new AuthError(401, message, cause);
  }

  static forbidden(message: string): AuthError {
    return new AuthError(403, message);
  }
}

/**
 * 404 Not Found - No route matched
 */
export class NotFoundError extends AppError {
  constructor(method: string, path: string) {
    super(`route ${method} ${path} not found`, 404, 'ROUTE_NOT_FOUND', true, { method, path });
  }
}

// ============================================
// SERVER ERROR CLASSES (5xx)
// ============================================

/**
 * 500 Internal Server Error - Generic server error
 */
export class InternalServerError extends AppError {
  constructor(message: string = 'internal server error', details?: unknown, cause?: unknown) {
    super(message, 500, 'INTERNAL_SERVER_ERROR', false, details, cause);
  }
}

/**
 * 502 Bad Gateway - Upstream could not be reached or reset the connection
 */
export class BadGatewayError extends AppError {
  constructor(service: string, target: string, cause?: unknown) {
    super('bad gateway', 502, 'BAD_GATEWAY', true, { service, target }, cause);
  }
}

/**
 * 504 Gateway Timeout - Upstream did not answer within the deadline
 */
export class GatewayTimeoutError extends AppError {
  constructor(service: string, target: string, timeoutMs: number) {
    super('gateway timeout', 504, 'GATEWAY_TIMEOUT', true, { service, target, timeoutMs });
  }
}

// ============================================
// DOMAIN-SPECIFIC ERROR CLASSES
// ============================================

export type TokenErrorKind = 'invalid' | 'expired' | 'signing-method' | 'claims';

const TOKEN_ERROR_CODES: Record<TokenErrorKind, string> = {
  invalid: 'TOKEN_INVALID',
  expired: 'TOKEN_EXPIRED',
  'signing-method': 'TOKEN_SIGNING_METHOD',
  claims: 'TOKEN_CLAIMS',
};

/**
 * Bearer token rejected by the token manager
 */
export class TokenError extends AppError {
  public readonly kind: TokenErrorKind;

  constructor(kind: TokenErrorKind, message: string, cause?: unknown) {
    super(message, 401, TOKEN_ERROR_CODES[kind], true, { kind }, cause);
    this.kind = kind;
  }
}

// ============================================
// STARTUP ERROR CLASSES
// ============================================

/**
 * Invalid or incomplete environment configuration
 */
export class ConfigError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`configuration validation failed: ${issues.join('; ')}`, 500, 'CONFIG_ERROR', false, { issues });
    this.issues = issues;
  }
}

/**
 * Proxy registry could not be built from the configured targets
 */
export class RegistryError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'REGISTRY_ERROR', false, undefined, cause);
  }
}

// ============================================
// ERROR UTILITIES
// ============================================

/**
 * Check if an error is operational (expected) vs programming error
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Wrap an unknown error into an AppError
 */
export function wrapError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalServerError('internal server error', { originalError: error.name }, error);
  }

  return new InternalServerError('internal server error', { originalError: String(error) });
}

/**
 * Write an error as a JSON response on a bare Node response.
 * Used where no Express error chain is available (proxy callbacks).
 */
export function writeErrorResponse(res: ServerResponse, error: AppError): void {
  if (res.headersSent) {
    res.end();
    return;
  }
  const body = JSON.stringify(error.toJSON());
  res.writeHead(error.statusCode, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}
