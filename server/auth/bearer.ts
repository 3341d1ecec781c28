/**
 * Bearer token extraction from the Authorization header
 */

import { AuthError } from '../lib/errors';

export const BEARER_MESSAGES = {
  missing: 'missing authorization header',
  format: 'invalid authorization header format',
  scheme: 'invalid authorization scheme (expected Bearer)',
  empty: 'empty bearer token',
} as const;

/**
 * Pull the token out of `Authorization: Bearer <token>`.
 * The scheme is matched case-insensitively.
 *
 * @throws AuthError (401) with a message naming the failure reason
 */
export function extractBearerToken(authHeader: string | undefined): string {
  if (!authHeader) {
    throw AuthError.unauthorized(BEARER_MESSAGES.missing);
  }

  const separator = authHeader.indexOf(' ');
  if (separator === -1) {
    throw AuthError.unauthorized(BEARER_MESSAGES.format);
  }

  const scheme = authHeader.slice(0, separator).toLowerCase();
  if (scheme !== 'bearer') {
    throw AuthError.unauthorized(BEARER_MESSAGES.scheme);
  }

  const token = authHeader.slice(separator + 1).trim();
  if (token === '') {
    throw AuthError.unauthorized(BEARER_MESSAGES.empty);
  }

  return token;
}
