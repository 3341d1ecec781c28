/**
 * Request-scoped identity
 *
 * The authenticated caller is attached to `res.locals` by the auth
 * middleware and read back by the proxy and the request logger.
 */

import type { Response } from 'express';
import type { TokenClaims } from '../auth/claims';

export interface RequestIdentity {
  userId: string;
  claims: TokenClaims;
}

function isRequestIdentity(value: unknown): value is RequestIdentity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    typeof value.userId === 'string' &&
    'claims' in value &&
    typeof value.claims === 'object' &&
    value.claims !== null
  );
}

export function setRequestIdentity(res: Response, claims: TokenClaims): void {
  const identity: RequestIdentity = { userId: claims.userId, claims };
  res.locals.identity = identity;
}

export function getRequestIdentity(res: Response): RequestIdentity | undefined {
  const identity: unknown = res.locals.identity;
  return isRequestIdentity(identity) ? identity : undefined;
}

export function getUserId(res: Response): string | undefined {
  return getRequestIdentity(res)?.userId;
}
