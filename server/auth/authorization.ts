/**
 * Role checks over validated token claims.
 * Roles compare exactly (case-sensitive) with set semantics.
 */

import type { Request, Response, NextFunction } from 'express';
import { AuthError } from '../lib/errors';
import { getRequestIdentity } from '../middleware/request-context';
import type { TokenClaims } from './claims';

const NO_CLAIMS = 'no claims provided';
const INSUFFICIENT = 'insufficient permissions';

export function hasRole(claims: TokenClaims, role: string): boolean {
  return claims.roles.includes(role);
}

export function hasAnyRole(claims: TokenClaims, roles: readonly string[]): boolean {
  if (roles.length === 0) {
    return true;
  }
  const held = new Set(claims.roles);
  return roles.some((role) => held.has(role));
}

export function hasAllRoles(claims: TokenClaims, roles: readonly string[]): boolean {
  const held = new Set(claims.roles);
  return roles.every((role) => held.has(role));
}

/**
 * @throws AuthError (403) when claims are absent or the role is not held
 */
export function requireRole(claims: TokenClaims | undefined, role: string): void {
  if (!claims) {
    throw AuthError.forbidden(NO_CLAIMS);
  }
  if (!hasRole(claims, role)) {
    throw AuthError.forbidden(INSUFFICIENT);
  }
}

/**
 * @throws AuthError (403) when claims are absent or none of the roles is held
 */
export function requireAnyRole(claims: TokenClaims | undefined, roles: readonly string[]): void {
  if (!claims) {
    throw AuthError.forbidden(NO_CLAIMS);
  }
  if (!hasAnyRole(claims, roles)) {
    throw AuthError.forbidden(INSUFFICIENT);
  }
}

/**
 * @throws AuthError (403) when claims are absent or any role is missing
 */
export function requireAllRoles(claims: TokenClaims | undefined, roles: readonly string[]): void {
  if (!claims) {
    throw AuthError.forbidden(NO_CLAIMS);
  }
  if (!hasAllRoles(claims, roles)) {
    throw AuthError.forbidden(INSUFFICIENT);
  }
}

export type RoleRequirement =
  | { role: string }
  | { anyOf: readonly string[] }
  | { allOf: readonly string[] };

/**
 * Express middleware applying a role requirement to the authenticated
 * request. Must run after the authentication middleware.
 */
export function requireRoles(requirement: RoleRequirement) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    const claims = getRequestIdentity(res)?.claims;
    try {
      if ('role' in requirement) {
        requireRole(claims, requirement.role);
      } else if ('anyOf' in requirement) {
        requireAnyRole(claims, requirement.anyOf);
      } else {
        requireAllRoles(claims, requirement.allOf);
      }
    } catch (error) {
      next(error);
      return;
    }
    next();
  };
}
