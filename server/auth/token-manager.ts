/**
 * Token Manager
 *
 * Issues and validates HMAC-signed bearer tokens (JWT). Validation checks,
 * in order: algorithm family, signature, expiry, issuer, audience.
 */

import jwt, { type Algorithm } from 'jsonwebtoken';
import { ConfigError, TokenError, AuthError, ValidationError } from '../lib/errors';
import {
  decodeClaims,
  encodeClaims,
  type ClaimsInput,
  type MetadataMap,
  type TokenClaims,
} from './claims';
import { extractBearerToken } from './bearer';

export const DEFAULT_ISSUER = 'api-gateway';
export const DEFAULT_AUDIENCE = 'api-gateway';
export const DEFAULT_EXPIRATION_MS = 24 * 60 * 60 * 1000;

const HMAC_ALGORITHMS: Algorithm[] = ['HS256', 'HS384', 'HS512'];
const SIGNING_ALGORITHM: Algorithm = 'HS256';

export interface TokenManagerOptions {
  secret: string;
  issuer?: string;
  audience?: string;
  /** Token lifetime; unset or non-positive means 24h */
  expirationMs?: number;
  /** Current time in milliseconds */
  clock?: () => number;
}

export class TokenManager {
  private readonly secret: string;
  private readonly clock: () => number;
  readonly issuer: string;
  readonly audience: string;
  readonly expirationMs: number;

  /**
   * @throws ConfigError when the signing secret is empty
   */
  constructor(options: TokenManagerOptions) {
    if (!options.secret) {
      throw new ConfigError(['secret cannot be empty']);
    }
    this.secret = options.secret;
    this.issuer = options.issuer || DEFAULT_ISSUER;
    this.audience = options.audience || DEFAULT_AUDIENCE;
    this.expirationMs =
      options.expirationMs !== undefined && options.expirationMs > 0
        ? options.expirationMs
        : DEFAULT_EXPIRATION_MS;
    this.clock = options.clock ?? Date.now;
  }

  // ============================================
  // ISSUING
  // ============================================

  /**
   * Issue a token for a user with the manager's issuer, audience and lifetime
   */
  issue(userId: string, metadata: MetadataMap = {}): string {
    if (!userId) {
      throw new ValidationError('user id cannot be empty');
    }
    const now = new Date(this.clock());
    return this.sign({
      userId,
      roles: [],
      metadata,
      issuer: this.issuer,
      audience: [this.audience],
      subject: userId,
      expiresAt: new Date(now.getTime() + this.expirationMs),
      issuedAt: now,
      notBefore: now,
    });
  }

  /**
   * Issue a token from caller-supplied claims. Unset issuer, audience,
   * subject and validity window fields are filled from defaults.
   */
  issueWithClaims(input: ClaimsInput): string {
    if (!input.userId) {
      throw new ValidationError('user id cannot be empty');
    }
    const now = new Date(this.clock());
    return this.sign({
      userId: input.userId,
      username: input.username,
      email: input.email,
      roles: input.roles ?? [],
      metadata: input.metadata ?? {},
      issuer: input.issuer || this.issuer,
      audience: input.audience && input.audience.length > 0 ? input.audience : [this.audience],
      subject: input.subject || input.userId,
      expiresAt: input.expiresAt ?? new Date(now.getTime() + this.expirationMs),
      issuedAt: input.issuedAt ?? now,
      notBefore: input.notBefore ?? now,
      jwtId: input.jwtId,
    });
  }

  // ============================================
  // VALIDATION
  // ============================================

  /**
   * Validate a token and return its claims
   * @throws TokenError whose kind names the failed check
   */
  validate(token: string): TokenClaims {
    const claims = this.verify(token, false);
    this.checkIssuerAndAudience(claims);
    return claims;
  }

  /**
   * Validate the Authorization header of a request
   * @throws AuthError (401) with a client-safe message; the TokenError is its cause
   */
  validateRequest(authHeader: string | undefined): TokenClaims {
    const token = extractBearerToken(authHeader);
    try {
      return this.validate(token);
    } catch (error) {
      if (error instanceof TokenError) {
        throw AuthError.unauthorized(messageFor(error), error);
      }
      throw error;
    }
  }

  /**
   * Re-issue a token with the same claims and a fresh validity window.
   * Expired tokens are accepted; every other failure is not.
   */
  refresh(token: string): string {
    let claims: TokenClaims;
    try {
      claims = this.validate(token);
    } catch (error) {
      if (!(error instanceof TokenError) || error.kind !== 'expired') {
        throw error;
      }
      claims = this.verify(token, true);
      this.checkIssuerAndAudience(claims);
    }

    const now = new Date(this.clock());
    return this.sign({
      ...claims,
      expiresAt: new Date(now.getTime() + this.expirationMs),
      issuedAt: now,
      notBefore: now,
    });
  }

  /**
   * Best-effort user id for audit logging: the signature is checked but
   * expiry, issuer and audience are not. Never use the result to authorize.
   */
  extractUserId(token: string): string {
    if (!token) {
      return '';
    }
    try {
      const payload = jwt.verify(token, this.secret, {
        algorithms: HMAC_ALGORITHMS,
        ignoreExpiration: true,
        ignoreNotBefore: true,
      });
      const decoded = decodeClaims(payload);
      return 'claims' in decoded ? decoded.claims.userId : '';
    } catch {
      return '';
    }
  }

  // ============================================
  // INTERNALS
  // ============================================

  private sign(claims: TokenClaims): string {
    return jwt.sign(encodeClaims(claims), this.secret, { algorithm: SIGNING_ALGORITHM });
  }

  private verify(token: string, allowExpired: boolean): TokenClaims {
    if (!token) {
      throw new TokenError('invalid', 'invalid token');
    }

    const decoded = jwt.decode(token, { complete: true });
    if (!decoded) {
      throw new TokenError('invalid', 'invalid token: malformed');
    }
    const algorithm = decoded.header.alg;
    if (!isHmacAlgorithm(algorithm)) {
      throw new TokenError('signing-method', `invalid signing method: ${algorithm}`);
    }

    let payload: unknown;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: HMAC_ALGORITHMS,
        ignoreExpiration: allowExpired,
        clockTimestamp: Math.floor(this.clock() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenError('expired', 'token has expired', error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TokenError('invalid', `invalid token: ${reason}`, error);
    }

    const result = decodeClaims(payload);
    if ('error' in result) {
      throw new TokenError('claims', `invalid token claims: ${result.error}`);
    }
    return result.claims;
  }

  private checkIssuerAndAudience(claims: TokenClaims): void {
    if (claims.issuer !== this.issuer) {
      throw new TokenError('claims', 'invalid token claims: invalid issuer');
    }
    if (!claims.audience.includes(this.audience)) {
      throw new TokenError('claims', 'invalid token claims: invalid audience');
    }
  }
}

function isHmacAlgorithm(algorithm: string): boolean {
  return HMAC_ALGORITHMS.some((candidate) => candidate === algorithm);
}

function messageFor(error: TokenError): string {
  switch (error.kind) {
    case 'expired':
      return 'token has expired';
    case 'signing-method':
      return 'invalid token signing method';
    case 'claims':
      return 'invalid token claims';
    default:
      return 'invalid or expired token';
  }
}
