/**
 * Token Claims
 *
 * In-memory shape of a bearer token payload and the zod schema that
 * turns a verified JWT payload into it. Wire names follow the registered
 * JWT claims (sub, iss, aud, exp, iat, nbf, jti).
 */

import { z } from 'zod';

// ============================================
// METADATA
// ============================================

/**
 * Open key-value data carried in the `metadata` claim.
 * JSON's own type is the variant tag: string, number, boolean or nested map.
 */
export type MetadataValue = string | number | boolean | MetadataMap;
export interface MetadataMap {
  [key: string]: MetadataValue;
}

const metadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([z.string(), z.number().finite(), z.boolean(), z.record(metadataValueSchema)])
);

export const metadataSchema: z.ZodType<MetadataMap> = z.record(metadataValueSchema);

// ============================================
// CLAIMS
// ============================================

export interface TokenClaims {
  /** Authenticated user identifier; serialized as `sub` */
  userId: string;
  username?: string;
  email?: string;
  roles: string[];
  metadata: MetadataMap;
  issuer: string;
  audience: string[];
  /** Absent when the token never expires */
  expiresAt?: Date;
  issuedAt?: Date;
  notBefore?: Date;
  /** Always equal to userId once decoded: both live in `sub` */
  subject: string;
  jwtId?: string;
}

/**
 * Claims accepted by TokenManager.issueWithClaims; unset registered
 * claims are filled from the manager's defaults.
 */
export interface ClaimsInput {
  userId: string;
  username?: string;
  email?: string;
  roles?: string[];
  metadata?: MetadataMap;
  issuer?: string;
  audience?: string[];
  expiresAt?: Date;
  issuedAt?: Date;
  notBefore?: Date;
  subject?: string;
  jwtId?: string;
}

export interface JwtPayloadShape {
  sub: string;
  username?: string;
  email?: string;
  roles?: string[];
  metadata?: MetadataMap;
  iss: string;
  aud: string[];
  exp?: number;
  iat?: number;
  nbf?: number;
  jti?: string;
}

const numericDate = z.number().finite();

export const jwtPayloadSchema = z.object({
  sub: z.string().min(1, 'sub claim is required'),
  username: z.string().optional(),
  email: z.string().optional(),
  roles: z.array(z.string()).optional(),
  metadata: metadataSchema.optional(),
  iss: z.string().optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  exp: numericDate.optional(),
  iat: numericDate.optional(),
  nbf: numericDate.optional(),
  jti: z.string().optional(),
});

function toNumericDate(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function fromNumericDate(seconds: number): Date {
  return new Date(seconds * 1000);
}

/**
 * Decode a verified payload. Returns the zod error message on a shape mismatch.
 */
export function decodeClaims(payload: unknown): { claims: TokenClaims } | { error: string } {
  const parsed = jwtPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { error: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') };
  }

  const data = parsed.data;
  const audience = data.aud === undefined ? [] : Array.isArray(data.aud) ? data.aud : [data.aud];

  return {
    claims: {
      userId: data.sub,
      username: data.username,
      email: data.email,
      roles: [...new Set(data.roles ?? [])],
      metadata: data.metadata ?? {},
      issuer: data.iss ?? '',
      audience,
      expiresAt: data.exp === undefined ? undefined : fromNumericDate(data.exp),
      issuedAt: data.iat === undefined ? undefined : fromNumericDate(data.iat),
      notBefore: data.nbf === undefined ? undefined : fromNumericDate(data.nbf),
      subject: data.sub,
      jwtId: data.jti,
    },
  };
}

/**
 * Encode claims for signing. Optional fields are omitted when empty.
 */
export function encodeClaims(claims: TokenClaims): JwtPayloadShape {
  const payload: JwtPayloadShape = {
    sub: claims.userId,
    iss: claims.issuer,
    aud: claims.audience,
  };
  if (claims.expiresAt) payload.exp = toNumericDate(claims.expiresAt);
  if (claims.issuedAt) payload.iat = toNumericDate(claims.issuedAt);
  if (claims.notBefore) payload.nbf = toNumericDate(claims.notBefore);
  if (claims.username) payload.username = claims.username;
  if (claims.email) payload.email = claims.email;
  if (claims.roles.length > 0) payload.roles = [...claims.roles];
  if (Object.keys(claims.metadata).length > 0) payload.metadata = claims.metadata;
  if (claims.jwtId) payload.jti = claims.jwtId;
  return payload;
}
