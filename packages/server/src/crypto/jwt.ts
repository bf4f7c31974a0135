import * as jose from 'jose';
import { z } from 'zod';
import type { AccessTokenPayload } from '../types/token.js';
import { SIGNING_ALGORITHM, ACCESS_TOKEN_TYPE_HEADER } from '../config/constants.js';
import type { KeyRing, SigningKey } from './keys.js';

/**
 * JWT signing and verification utilities using jose library
 */

export const accessTokenClaimsSchema = z.object({
  iss: z.string(),
  sub: z.string().min(1),
  aud: z.union([z.string(), z.array(z.string())]),
  exp: z.number(),
  iat: z.number(),
  nbf: z.number().optional(),
  jti: z.string().min(1),
  email: z.string(),
  name: z.string(),
  given_name: z.string(),
  family_name: z.string(),
  tenant_id: z.string().min(1),
  branch_id: z.string().optional(),
  roles: z.array(z.string()),
  permissions: z.array(z.string()),
  token_type: z.literal('access_token'),
});

export type TokenValidationResult =
  | { valid: true; claims: AccessTokenPayload }
  | { valid: false; error: 'invalid_token'; reason: string };

export interface VerifyOptions {
  issuer: string;
  audience: string;
  clockToleranceSeconds: number;
  currentDate: Date;
}

class UnknownKeyError extends Error {
  constructor(kid: string | undefined) {
    super(kid ? `unknown signing key "${kid}"` : 'token header has no kid');
    this.name = 'UnknownKeyError';
  }
}

function keyResolver(keyRing: KeyRing) {
  return (header: jose.JWSHeaderParameters) => {
    const key = keyRing.find(header.kid);
    if (!key) {
      throw new UnknownKeyError(header.kid);
    }
    return key.publicKey;
  };
}

function describeFailure(error: unknown): string {
  if (error instanceof jose.errors.JWTExpired) {
    return 'token expired';
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    return `claim "${error.claim}" ${error.reason}`;
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return 'signature verification failed';
  }
  if (error instanceof jose.errors.JOSEError || error instanceof UnknownKeyError) {
    return error.message;
  }
  if (error instanceof z.ZodError) {
    return 'token claims are malformed';
  }
  return 'token is malformed';
}

function failure(reason: string): TokenValidationResult {
  return { valid: false, error: 'invalid_token', reason };
}

function audienceMatches(aud: string | string[], expected: string): boolean {
  return Array.isArray(aud) ? aud.includes(expected) : aud === expected;
}

/**
 * Sign a JWT access token with the current key
 */
export async function signAccessToken(
  payload: AccessTokenPayload,
  signingKey: SigningKey
): Promise<string> {
  return new jose.SignJWT({ ...payload })
    .setProtectedHeader({
      alg: SIGNING_ALGORITHM,
      kid: signingKey.kid,
      typ: ACCESS_TOKEN_TYPE_HEADER,
    })
    .sign(signingKey.privateKey);
}

/**
 * Verify signature, issuer, audience, type and lifetime of an access token
 */
export async function verifyAccessToken(
  token: string,
  keyRing: KeyRing,
  options: VerifyOptions
): Promise<TokenValidationResult> {
  try {
    const { payload } = await jose.jwtVerify(token, keyResolver(keyRing), {
      algorithms: [SIGNING_ALGORITHM],
      issuer: options.issuer,
      audience: options.audience,
      typ: ACCESS_TOKEN_TYPE_HEADER,
      clockTolerance: options.clockToleranceSeconds,
      currentDate: options.currentDate,
    });

    return { valid: true, claims: accessTokenClaimsSchema.parse(payload) };
  } catch (error) {
    return failure(describeFailure(error));
  }
}

/**
 * Verify signature, issuer, audience and type but not lifetime. Used by the
 * refresh exchange, which is expected to present an expired access token.
 */
export async function verifyIgnoringExpiry(
  token: string,
  keyRing: KeyRing,
  options: Omit<VerifyOptions, 'clockToleranceSeconds' | 'currentDate'>
): Promise<TokenValidationResult> {
  try {
    const { payload, protectedHeader } = await jose.compactVerify(token, keyResolver(keyRing), {
      algorithms: [SIGNING_ALGORITHM],
    });

    if (protectedHeader.typ !== ACCESS_TOKEN_TYPE_HEADER) {
      return failure('unexpected token type');
    }

    const parsed: unknown = JSON.parse(new TextDecoder().decode(payload));
    const claims = accessTokenClaimsSchema.parse(parsed);

    if (claims.iss !== options.issuer) {
      return failure('claim "iss" check failed');
    }
    if (!audienceMatches(claims.aud, options.audience)) {
      return failure('claim "aud" check failed');
    }

    return { valid: true, claims };
  } catch (error) {
    return failure(describeFailure(error));
  }
}

/**
 * Decode a JWT's jti without verification. Only for blacklist lookups,
 * where a forged jti can at worst match nothing.
 */
export function decodeJti(token: string): string | null {
  try {
    const { jti } = jose.decodeJwt(token);
    return typeof jti === 'string' && jti.length > 0 ? jti : null;
  } catch {
    return null;
  }
}

/**
 * Decode a JWT's exp (seconds) without verification
 */
export function decodeExpiry(token: string): Date | null {
  try {
    const { exp } = jose.decodeJwt(token);
    return typeof exp === 'number' ? new Date(exp * 1000) : null;
  } catch {
    return null;
  }
}

/**
 * Whether a string has the shape of a compact JWS
 */
export function isCompactJwt(value: string): boolean {
  return value.split('.').length === 3;
}
