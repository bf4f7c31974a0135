import type { User } from '../types/user.js';
import type { AccessTokenPayload } from '../types/token.js';
import type { KeyRing } from '../crypto/keys.js';
import {
  signAccessToken,
  verifyAccessToken,
  verifyIgnoringExpiry,
  type TokenValidationResult,
} from '../crypto/jwt.js';
import { generateJti, generateRefreshToken } from '../crypto/random.js';

export interface TokenSignerOptions {
  keyRing: KeyRing;
  issuer: string;
  audience: string;
  accessTokenTtlMinutes: number;
  clockToleranceSeconds: number;
  now?: () => Date;
}

export interface IssueAccessTokenInput {
  user: User;
  roles: string[];
  permissions: string[];
  tenantId: string;
  branchId?: string;
}

export interface IssuedAccessToken {
  token: string;
  jti: string;
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * Issues and verifies access tokens with the key ring's current RS256 key
 */
export class TokenSigner {
  private readonly keyRing: KeyRing;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly accessTokenTtlSeconds: number;
  private readonly clockToleranceSeconds: number;
  private readonly now: () => Date;

  constructor(options: TokenSignerOptions) {
    this.keyRing = options.keyRing;
    this.issuer = options.issuer;
    this.audience = options.audience;
    this.accessTokenTtlSeconds = options.accessTokenTtlMinutes * 60;
    this.clockToleranceSeconds = options.clockToleranceSeconds;
    this.now = options.now ?? (() => new Date());
  }

  async issueAccessToken(input: IssueAccessTokenInput): Promise<IssuedAccessToken> {
    const { user } = input;
    const iat = Math.floor(this.now().getTime() / 1000);
    const exp = iat + this.accessTokenTtlSeconds;
    const jti = generateJti();

    const payload: AccessTokenPayload = {
      iss: this.issuer,
      sub: user.id,
      aud: this.audience,
      exp,
      iat,
      jti,
      email: user.email,
      name: `${user.firstName} ${user.lastName}`.trim(),
      given_name: user.firstName,
      family_name: user.lastName,
      tenant_id: input.tenantId,
      roles: input.roles,
      permissions: [...new Set(input.permissions)],
      token_type: 'access_token',
    };

    if (input.branchId) {
      payload.branch_id = input.branchId;
    }

    return {
      token: await signAccessToken(payload, this.keyRing.current),
      jti,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }

  /**
   * Opaque 256-bit refresh token value
   */
  issueRefreshToken(): string {
    return generateRefreshToken();
  }

  /**
   * Full verification, including lifetime
   */
  async verifyAccessToken(token: string): Promise<TokenValidationResult> {
    return verifyAccessToken(token, this.keyRing, {
      issuer: this.issuer,
      audience: this.audience,
      clockToleranceSeconds: this.clockToleranceSeconds,
      currentDate: this.now(),
    });
  }

  /**
   * Recover the claims of a possibly expired token. Signature, issuer and
   * audience are still enforced.
   */
  async parseExpiredToken(token: string): Promise<TokenValidationResult> {
    return verifyIgnoringExpiry(token, this.keyRing, {
      issuer: this.issuer,
      audience: this.audience,
    });
  }
}
