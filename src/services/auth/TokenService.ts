/**
 * TokenService - HS256 JWT issuance and verification
 *
 * Three token kinds share one secret and are told apart by the `scope`
 * claim, so an access token is never accepted where a refresh token is
 * expected (and vice versa):
 *
 * - access_token   sub = user id, short lived (minutes)
 * - refresh_token  sub = user id, long lived (days), one active per user
 * - email_token    sub = email, embedded in confirmation links
 *
 * Every token also carries iat, exp and a random jti, so two tokens
 * issued in the same second still differ.
 */

import * as jose from 'jose';
import { randomUUID } from 'crypto';
import type { TokenConfig } from '../../config.js';
import { InvalidTokenError } from '../../api/errors.js';
import { logger } from '../../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

export type TokenScope = 'access_token' | 'refresh_token' | 'email_token';

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

export interface TokenServiceOptions {
  /** Clock used for iat/exp and for expiry checks */
  now?: () => Date;
}

// =============================================================================
// Constants
// =============================================================================

const JWT_ALGORITHM = 'HS256' as const;
const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_DAY = 24 * 60 * 60;

// =============================================================================
// TokenService
// =============================================================================

export class TokenService {
  private readonly secret: Uint8Array;
  private readonly ttlSeconds: Record<TokenScope, number>;
  private readonly now: () => Date;

  constructor(config: TokenConfig, options: TokenServiceOptions = {}) {
    this.secret = new TextEncoder().encode(config.secretKey);
    this.ttlSeconds = {
      access_token: config.accessTokenTtlMinutes * SECONDS_PER_MINUTE,
      refresh_token: config.refreshTokenTtlDays * SECONDS_PER_DAY,
      email_token: config.emailTokenTtlDays * SECONDS_PER_DAY,
    };
    this.now = options.now ?? (() => new Date());
  }

  // ===========================================================================
  // Issuance
  // ===========================================================================

  async createAccessToken(userId: number): Promise<string> {
    return this.sign(String(userId), 'access_token');
  }

  async createRefreshToken(userId: number): Promise<string> {
    return this.sign(String(userId), 'refresh_token');
  }

  async createEmailToken(email: string): Promise<string> {
    return this.sign(email, 'email_token');
  }

  async createTokenPair(userId: number): Promise<TokenPair> {
    return {
      accessToken: await this.createAccessToken(userId),
      refreshToken: await this.createRefreshToken(userId),
      tokenType: 'bearer',
    };
  }

  // ===========================================================================
  // Verification
  // ===========================================================================

  /**
   * @returns user id
   * @throws InvalidTokenError
   */
  async decodeAccessToken(token: string): Promise<number> {
    return this.toUserId(await this.verify(token, 'access_token'));
  }

  /**
   * @returns user id
   * @throws InvalidTokenError
   */
  async decodeRefreshToken(token: string): Promise<number> {
    return this.toUserId(await this.verify(token, 'refresh_token'));
  }

  /**
   * @returns email address the confirmation link was issued for
   * @throws InvalidTokenError
   */
  async decodeEmailToken(token: string): Promise<string> {
    return this.verify(token, 'email_token');
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async sign(subject: string, scope: TokenScope): Promise<string> {
    const issuedAt = Math.floor(this.now().getTime() / 1000);

    return new jose.SignJWT({ scope })
      .setProtectedHeader({ alg: JWT_ALGORITHM, typ: 'JWT' })
      .setSubject(subject)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + this.ttlSeconds[scope])
      .setJti(randomUUID())
      .sign(this.secret);
  }

  /**
   * Verify signature, expiry and scope. The reason for a rejection is only
   * logged; the caller always sees the same InvalidTokenError.
   */
  private async verify(token: string, scope: TokenScope): Promise<string> {
    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.secret, {
        algorithms: [JWT_ALGORITHM],
        currentDate: this.now(),
        requiredClaims: ['sub', 'exp', 'iat'],
      }));
    } catch (error) {
      logger.debug(
        { scope, reason: error instanceof Error ? error.message : String(error) },
        'Token verification failed'
      );
      throw new InvalidTokenError();
    }

    if (payload.scope !== scope) {
      logger.debug({ expected: scope, actual: payload.scope }, 'Token scope mismatch');
      throw new InvalidTokenError();
    }

    if (!payload.sub) {
      throw new InvalidTokenError();
    }

    return payload.sub;
  }

  private toUserId(subject: string): number {
    const userId = Number(subject);
    if (!Number.isSafeInteger(userId) || userId <= 0) {
      logger.debug('Token subject is not a user id');
      throw new InvalidTokenError();
    }
    return userId;
  }
}
