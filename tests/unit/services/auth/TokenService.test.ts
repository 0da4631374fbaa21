/**
 * TokenService Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as jose from 'jose';
import { TokenService } from '../../../../src/services/auth/index.js';
import { InvalidTokenError } from '../../../../src/api/errors.js';
import { createTestConfig, FIXED_NOW, TEST_SECRET } from '../../../helpers/context.js';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

describe('TokenService', () => {
  let now: Date;
  let tokens: TokenService;

  beforeEach(() => {
    now = FIXED_NOW;
    tokens = new TokenService(createTestConfig().tokens, { now: () => now });
  });

  describe('access tokens', () => {
    it('round-trips the user id', async () => {
      const token = await tokens.createAccessToken(42);
      await expect(tokens.decodeAccessToken(token)).resolves.toBe(42);
    });

    it('carries sub, iat, exp, jti and scope', async () => {
      const token = await tokens.createAccessToken(42);
      const claims = jose.decodeJwt(token);

      const issuedAt = FIXED_NOW.getTime() / 1000;
      expect(claims.sub).toBe('42');
      expect(claims.scope).toBe('access_token');
      expect(claims.iat).toBe(issuedAt);
      expect(claims.exp).toBe(issuedAt + 15 * 60);
      expect(typeof claims.jti).toBe('string');
    });

    it('expires after the configured minutes', async () => {
      const token = await tokens.createAccessToken(42);

      now = new Date(FIXED_NOW.getTime() + 14 * MINUTE_MS);
      await expect(tokens.decodeAccessToken(token)).resolves.toBe(42);

      now = new Date(FIXED_NOW.getTime() + 16 * MINUTE_MS);
      await expect(tokens.decodeAccessToken(token)).rejects.toThrow(InvalidTokenError);
    });

    it('differs between two issuances in the same second', async () => {
      const first = await tokens.createAccessToken(42);
      const second = await tokens.createAccessToken(42);
      expect(first).not.toBe(second);
    });
  });

  describe('token kinds are not interchangeable', () => {
    it('rejects a refresh token as an access token', async () => {
      const refresh = await tokens.createRefreshToken(42);
      await expect(tokens.decodeAccessToken(refresh)).rejects.toThrow(InvalidTokenError);
    });

    it('rejects an access token as a refresh token', async () => {
      const access = await tokens.createAccessToken(42);
      await expect(tokens.decodeRefreshToken(access)).rejects.toThrow(InvalidTokenError);
    });

    it('rejects an email token as an access token', async () => {
      const email = await tokens.createEmailToken('ada@example.com');
      await expect(tokens.decodeAccessToken(email)).rejects.toThrow(InvalidTokenError);
    });
  });

  describe('refresh tokens', () => {
    it('live for the configured days', async () => {
      const token = await tokens.createRefreshToken(7);

      now = new Date(FIXED_NOW.getTime() + 6 * DAY_MS);
      await expect(tokens.decodeRefreshToken(token)).resolves.toBe(7);

      now = new Date(FIXED_NOW.getTime() + 8 * DAY_MS);
      await expect(tokens.decodeRefreshToken(token)).rejects.toThrow(InvalidTokenError);
    });
  });

  describe('email tokens', () => {
    it('round-trips the email address', async () => {
      const token = await tokens.createEmailToken('ada@example.com');
      await expect(tokens.decodeEmailToken(token)).resolves.toBe('ada@example.com');
    });
  });

  describe('createTokenPair', () => {
    it('returns a bearer pair for the user', async () => {
      const pair = await tokens.createTokenPair(3);

      expect(pair.tokenType).toBe('bearer');
      await expect(tokens.decodeAccessToken(pair.accessToken)).resolves.toBe(3);
      await expect(tokens.decodeRefreshToken(pair.refreshToken)).resolves.toBe(3);
    });
  });

  describe('rejections', () => {
    it('uses one message for every failure', async () => {
      const foreign = new TokenService(
        createTestConfig({ JWT_SECRET_KEY: 'another-test-secret-xyz' }).tokens,
        { now: () => now }
      );
      const wrongSecret = await foreign.createAccessToken(42);
      const refresh = await tokens.createRefreshToken(42);

      for (const token of [wrongSecret, refresh, 'not-a-jwt']) {
        await expect(tokens.decodeAccessToken(token)).rejects.toThrow(
          'Could not validate credentials'
        );
      }
    });

    it('rejects a tampered payload', async () => {
      const token = await tokens.createAccessToken(42);
      const [header, , signature] = token.split('.');
      const forgedPayload = Buffer.from(
        JSON.stringify({ sub: '1', scope: 'access_token', iat: 1, exp: 9999999999 })
      ).toString('base64url');

      await expect(
        tokens.decodeAccessToken(`${header}.${forgedPayload}.${signature}`)
      ).rejects.toThrow(InvalidTokenError);
    });

    it('rejects an access token whose subject is not a user id', async () => {
      const issuedAt = Math.floor(FIXED_NOW.getTime() / 1000);
      const token = await new jose.SignJWT({ scope: 'access_token' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('ada@example.com')
        .setIssuedAt(issuedAt)
        .setExpirationTime(issuedAt + 60)
        .sign(new TextEncoder().encode(TEST_SECRET));

      await expect(tokens.decodeAccessToken(token)).rejects.toThrow(InvalidTokenError);
    });
  });
});
