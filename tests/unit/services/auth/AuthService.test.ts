/**
 * AuthService Tests
 *
 * Runs against an in-memory SQLite database with cheap argon2 parameters.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { UserRepository } from '../../../../src/db/queries/user-queries.js';
import { AUTH_MESSAGES } from '../../../../src/services/auth/index.js';
import { PasswordHasher } from '../../../../src/utils/password.js';
import { logger } from '../../../../src/utils/logger.js';
import {
  BadRequestError,
  ConflictError,
  InvalidTokenError,
  UnauthorizedError,
} from '../../../../src/api/errors.js';
import { createTestContext, type TestContext } from '../../../helpers/context.js';

const BASE_URL = 'http://api.test/';

const ada = { username: 'ada_lovelace', email: 'ada@example.com', password: 'analytical' };

describe('AuthService', () => {
  let ctx: TestContext;
  let users: UserRepository;

  beforeEach(() => {
    ctx = createTestContext();
    users = new UserRepository(ctx.db);
  });

  afterEach(() => {
    ctx.db.close();
  });

  async function signupConfirmed() {
    const user = await ctx.authService.signup(ada, BASE_URL);
    users.confirmEmail(user.email);
    return user;
  }

  // ===========================================================================
  // Signup
  // ===========================================================================

  describe('signup', () => {
    it('stores an unconfirmed user with a verifiable hash', async () => {
      await ctx.authService.signup(ada, BASE_URL);

      const stored = users.getByEmail(ada.email);
      expect(stored).not.toBeNull();
      expect(stored?.confirmed).toBe(false);
      expect(stored?.refreshToken).toBeNull();
      expect(stored?.passwordHash).not.toBe(ada.password);
      await expect(ctx.hasher.verify(ada.password, stored?.passwordHash ?? '')).resolves.toBe(
        true
      );
    });

    it('schedules a confirmation email', async () => {
      await ctx.authService.signup(ada, BASE_URL);

      expect(ctx.queue.jobs).toEqual([
        { email: ada.email, username: ada.username, baseUrl: BASE_URL },
      ]);
    });

    it('rejects a taken email', async () => {
      await ctx.authService.signup(ada, BASE_URL);

      await expect(
        ctx.authService.signup({ ...ada, username: 'someone' }, BASE_URL)
      ).rejects.toThrow(new ConflictError(AUTH_MESSAGES.accountExists));
    });

    it('rejects a taken username', async () => {
      await ctx.authService.signup(ada, BASE_URL);

      await expect(
        ctx.authService.signup({ ...ada, email: 'other@example.com' }, BASE_URL)
      ).rejects.toThrow(AUTH_MESSAGES.usernameTaken);
      expect(ctx.queue.jobs).toHaveLength(1);
    });
  });

  // ===========================================================================
  // Login
  // ===========================================================================

  describe('login', () => {
    it('rejects an unknown email', async () => {
      await expect(ctx.authService.login('nobody@example.com', 'whatever')).rejects.toThrow(
        AUTH_MESSAGES.invalidEmail
      );
    });

    it('rejects an unconfirmed account even with the right password', async () => {
      await ctx.authService.signup(ada, BASE_URL);

      const attempt = ctx.authService.login(ada.email, ada.password);
      await expect(attempt).rejects.toBeInstanceOf(UnauthorizedError);
      await expect(ctx.authService.login(ada.email, ada.password)).rejects.toThrow(
        AUTH_MESSAGES.emailNotConfirmed
      );
    });

    it('rejects a wrong password', async () => {
      await signupConfirmed();

      await expect(ctx.authService.login(ada.email, 'wrong-password')).rejects.toThrow(
        AUTH_MESSAGES.invalidPassword
      );
    });

    it('issues a pair and stores the refresh token', async () => {
      const user = await signupConfirmed();

      const pair = await ctx.authService.login(ada.email, ada.password);

      expect(pair.tokenType).toBe('bearer');
      await expect(ctx.tokens.decodeAccessToken(pair.accessToken)).resolves.toBe(user.id);
      expect(users.getById(user.id)?.refreshToken).toBe(pair.refreshToken);
    });

    it('notes a stored hash with outdated cost parameters', async () => {
      const legacyHasher = new PasswordHasher({ memoryCost: 8192, timeCost: 2, parallelism: 1 });
      const user = users.create({
        username: ada.username,
        email: ada.email,
        passwordHash: await legacyHasher.hash(ada.password),
      });
      users.confirmEmail(user.email);
      const debugSpy = vi.spyOn(logger, 'debug');

      try {
        await ctx.authService.login(ada.email, ada.password);

        expect(debugSpy).toHaveBeenCalledWith(
          { userId: user.id },
          'Stored hash uses outdated cost parameters'
        );
      } finally {
        debugSpy.mockRestore();
      }
    });
  });

  // ===========================================================================
  // Refresh
  // ===========================================================================

  describe('refresh', () => {
    it('rotates the stored refresh token', async () => {
      const user = await signupConfirmed();
      const first = await ctx.authService.login(ada.email, ada.password);

      const second = await ctx.authService.refresh(first.refreshToken);

      expect(second.refreshToken).not.toBe(first.refreshToken);
      expect(users.getById(user.id)?.refreshToken).toBe(second.refreshToken);
    });

    it('presenting the current token first keeps the session alive', async () => {
      const user = await signupConfirmed();
      const first = await ctx.authService.login(ada.email, ada.password);
      const second = await ctx.authService.refresh(first.refreshToken);

      // current token used before the stale one is replayed
      const third = await ctx.authService.refresh(second.refreshToken);
      expect(users.getById(user.id)?.refreshToken).toBe(third.refreshToken);

      // replaying the stale one afterwards still revokes everything
      await expect(ctx.authService.refresh(first.refreshToken)).rejects.toThrow(
        AUTH_MESSAGES.invalidRefreshToken
      );
      expect(users.getById(user.id)?.refreshToken).toBeNull();
    });

    it('replaying a stale token first clears the stored token', async () => {
      const user = await signupConfirmed();
      const first = await ctx.authService.login(ada.email, ada.password);
      const second = await ctx.authService.refresh(first.refreshToken);

      await expect(ctx.authService.refresh(first.refreshToken)).rejects.toThrow(
        AUTH_MESSAGES.invalidRefreshToken
      );
      expect(users.getById(user.id)?.refreshToken).toBeNull();

      // the newer token no longer matches either
      await expect(ctx.authService.refresh(second.refreshToken)).rejects.toThrow(
        AUTH_MESSAGES.invalidRefreshToken
      );
    });

    it('rejects an access token', async () => {
      await signupConfirmed();
      const pair = await ctx.authService.login(ada.email, ada.password);

      await expect(ctx.authService.refresh(pair.accessToken)).rejects.toBeInstanceOf(
        InvalidTokenError
      );
    });
  });

  // ===========================================================================
  // Identity
  // ===========================================================================

  describe('resolveIdentity', () => {
    it('returns the user named by the token', async () => {
      const user = await signupConfirmed();
      const pair = await ctx.authService.login(ada.email, ada.password);

      const resolved = await ctx.authService.resolveIdentity(pair.accessToken);
      expect(resolved.id).toBe(user.id);
      expect(resolved.email).toBe(ada.email);
    });

    it('rejects a token for a user that no longer exists', async () => {
      const token = await ctx.tokens.createAccessToken(999);

      await expect(ctx.authService.resolveIdentity(token)).rejects.toThrow(
        'Could not validate credentials'
      );
    });
  });

  // ===========================================================================
  // Email confirmation
  // ===========================================================================

  describe('confirmEmail', () => {
    it('confirms once, then reports already confirmed', async () => {
      await ctx.authService.signup(ada, BASE_URL);
      const token = await ctx.tokens.createEmailToken(ada.email);

      await expect(ctx.authService.confirmEmail(token)).resolves.toEqual({
        message: AUTH_MESSAGES.emailConfirmed,
      });
      expect(users.getByEmail(ada.email)?.confirmed).toBe(true);

      await expect(ctx.authService.confirmEmail(token)).resolves.toEqual({
        message: AUTH_MESSAGES.alreadyConfirmed,
      });
    });

    it('rejects a token for an unknown email', async () => {
      const token = await ctx.tokens.createEmailToken('ghost@example.com');

      await expect(ctx.authService.confirmEmail(token)).rejects.toThrow(
        new BadRequestError(AUTH_MESSAGES.verificationError)
      );
    });

    it('rejects an access token', async () => {
      const token = await ctx.tokens.createAccessToken(1);
      await expect(ctx.authService.confirmEmail(token)).rejects.toBeInstanceOf(InvalidTokenError);
    });
  });

  describe('requestConfirmationEmail', () => {
    it('re-sends for an unconfirmed account', async () => {
      await ctx.authService.signup(ada, BASE_URL);

      const result = await ctx.authService.requestConfirmationEmail(ada.email, BASE_URL);

      expect(result).toEqual({ message: AUTH_MESSAGES.checkEmail });
      expect(ctx.queue.jobs).toHaveLength(2);
    });

    it('answers the same for an unknown address without sending', async () => {
      const result = await ctx.authService.requestConfirmationEmail('ghost@example.com', BASE_URL);

      expect(result).toEqual({ message: AUTH_MESSAGES.checkEmail });
      expect(ctx.queue.jobs).toHaveLength(0);
    });

    it('reports an already confirmed account', async () => {
      await signupConfirmed();

      const result = await ctx.authService.requestConfirmationEmail(ada.email, BASE_URL);

      expect(result).toEqual({ message: AUTH_MESSAGES.alreadyConfirmed });
      expect(ctx.queue.jobs).toHaveLength(1);
    });
  });

  describe('persistence failures', () => {
    it('surfaces driver errors as a persistence error', () => {
      const empty = new Database(':memory:');
      const broken = new UserRepository(empty);

      // no schema applied: "no such table: users"
      expect(() => broken.getByEmail(ada.email)).toThrow('Storage temporarily unavailable');
      empty.close();
    });
  });
});
