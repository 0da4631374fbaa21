/**
 * AuthService - Credential checks and token lifecycle
 *
 * Provides:
 * - Signup with a scheduled confirmation email
 * - Email/password login, gated on confirmation
 * - Refresh-token rotation with reuse detection
 * - Access-token to user resolution for protected routes
 *
 * Refresh rotation reads and writes the stored token in two steps, so two
 * concurrent refresh calls with the same token can both succeed.
 */

import type { Database } from '../../db/connection.js';
import { runInTransaction } from '../../db/connection.js';
import type { UserRepository, User } from '../../db/queries/user-queries.js';
import type { INotificationQueue } from '../../packages/core/ports/index.js';
import type { PasswordHasher } from '../../utils/password.js';
import { logger } from '../../utils/logger.js';
import {
  BadRequestError,
  ConflictError,
  InvalidTokenError,
  UnauthorizedError,
} from '../../api/errors.js';
import type { TokenPair, TokenService } from './TokenService.js';

// =============================================================================
// Types
// =============================================================================

export interface SignupRequest {
  username: string;
  email: string;
  password: string;
}

export interface MessageResult {
  message: string;
}

export interface AuthServiceDeps {
  db: Database.Database;
  users: UserRepository;
  tokens: TokenService;
  hasher: PasswordHasher;
  notifications: INotificationQueue;
}

// =============================================================================
// Messages
// =============================================================================

export const AUTH_MESSAGES = {
  invalidEmail: 'Invalid email',
  emailNotConfirmed: 'Email not confirmed',
  invalidPassword: 'Invalid password',
  invalidRefreshToken: 'Invalid refresh token',
  accountExists: 'Account already exists',
  usernameTaken: 'Username already taken',
  verificationError: 'Verification error',
  alreadyConfirmed: 'Your email is already confirmed',
  emailConfirmed: 'Email confirmed',
  checkEmail: 'Check your email for confirmation.',
} as const;

// =============================================================================
// AuthService Class
// =============================================================================

export class AuthService {
  private readonly db: Database.Database;
  private readonly users: UserRepository;
  private readonly tokens: TokenService;
  private readonly hasher: PasswordHasher;
  private readonly notifications: INotificationQueue;

  constructor(deps: AuthServiceDeps) {
    this.db = deps.db;
    this.users = deps.users;
    this.tokens = deps.tokens;
    this.hasher = deps.hasher;
    this.notifications = deps.notifications;
  }

  // ===========================================================================
  // Signup
  // ===========================================================================

  /**
   * Create an unconfirmed account and schedule its confirmation email
   *
   * @param baseUrl - Public base URL used to build the confirmation link
   * @throws ConflictError when the email or username is taken
   */
  async signup(request: SignupRequest, baseUrl: string): Promise<User> {
    const passwordHash = await this.hasher.hash(request.password);

    const user = runInTransaction(this.db, 'auth.signup', () => {
      if (this.users.getByEmail(request.email)) {
        throw new ConflictError(AUTH_MESSAGES.accountExists);
      }
      if (this.users.getByUsername(request.username)) {
        throw new ConflictError(AUTH_MESSAGES.usernameTaken);
      }
      return this.users.create({
        username: request.username,
        email: request.email,
        passwordHash,
      });
    });

    logger.info({ userId: user.id, username: user.username }, 'User signed up');

    this.notifications.enqueue({ email: user.email, username: user.username, baseUrl });

    return user;
  }

  // ===========================================================================
  // Login & Refresh
  // ===========================================================================

  /**
   * Exchange email and password for a token pair
   *
   * @throws UnauthorizedError with a reason-specific message
   */
  async login(email: string, password: string): Promise<TokenPair> {
    const user = this.users.getByEmail(email);
    if (!user) {
      logger.info({ email }, 'Login rejected: unknown email');
      throw new UnauthorizedError(AUTH_MESSAGES.invalidEmail);
    }

    if (!user.confirmed) {
      logger.info({ userId: user.id }, 'Login rejected: email not confirmed');
      throw new UnauthorizedError(AUTH_MESSAGES.emailNotConfirmed);
    }

    const passwordValid = await this.hasher.verify(password, user.passwordHash);
    if (!passwordValid) {
      logger.info({ userId: user.id }, 'Login rejected: invalid password');
      throw new UnauthorizedError(AUTH_MESSAGES.invalidPassword);
    }

    if (this.hasher.needsRehash(user.passwordHash)) {
      logger.debug({ userId: user.id }, 'Stored hash uses outdated cost parameters');
    }

    const pair = await this.tokens.createTokenPair(user.id);
    this.users.updateRefreshToken(user.id, pair.refreshToken);

    logger.info({ userId: user.id }, 'User logged in');
    return pair;
  }

  /**
   * Rotate the refresh token
   *
   * A token that decodes but is not the stored one is treated as reuse:
   * the stored token is cleared, forcing a new login.
   *
   * @throws UnauthorizedError
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    const userId = await this.tokens.decodeRefreshToken(refreshToken);

    const user = this.users.getById(userId);
    if (!user) {
      logger.info({ userId }, 'Refresh rejected: user no longer exists');
      throw new UnauthorizedError(AUTH_MESSAGES.invalidRefreshToken);
    }

    if (user.refreshToken !== refreshToken) {
      this.users.updateRefreshToken(user.id, null);
      logger.warn({ userId: user.id }, 'Refresh token reuse detected, stored token cleared');
      throw new UnauthorizedError(AUTH_MESSAGES.invalidRefreshToken);
    }

    const pair = await this.tokens.createTokenPair(user.id);
    this.users.updateRefreshToken(user.id, pair.refreshToken);

    logger.debug({ userId: user.id }, 'Refresh token rotated');
    return pair;
  }

  // ===========================================================================
  // Identity
  // ===========================================================================

  /**
   * Resolve the acting user from an access token
   *
   * @throws UnauthorizedError when the token is invalid or the user is gone
   */
  async resolveIdentity(accessToken: string): Promise<User> {
    const userId = await this.tokens.decodeAccessToken(accessToken);

    const user = this.users.getById(userId);
    if (!user) {
      logger.debug({ userId }, 'Access token subject not found');
      throw new InvalidTokenError();
    }
    return user;
  }

  // ===========================================================================
  // Email Confirmation
  // ===========================================================================

  /**
   * Confirm the account named by an email token. Idempotent.
   *
   * @throws InvalidTokenError for a bad token, BadRequestError for an unknown email
   */
  async confirmEmail(emailToken: string): Promise<MessageResult> {
    const email = await this.tokens.decodeEmailToken(emailToken);

    const user = this.users.getByEmail(email);
    if (!user) {
      logger.info({ email }, 'Confirmation for unknown email');
      throw new BadRequestError(AUTH_MESSAGES.verificationError);
    }

    if (user.confirmed) {
      return { message: AUTH_MESSAGES.alreadyConfirmed };
    }

    this.users.confirmEmail(email);
    logger.info({ userId: user.id }, 'Email confirmed');
    return { message: AUTH_MESSAGES.emailConfirmed };
  }

  /**
   * Re-send the confirmation email. The answer does not reveal whether the
   * address belongs to an account, unless it is already confirmed.
   */
  async requestConfirmationEmail(email: string, baseUrl: string): Promise<MessageResult> {
    const user = this.users.getByEmail(email);

    if (user?.confirmed) {
      return { message: AUTH_MESSAGES.alreadyConfirmed };
    }

    if (user) {
      this.notifications.enqueue({ email: user.email, username: user.username, baseUrl });
    } else {
      logger.debug({ email }, 'Confirmation requested for unknown email');
    }

    return { message: AUTH_MESSAGES.checkEmail };
  }
}

