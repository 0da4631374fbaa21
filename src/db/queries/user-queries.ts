/**
 * User Queries
 *
 * Credential store: persisted accounts with their password hash,
 * confirmation flag, active refresh token and avatar URL.
 */

import type { Database } from '../connection.js';
import { withPersistence } from '../connection.js';
import { PersistenceError } from '../../api/errors.js';
import {
  type User,
  type UserPublic,
  type UserRow,
  type CreateUserParams,
  rowToUser,
  userToPublic,
} from '../types/user.types.js';

// Re-export types for consumers
export type { User, UserPublic, CreateUserParams };
export { userToPublic };

export class UserRepository {
  constructor(private readonly db: Database.Database) {}

  // ===========================================================================
  // Create
  // ===========================================================================

  /**
   * Insert a new, unconfirmed user
   */
  create(params: CreateUserParams): User {
    const row = withPersistence('users.create', () =>
      this.db
        .prepare<[string, string, string], UserRow>(
          `INSERT INTO users (username, email, password_hash)
           VALUES (?, ?, ?)
           RETURNING *`
        )
        .get(params.username, params.email, params.passwordHash)
    );

    if (!row) {
      throw new PersistenceError('User insert returned no row');
    }
    return rowToUser(row);
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  getById(id: number): User | null {
    return this.findOne('users.getById', 'SELECT * FROM users WHERE id = ?', id);
  }

  getByEmail(email: string): User | null {
    return this.findOne('users.getByEmail', 'SELECT * FROM users WHERE email = ?', email);
  }

  getByUsername(username: string): User | null {
    return this.findOne('users.getByUsername', 'SELECT * FROM users WHERE username = ?', username);
  }

  // ===========================================================================
  // Updates
  // ===========================================================================

  /**
   * Replace (or clear, with null) the single active refresh token
   */
  updateRefreshToken(userId: number, refreshToken: string | null): void {
    withPersistence('users.updateRefreshToken', () =>
      this.db
        .prepare<[string | null, number]>(
          `UPDATE users
           SET refresh_token = ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
           WHERE id = ?`
        )
        .run(refreshToken, userId)
    );
  }

  /**
   * Mark the account with this email as confirmed
   *
   * @returns false when no account has that email
   */
  confirmEmail(email: string): boolean {
    const result = withPersistence('users.confirmEmail', () =>
      this.db
        .prepare<[string]>(
          `UPDATE users
           SET confirmed = 1, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
           WHERE email = ?`
        )
        .run(email)
    );
    return result.changes > 0;
  }

  updateAvatar(userId: number, avatarUrl: string): User | null {
    const row = withPersistence('users.updateAvatar', () =>
      this.db
        .prepare<[string, number], UserRow>(
          `UPDATE users
           SET avatar_url = ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
           WHERE id = ?
           RETURNING *`
        )
        .get(avatarUrl, userId)
    );
    return row ? rowToUser(row) : null;
  }

  private findOne(operation: string, sql: string, value: string | number): User | null {
    const row = withPersistence(operation, () =>
      this.db.prepare<[string | number], UserRow>(sql).get(value)
    );
    return row ? rowToUser(row) : null;
  }
}
