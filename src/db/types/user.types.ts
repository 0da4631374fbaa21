/**
 * User Types
 *
 * Entity, raw row and public (response-safe) shapes for accounts.
 */

// =============================================================================
// Core User Types
// =============================================================================

/**
 * Account holder. Owns contacts through `contacts.owner_id`.
 */
export interface User {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  /** Single active refresh token, null after logout or reuse detection */
  refreshToken: string | null;
  confirmed: boolean;
  avatarUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * User without credentials or tokens
 */
export interface UserPublic {
  id: number;
  username: string;
  email: string;
  confirmed: boolean;
  avatarUrl: string | null;
  createdAt: Date;
}

export interface CreateUserParams {
  username: string;
  email: string;
  passwordHash: string;
}

// =============================================================================
// Database Row Types
// =============================================================================

/**
 * Raw user row from SQLite
 */
export interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  refresh_token: string | null;
  confirmed: number; // 0 or 1
  avatar_url: string | null;
  created_at: string;
  updated_at: string;
}

// =============================================================================
// Row Converters
// =============================================================================

/**
 * Convert database row to User entity
 */
export function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    refreshToken: row.refresh_token,
    confirmed: row.confirmed === 1,
    avatarUrl: row.avatar_url,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Convert User to public (safe) representation
 */
export function userToPublic(user: User): UserPublic {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    confirmed: user.confirmed,
    avatarUrl: user.avatarUrl,
    createdAt: user.createdAt,
  };
}
