/**
 * Password Hashing
 *
 * Argon2id hashing with cost parameters taken from configuration:
 * - memoryCost in KiB (default 64MB)
 * - timeCost iterations (default 3)
 * - parallelism lanes (default 4)
 * - 16 byte salt generated per hash, 32 byte output
 */

import * as argon2 from 'argon2';
import type { HashingConfig } from '../config.js';
import { logger } from './logger.js';

export class PasswordHasher {
  private readonly options: argon2.Options & { raw?: false };

  constructor(config: HashingConfig) {
    this.options = {
      type: argon2.argon2id,
      memoryCost: config.memoryCost,
      timeCost: config.timeCost,
      parallelism: config.parallelism,
      hashLength: 32,
    };
  }

  /**
   * Hash a password using Argon2id
   *
   * @returns Encoded hash string (includes algorithm params and salt)
   */
  async hash(password: string): Promise<string> {
    try {
      return await argon2.hash(password, this.options);
    } catch (error) {
      logger.error({ error }, 'Failed to hash password');
      throw new Error('Password hashing failed');
    }
  }

  /**
   * Verify a password against a stored hash.
   *
   * A malformed hash yields false, same as a wrong password.
   */
  async verify(password: string, hash: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, password);
    } catch (error) {
      logger.debug({ error }, 'Password verification failed');
      return false;
    }
  }

  /**
   * Check if a hash was produced with different cost parameters
   */
  needsRehash(hash: string): boolean {
    try {
      return argon2.needsRehash(hash, this.options);
    } catch {
      return true;
    }
  }
}
