/**
 * UserService - Profile changes made by the account holder
 */

import type { UserRepository, User } from '../../db/queries/user-queries.js';
import type { IAvatarStorage } from '../../packages/core/ports/index.js';
import { processAvatar } from '../../utils/image.js';
import { logger } from '../../utils/logger.js';
import { NotFoundError, ServiceUnavailableError } from '../../api/errors.js';

export interface UserServiceDeps {
  users: UserRepository;
  /** Absent when no avatar bucket is configured */
  avatars?: IAvatarStorage;
  /** Object key prefix, e.g. "avatars" */
  avatarKeyPrefix?: string;
}

export class UserService {
  private readonly users: UserRepository;
  private readonly avatars: IAvatarStorage | undefined;
  private readonly avatarKeyPrefix: string;

  constructor(deps: UserServiceDeps) {
    this.users = deps.users;
    this.avatars = deps.avatars;
    this.avatarKeyPrefix = (deps.avatarKeyPrefix ?? 'avatars').replace(/\/+$/, '');
  }

  /**
   * Resize, upload and record a new avatar
   *
   * @throws ServiceUnavailableError when avatar hosting is not configured
   * @throws ImageProcessingError when the upload is not a usable image
   */
  async updateAvatar(user: User, image: Buffer, mimeType?: string): Promise<User> {
    if (!this.avatars) {
      throw new ServiceUnavailableError('Avatar uploads are not configured');
    }

    const processed = await processAvatar(image, mimeType);
    const url = await this.avatars.upload(`${this.avatarKeyPrefix}/${user.id}`, processed);

    const updated = this.users.updateAvatar(user.id, url);
    if (!updated) {
      throw new NotFoundError('User', user.id);
    }

    logger.info({ userId: user.id }, 'Avatar updated');
    return updated;
  }
}
