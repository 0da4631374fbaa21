/**
 * Application wiring
 *
 * Builds every repository, service and adapter from one validated config.
 * Tests pass overrides for the database handle, the clock and the adapters.
 */

import type { AppConfig } from './config.js';
import { openDatabase, type Database } from './db/connection.js';
import { UserRepository } from './db/queries/user-queries.js';
import { ContactRepository } from './db/queries/contact-queries.js';
import { PasswordHasher } from './utils/password.js';
import { AuthService, TokenService, UserService } from './services/auth/index.js';
import { ContactService } from './services/contacts/index.js';
import type { IAvatarStorage, IMailer, INotificationQueue } from './packages/core/ports/index.js';
import { InProcessNotificationQueue } from './packages/adapters/notifications/InProcessNotificationQueue.js';
import { LogMailer } from './packages/adapters/notifications/LogMailer.js';
import { S3AvatarStorage } from './packages/adapters/avatar/S3AvatarStorage.js';

export interface AppContext {
  config: AppConfig;
  db: Database.Database;
  tokens: TokenService;
  hasher: PasswordHasher;
  notifications: INotificationQueue;
  authService: AuthService;
  userService: UserService;
  contactService: ContactService;
  /** Settles outstanding background work; called on shutdown */
  close(): Promise<void>;
}

export interface AppContextOverrides {
  db?: Database.Database;
  now?: () => Date;
  mailer?: IMailer;
  notifications?: INotificationQueue;
  /** Use `null` to disable avatar uploads regardless of config */
  avatarStorage?: IAvatarStorage | null;
}

function createAvatarStorage(config: AppConfig): IAvatarStorage | undefined {
  const { bucket, publicBaseUrl, region } = config.avatars;
  if (!bucket || !publicBaseUrl) {
    return undefined;
  }
  return new S3AvatarStorage({ bucket, publicBaseUrl, region });
}

export function createAppContext(
  config: AppConfig,
  overrides: AppContextOverrides = {}
): AppContext {
  const db = overrides.db ?? openDatabase(config.database.path);
  const now = overrides.now;

  const users = new UserRepository(db);
  const contacts = new ContactRepository(db);

  const tokens = new TokenService(config.tokens, { now });
  const hasher = new PasswordHasher(config.hashing);

  let ownedQueue: InProcessNotificationQueue | null = null;
  let notifications: INotificationQueue;
  if (overrides.notifications) {
    notifications = overrides.notifications;
  } else {
    ownedQueue = new InProcessNotificationQueue(overrides.mailer ?? new LogMailer(tokens));
    notifications = ownedQueue;
  }

  const avatars =
    overrides.avatarStorage === undefined
      ? createAvatarStorage(config)
      : (overrides.avatarStorage ?? undefined);

  return {
    config,
    db,
    tokens,
    hasher,
    notifications,
    authService: new AuthService({ db, users, tokens, hasher, notifications }),
    userService: new UserService({
      users,
      avatars,
      avatarKeyPrefix: config.avatars.keyPrefix,
    }),
    contactService: new ContactService(contacts, { now }),
    close: async () => {
      if (ownedQueue) {
        await ownedQueue.close();
      }
    },
  };
}
