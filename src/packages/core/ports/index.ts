/**
 * Core ports
 *
 * @module packages/core/ports
 */

export type { ConfirmationEmailJob, INotificationQueue } from './INotificationQueue.js';
export type { IMailer } from './IMailer.js';
export type { IAvatarStorage } from './IAvatarStorage.js';
