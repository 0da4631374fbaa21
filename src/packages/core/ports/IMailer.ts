/**
 * Mailer Interface
 *
 * @module packages/core/ports/IMailer
 */

import type { ConfirmationEmailJob } from './INotificationQueue.js';

export interface IMailer {
  /**
   * Build and deliver a confirmation email.
   * Rejects when the transport fails.
   */
  sendConfirmationEmail(job: ConfirmationEmailJob): Promise<void>;
}
