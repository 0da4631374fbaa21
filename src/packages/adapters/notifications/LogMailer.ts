/**
 * LogMailer: development mail transport.
 *
 * Writes the confirmation link to the log instead of sending it.
 *
 * @module packages/adapters/notifications/LogMailer
 */

import type { Logger } from 'pino';
import type { ConfirmationEmailJob, IMailer } from '../../core/ports/index.js';
import type { TokenService } from '../../../services/auth/index.js';
import { createChildLogger } from '../../../utils/logger.js';

/**
 * Confirmation link for an email token: `<baseUrl>api/auth/confirmed_email/<token>`
 */
export function buildConfirmationLink(baseUrl: string, emailToken: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}api/auth/confirmed_email/${emailToken}`;
}

export class LogMailer implements IMailer {
  private readonly log: Logger;

  constructor(
    private readonly tokens: TokenService,
    log?: Logger
  ) {
    this.log = log ?? createChildLogger({ module: 'LogMailer' });
  }

  async sendConfirmationEmail(job: ConfirmationEmailJob): Promise<void> {
    const emailToken = await this.tokens.createEmailToken(job.email);
    const link = buildConfirmationLink(job.baseUrl, emailToken);

    this.log.info(
      { to: job.email, username: job.username, link },
      'Confirm your email'
    );
  }
}
