/**
 * InProcessNotificationQueue: defers confirmation emails past the response.
 *
 * Jobs are handed to the mailer on the next turn of the event loop. A
 * delivery failure is logged and dropped; it never reaches the request
 * that scheduled it.
 *
 * @module packages/adapters/notifications/InProcessNotificationQueue
 */

import type { ConfirmationEmailJob, IMailer, INotificationQueue } from '../../core/ports/index.js';
import { createChildLogger } from '../../../utils/logger.js';

const log = createChildLogger({ module: 'NotificationQueue' });

export class InProcessNotificationQueue implements INotificationQueue {
  private readonly pending = new Set<Promise<void>>();
  private closed = false;

  constructor(private readonly mailer: IMailer) {}

  enqueue(job: ConfirmationEmailJob): void {
    if (this.closed) {
      log.warn({ email: job.email }, 'Queue closed, confirmation email dropped');
      return;
    }

    const delivery = new Promise<void>((resolve) => {
      setImmediate(() => resolve());
    })
      .then(() => this.mailer.sendConfirmationEmail(job))
      .catch((error: unknown) => {
        log.error({ error, email: job.email }, 'Confirmation email delivery failed');
      })
      .finally(() => {
        this.pending.delete(delivery);
      });

    this.pending.add(delivery);
  }

  /**
   * Number of deliveries not yet settled
   */
  get size(): number {
    return this.pending.size;
  }

  /**
   * Wait for every scheduled delivery to settle
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  /**
   * Stop accepting jobs and wait for in-flight deliveries
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }
}
