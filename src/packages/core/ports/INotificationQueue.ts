/**
 * Notification Queue Interface
 *
 * The auth flows only need to *schedule* a confirmation email; delivery
 * happens later and its failures never reach the request that asked for it.
 *
 * @module packages/core/ports/INotificationQueue
 */

/**
 * Request to send an email-confirmation link
 */
export interface ConfirmationEmailJob {
  /** Recipient address; also the subject of the email token */
  email: string;
  /** Name used in the greeting */
  username: string;
  /** Public base URL of the API, ending in "/" */
  baseUrl: string;
}

export interface INotificationQueue {
  /**
   * Schedule delivery. Returns before anything is sent.
   */
  enqueue(job: ConfirmationEmailJob): void;
}
