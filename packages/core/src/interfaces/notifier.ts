/**
 * Notifier Interface
 *
 * Delivers a finished report (e-mail through Resend, or a custom channel).
 */

import type { DeliveryReceipt } from "../models/research";

export interface Notifier {
  /**
   * Deliver a document. Rejects when the channel refuses or fails.
   */
  deliver(subject: string, body: string): Promise<DeliveryReceipt>;

  /**
   * Get the notifier name
   */
  getName(): string;
}
