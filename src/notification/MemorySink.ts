import type { Notification, NotificationSink } from './types.js';

/**
 * Keeps delivered notifications in order, for callers that render them later
 */
export class MemorySink implements NotificationSink {
  readonly delivered: Notification[] = [];

  deliver(notification: Notification): void {
    this.delivered.push(notification);
  }
}
