/**
 * Notification Types
 *
 * Type definitions for host notifications. A notification is handed to a
 * sink, which decides how it is displayed.
 */

export type NotificationLevel = 'info' | 'warn' | 'error';

export interface Notification {
  id: string;
  level: NotificationLevel;
  title: string;
  /** Message body; markdown when `markdown` is set */
  message: string;
  markdown: boolean;
  timestamp: Date;
}

/**
 * Per-call overrides for markdown notifications
 */
export interface NotifyOptions {
  title?: string;
  level?: NotificationLevel;
}

/**
 * Anything that can display a notification
 */
export interface NotificationSink {
  deliver(notification: Notification): void;
}

export interface NotificationServiceConfig {
  /** Title used when a call does not give one */
  title: string;
  /** Maximum notifications kept in history (0 keeps none) */
  historyLimit: number;
}

export const DEFAULT_NOTIFICATION_CONFIG: NotificationServiceConfig = {
  title: 'plugkit',
  historyLimit: 100
};
