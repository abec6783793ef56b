/**
 * NotificationService
 *
 * Builds notifications for the host and hands them to a sink.
 * Every notification carries the configured title unless the call
 * overrides it.
 */

import { v4 as uuidv4 } from 'uuid';

import {
  type Notification,
  type NotificationLevel,
  type NotificationServiceConfig,
  type NotificationSink,
  type NotifyOptions,
  DEFAULT_NOTIFICATION_CONFIG
} from './types.js';

export class NotificationService {
  private sink: NotificationSink;
  private config: NotificationServiceConfig;
  private sent: Notification[] = [];

  constructor(sink: NotificationSink, config: Partial<NotificationServiceConfig> = {}) {
    this.sink = sink;
    this.config = { ...DEFAULT_NOTIFICATION_CONFIG, ...config };
  }

  /**
   * Send a markdown notification; a list of lines is joined with newlines
   */
  markdown(message: string | readonly string[], options: NotifyOptions = {}): Notification {
    const text = typeof message === 'string' ? message : message.join('\n');
    return this.send(options.level ?? 'info', text, true, options.title);
  }

  error(message: string): Notification {
    return this.send('error', message, false);
  }

  warn(message: string): Notification {
    return this.send('warn', message, false);
  }

  info(message: string): Notification {
    return this.send('info', message, false);
  }

  /**
   * Notifications sent so far, oldest first
   */
  history(): readonly Notification[] {
    return this.sent;
  }

  private send(level: NotificationLevel, message: string, markdown: boolean, title?: string): Notification {
    const notification: Notification = {
      id: uuidv4(),
      level,
      title: title ?? this.config.title,
      message,
      markdown,
      timestamp: new Date()
    };

    this.sink.deliver(notification);
    this.remember(notification);
    return notification;
  }

  private remember(notification: Notification): void {
    if (this.config.historyLimit <= 0) return;
    this.sent.push(notification);
    if (this.sent.length > this.config.historyLimit) {
      this.sent.splice(0, this.sent.length - this.config.historyLimit);
    }
  }
}
