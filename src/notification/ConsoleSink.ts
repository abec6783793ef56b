/**
 * ConsoleSink
 *
 * Prints notifications to the terminal. Markdown bodies get a light
 * rendering: headings in bold cyan, `**strong**` runs in bold.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

import type { Notification, NotificationLevel, NotificationSink } from './types.js';

export type ConsoleWriter = (level: NotificationLevel, output: string) => void;

const defaultWriter: ConsoleWriter = (level, output) => {
  switch (level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    default:
      console.log(output);
  }
};

export interface ConsoleSinkOptions {
  color: boolean;
  write: ConsoleWriter;
}

export class ConsoleSink implements NotificationSink {
  private paint: ChalkInstance;
  private write: ConsoleWriter;

  constructor(options: Partial<ConsoleSinkOptions> = {}) {
    this.paint = new Chalk({ level: options.color === false ? 0 : chalk.level });
    this.write = options.write ?? defaultWriter;
  }

  deliver(notification: Notification): void {
    const lines: string[] = [];
    lines.push(this.header(notification));

    const body = notification.message.split('\n');
    for (const line of body) {
      lines.push(notification.markdown ? this.renderMarkdownLine(line) : line);
    }

    this.write(notification.level, lines.join('\n'));
  }

  private header(notification: Notification): string {
    const label = `[${notification.level.toUpperCase()}] ${notification.title}`;
    switch (notification.level) {
      case 'error':
        return this.paint.red.bold(label);
      case 'warn':
        return this.paint.yellow.bold(label);
      default:
        return this.paint.blue.bold(label);
    }
  }

  private renderMarkdownLine(line: string): string {
    if (/^#{1,6} /.test(line)) {
      return this.paint.cyan.bold(line.replace(/^#{1,6} /, ''));
    }
    return line.replace(/\*\*(.+?)\*\*/g, (_match, text: string) => this.paint.bold(text));
  }
}
