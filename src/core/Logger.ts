/**
 * Logger
 *
 * Console logger with a `[Component]` prefix on every line, filtered by
 * the configured level.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

import { LOG_LEVELS, type LogLevel } from '../config/types.js';

export interface LoggerOptions {
  level: LogLevel;
  color: boolean;
}

const DEFAULT_LOGGER_OPTIONS: LoggerOptions = {
  level: 'info',
  color: true
};

export class Logger {
  private component: string;
  private options: LoggerOptions;
  private paint: ChalkInstance;

  constructor(component: string, options: Partial<LoggerOptions> = {}) {
    this.component = component;
    this.options = { ...DEFAULT_LOGGER_OPTIONS, ...options };
    this.paint = new Chalk({ level: this.options.color ? chalk.level : 0 });
  }

  /**
   * Logger for a sub-component sharing this logger's options
   */
  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.options);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.options.level);
  }

  debug(message: string, ...details: unknown[]): void {
    if (!this.isEnabled('debug')) return;
    console.debug(this.paint.dim(`[${this.component}] ${message}`), ...details);
  }

  info(message: string, ...details: unknown[]): void {
    if (!this.isEnabled('info')) return;
    console.log(`${this.paint.cyan(`[${this.component}]`)} ${message}`, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (!this.isEnabled('warn')) return;
    console.warn(`${this.paint.yellow(`[${this.component}]`)} ${message}`, ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (!this.isEnabled('error')) return;
    console.error(`${this.paint.red(`[${this.component}]`)} ${message}`, ...details);
  }
}
