/**
 * Configuration Types for plugkit
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface PlugkitConfig {
  /** Title shown on every notification */
  title: string;
  /** Name of the synthetic root span of a profile stack */
  profileRootName: string;
  /** Delay between host entry and the very-lazy event */
  veryLazyDelayMs: number;
  /** Minimum level the logger prints */
  logLevel: LogLevel;
  /** Color console output with chalk */
  color: boolean;
}

export const DEFAULT_PLUGKIT_CONFIG: PlugkitConfig = {
  title: 'plugkit',
  profileRootName: 'session',
  veryLazyDelayMs: 100,
  logLevel: 'info',
  color: true
};
