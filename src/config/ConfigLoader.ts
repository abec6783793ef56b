/**
 * Configuration Loader
 *
 * Reads plugkit settings from environment variables, optionally seeded
 * from a .env file, and merges them over the defaults.
 */

import { config as loadDotenv } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';

import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_PLUGKIT_CONFIG, LOG_LEVELS, type LogLevel, type PlugkitConfig } from './types.js';

export type Env = Record<string, string | undefined>;

export const ENV_KEYS = {
  title: 'PLUGKIT_TITLE',
  profileRootName: 'PLUGKIT_PROFILE_ROOT',
  veryLazyDelayMs: 'PLUGKIT_VERY_LAZY_DELAY_MS',
  logLevel: 'PLUGKIT_LOG_LEVEL',
  color: 'PLUGKIT_COLOR'
} as const;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parseDelay(raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(ENV_KEYS.veryLazyDelayMs, raw, 'a non-negative integer');
  }
  return value;
}

function parseBoolean(key: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new ConfigurationError(key, raw, 'true or false');
}

/**
 * Build a configuration from environment variables.
 * Unset or empty variables fall back to the defaults; explicit overrides win over both.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<PlugkitConfig> = {}): PlugkitConfig {
  const fromEnv: Partial<PlugkitConfig> = {};

  const title = env[ENV_KEYS.title];
  if (title) fromEnv.title = title;

  const root = env[ENV_KEYS.profileRootName];
  if (root) fromEnv.profileRootName = root;

  const delay = env[ENV_KEYS.veryLazyDelayMs];
  if (delay) fromEnv.veryLazyDelayMs = parseDelay(delay);

  const level = env[ENV_KEYS.logLevel];
  if (level) {
    const normalized = level.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigurationError(ENV_KEYS.logLevel, level, LOG_LEVELS.join(', '));
    }
    fromEnv.logLevel = normalized;
  }

  const color = env[ENV_KEYS.color];
  if (color) fromEnv.color = parseBoolean(ENV_KEYS.color, color);

  return { ...DEFAULT_PLUGKIT_CONFIG, ...fromEnv, ...overrides };
}

/**
 * Load a .env file from `dir` into process.env if one exists.
 * Returns true when a file was read.
 */
export function loadEnvFile(dir: string = process.cwd()): boolean {
  const envPath = join(dir, '.env');
  if (!existsSync(envPath)) {
    return false;
  }
  const result = loadDotenv({ path: envPath });
  if (result.error) {
    throw result.error;
  }
  return true;
}
