/**
 * Shared setup for CLI commands: configuration, logger and notifier.
 */

import { loadConfig, loadEnvFile } from '../config/ConfigLoader.js';
import type { PlugkitConfig } from '../config/types.js';
import { Logger } from '../core/Logger.js';
import { ConsoleSink } from '../notification/ConsoleSink.js';
import { NotificationService } from '../notification/NotificationService.js';
import { FileSystemService } from '../services/FileSystemService.js';

export interface CliContext {
  config: PlugkitConfig;
  logger: Logger;
  notifier: NotificationService;
  fs: FileSystemService;
}

export function createCliContext(): CliContext {
  loadEnvFile();
  const config = loadConfig();
  const logger = new Logger('plugkit', { level: config.logLevel, color: config.color });
  logger.debug('Loaded configuration', config);

  return {
    config,
    logger,
    notifier: new NotificationService(new ConsoleSink({ color: config.color }), { title: config.title }),
    fs: new FileSystemService()
  };
}

export function fail(error: unknown): never {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
