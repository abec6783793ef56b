/**
 * UriOpener
 *
 * Opens a URI for the user. Local files go to the editor's viewer; anything
 * else is handed to the operating system's opener command. Failures are
 * reported as error notifications rather than thrown.
 */

import { spawnSync } from 'child_process';
import { inspect } from 'util';

import type { NotificationService } from '../notification/NotificationService.js';
import { FileSystemService } from '../services/FileSystemService.js';
import type { CommandResult, CommandRunner, EditorHost } from './types.js';

export type OpenResult = 'viewed' | 'opened' | 'failed';

/**
 * Quote a value for cmd.exe; inner double quotes are doubled
 */
export function quoteForCmd(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Opener command for `uri` on `platform`
 */
export function openCommand(uri: string, platform: NodeJS.Platform): string[] {
  if (platform === 'win32') {
    return ['cmd.exe', '/c', 'start', '""', quoteForCmd(uri)];
  }
  if (platform === 'darwin') {
    return ['open', uri];
  }
  return ['xdg-open', uri];
}

export const spawnRunner: CommandRunner = {
  run(command): CommandResult {
    const [program, ...args] = command;
    const result = spawnSync(program, args, {
      encoding: 'utf-8',
      windowsVerbatimArguments: program === 'cmd.exe'
    });
    if (result.error) {
      return { status: null, output: result.error.message };
    }
    return {
      status: result.status,
      output: `${result.stdout ?? ''}${result.stderr ?? ''}`
    };
  }
};

export interface UriOpenerOptions {
  platform: NodeJS.Platform;
  runner: CommandRunner;
  fs: FileSystemService;
}

export class UriOpener {
  private host: EditorHost;
  private notifier: NotificationService;
  private options: UriOpenerOptions;

  constructor(host: EditorHost, notifier: NotificationService, options: Partial<UriOpenerOptions> = {}) {
    this.host = host;
    this.notifier = notifier;
    this.options = {
      platform: options.platform ?? process.platform,
      runner: options.runner ?? spawnRunner,
      fs: options.fs ?? new FileSystemService()
    };
  }

  async open(uri: string): Promise<OpenResult> {
    if (await this.options.fs.fileExists(uri)) {
      await this.host.view(uri);
      return 'viewed';
    }

    const command = openCommand(uri, this.options.platform);
    const result = this.options.runner.run(command);
    if (result.status !== 0) {
      this.notifier.error(['Failed to open uri', result.output, inspect(command)].join('\n'));
      return 'failed';
    }
    return 'opened';
  }
}
