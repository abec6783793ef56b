/**
 * Open Command
 *
 * Open a file or URL the way the editor would.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'fs/promises';

import { UriOpener } from '../../platform/UriOpener.js';
import type { EditorHost } from '../../platform/types.js';
import { createCliContext, fail } from '../context.js';

// Stands in for the editor's read-only viewer
const terminalViewer: EditorHost = {
  async view(filePath) {
    console.log(chalk.dim(`── ${filePath} ──`));
    console.log(await readFile(filePath, 'utf-8'));
  }
};

export const openCommand = new Command('open')
  .description('Open a local file or hand a URI to the system opener')
  .argument('<uri>', 'File path or URI')
  .action(async (uri: string) => {
    try {
      const { notifier, fs, logger } = createCliContext();
      const result = await new UriOpener(terminalViewer, notifier, { fs }).open(uri);
      logger.debug(`open ${uri}: ${result}`);
      if (result === 'failed') {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(error);
    }
  });
