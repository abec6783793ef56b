/**
 * Scan Command
 *
 * List the entries of a directory, or search it with a glob.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { DirEntry } from '../../services/FileSystemService.js';
import { createCliContext, fail } from '../context.js';

function colorByType(entry: DirEntry): string {
  switch (entry.type) {
    case 'directory':
      return chalk.blue(`${entry.name}/`);
    case 'link':
      return chalk.cyan(`${entry.name}@`);
    case 'other':
      return chalk.yellow(entry.name);
    default:
      return entry.name;
  }
}

export const scanCommand = new Command('scan')
  .description('List the entries of a directory')
  .argument('<dir>', 'Directory to scan')
  .option('-p, --pattern <glob>', 'Search recursively for paths matching a glob instead')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (dir: string, options: { pattern?: string; output: string }) => {
    try {
      const { fs } = createCliContext();

      if (options.pattern) {
        const matches = await fs.find(options.pattern, dir);
        console.log(options.output === 'json' ? JSON.stringify(matches, null, 2) : matches.join('\n'));
        return;
      }

      const entries = await fs.scandir(dir);

      if (options.output === 'json') {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      if (entries.length === 0) {
        console.log(chalk.dim(`No entries in ${dir}`));
        return;
      }
      for (const entry of entries) {
        console.log(colorByType(entry));
      }
    } catch (error) {
      fail(error);
    }
  });
