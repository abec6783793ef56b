/**
 * Git Info Command
 *
 * Show the branch and commit a repository's HEAD points at.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { GitInfoReader } from '../../capabilities/git/GitInfoReader.js';
import { createCliContext, fail } from '../context.js';

export const gitInfoCommand = new Command('git-info')
  .description('Show the branch and commit of a git checkout')
  .argument('[dir]', 'Repository directory', '.')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (dir: string, options: { output: string }) => {
    try {
      const { fs, logger } = createCliContext();
      const info = await new GitInfoReader(fs).gitInfo(dir);

      if (options.output === 'json') {
        console.log(JSON.stringify(info, null, 2));
        return;
      }

      if (!info) {
        logger.warn(`No branch checked out in ${dir}`);
        process.exitCode = 1;
        return;
      }
      console.log(chalk.dim('Branch:'), chalk.green(info.branch));
      console.log(chalk.dim('Commit:'), info.hash ?? chalk.dim('(packed ref)'));
    } catch (error) {
      fail(error);
    }
  });
