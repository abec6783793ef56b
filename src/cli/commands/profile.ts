/**
 * Profile Command
 *
 * Walk a directory tree one level at a time with a span around every step,
 * then show the resulting profile.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { GitInfoReader } from '../../capabilities/git/GitInfoReader.js';
import { ProfileStack } from '../../profiling/ProfileStack.js';
import { showProfile } from '../../profiling/ProfileReport.js';
import { makeThrottle } from '../../scheduling/Throttle.js';
import type { FileSystemService } from '../../services/FileSystemService.js';
import { createCliContext, fail } from '../context.js';

export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

/**
 * Scan `dir` and, while `depth` allows, its subdirectories, with a span
 * around each step. Returns the number of entries seen.
 */
export async function walkTree(
  fs: FileSystemService,
  stack: ProfileStack,
  dir: string,
  depth: number,
  onVisit: (dir: string) => void
): Promise<number> {
  onVisit(dir);
  const entries = await stack.measureAsync(`scandir ${dir}`, () => fs.scandir(dir));
  let count = entries.length;
  if (depth <= 0) return count;

  for (const entry of entries) {
    if (entry.type !== 'directory') continue;
    count += await stack.measureAsync(entry.name, () => walkTree(fs, stack, entry.path, depth - 1, onVisit));
  }
  return count;
}

export const profileCommand = new Command('profile')
  .description('Scan a directory tree and report where the time went')
  .argument('[dir]', 'Directory to profile', '.')
  .option('--depth <n>', 'Levels of subdirectories to descend into', parseNonNegativeInt, 1)
  .option('--progress-ms <ms>', 'Minimum interval between progress updates', parseNonNegativeInt, 50)
  .action(async (dir: string, options: { depth: number; progressMs: number }) => {
    const spinner = ora('Profiling...').start();

    try {
      const { config, fs, notifier } = createCliContext();
      const stack = new ProfileStack({ rootName: config.profileRootName });

      let current = dir;
      const updateSpinner = makeThrottle(options.progressMs, () => {
        spinner.text = `Scanning ${current}`;
      });

      const count = await stack.measureAsync('walk', () =>
        walkTree(fs, stack, dir, options.depth, visited => {
          current = visited;
          updateSpinner();
        })
      );
      await stack.measureAsync('git', () => new GitInfoReader(fs).gitInfo(dir));

      spinner.succeed(`Scanned ${chalk.white(count.toString())} entries`);
      showProfile(stack, notifier);
    } catch (error) {
      spinner.fail(chalk.red('Profiling failed'));
      fail(error);
    }
  });
