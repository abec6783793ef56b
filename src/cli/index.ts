#!/usr/bin/env node
/**
 * plugkit CLI
 *
 * Command-line access to the host-editor utilities.
 */

import { Command } from 'commander';
import { scanCommand } from './commands/scan.js';
import { gitInfoCommand } from './commands/git-info.js';
import { openCommand } from './commands/open.js';
import { dumpCommand } from './commands/dump.js';
import { profileCommand } from './commands/profile.js';

const program = new Command();

program
  .name('plugkit')
  .description('plugkit - host-editor plugin utilities')
  .version('0.1.0');

program.addCommand(scanCommand);
program.addCommand(gitInfoCommand);
program.addCommand(openCommand);
program.addCommand(dumpCommand);
program.addCommand(profileCommand);

program.parse();
