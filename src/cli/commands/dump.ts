/**
 * Dump Command
 *
 * Convert a JSON document to a table literal.
 */

import { Command } from 'commander';

import { dump } from '../../serialization/dump.js';
import { fail } from '../context.js';

export const dumpCommand = new Command('dump')
  .description('Convert JSON to a table literal')
  .argument('<json>', 'JSON document')
  .action((json: string) => {
    try {
      const value: unknown = JSON.parse(json);
      console.log(dump(value));
    } catch (error) {
      fail(error);
    }
  });
