/**
 * sysconfig-check shadow — Check a shadow password file
 *
 *   sysconfig-check shadow <file>
 *   sysconfig-check shadow <file> --json
 */

import { Command } from 'commander';
import { runCheck } from '../check.js';
import { processIO, withFileErrors } from './io.js';

export const shadowCommand = new Command('shadow')
  .description('Parse a shadow password file and report the first malformed entry')
  .argument('<file>', 'Shadow file to check')
  .option('--json', 'Print the parsed entries as JSON')
  .action((file: string, options: { json?: boolean }, command: Command) => {
    process.exitCode = withFileErrors(() =>
      runCheck(
        { format: 'shadow', path: file, json: options.json === true, registry: null },
        processIO(command),
      ),
    );
  });
