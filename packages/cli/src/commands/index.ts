/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/sysconfig-check.ts
 *   src/index.ts
 */

import { program } from 'commander';
import { LOG_FILE_ENV } from '../config.js';
import { configCommand } from './config.js';
import { shadowCommand } from './shadow.js';

program
  .name('sysconfig-check')
  .description(
    'Check sysconfig command files and shadow password files.\n' +
    'Exits 0 when the file parses, 1 on the first syntax or validation error, 2 when it cannot be read.',
  )
  .version('0.1.0')
  .option('--log-file <path>', `Append a JSONL check event to this file (default: $${LOG_FILE_ENV})`);

program.addCommand(configCommand);
program.addCommand(shadowCommand);

export { program };
