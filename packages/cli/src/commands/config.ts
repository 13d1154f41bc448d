/**
 * sysconfig-check config — Check a configuration command file
 *
 *   sysconfig-check config <file>
 *   sysconfig-check config <file> --supported
 *   sysconfig-check config <file> --keywords keywords.json
 *   sysconfig-check config <file> --json
 *
 * Without a keyword option only the syntax is checked.
 */

import { Command } from 'commander';
import { EXIT_INVALID, runCheck } from '../check.js';
import { resolveRegistry } from '../config.js';
import { renderProblems } from '../output/report.js';
import { processIO, withFileErrors } from './io.js';

export const configCommand = new Command('config')
  .description('Parse a configuration command file and report the first syntax error')
  .argument('<file>', 'Configuration file to check')
  .option('--supported', 'Also validate commands against the built-in keyword table')
  .option('--keywords <file>', 'Also validate commands against a JSON keyword table')
  .option('--json', 'Print the parsed document as JSON')
  .action((
    file: string,
    options: { supported?: boolean; keywords?: string; json?: boolean },
    command: Command,
  ) => {
    const registry = resolveRegistry(options);
    if (!registry.ok) {
      process.stderr.write(renderProblems(options.keywords ?? 'sysconfig-check', registry.errors) + '\n');
      process.exitCode = EXIT_INVALID;
      return;
    }

    process.exitCode = withFileErrors(() =>
      runCheck(
        { format: 'config', path: file, json: options.json === true, registry: registry.value },
        processIO(command),
      ),
    );
  });
