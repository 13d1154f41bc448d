/**
 * commands/io.ts — process-backed CheckIO for commander actions.
 *
 * Only a failure to read the input file maps to EXIT_IO_ERROR. Log sink
 * failures and anything else propagate with their own message.
 */

import { readFileSync } from 'node:fs';
import type { Command } from 'commander';
import type { CheckIO } from '../check.js';
import { createLogSink, resolveLogFile } from '../config.js';

/** Exit code for files that cannot be read. */
export const EXIT_IO_ERROR = 2;

/**
 * The input file of a check could not be read.
 */
export class InputReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: NodeJS.ErrnoException) {
    super(`cannot read ${path}: ${cause.message}`, { cause });
    this.name = 'InputReadError';
    this.path = path;
  }
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function readInput(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err)) {
      throw new InputReadError(path, err);
    }
    throw err;
  }
}

/**
 * Build the CheckIO for a commander action. The log file comes from the
 * global --log-file option, then the environment.
 */
export function processIO(command: Command, env: NodeJS.ProcessEnv = process.env): CheckIO {
  const logFile: unknown = command.optsWithGlobals()['logFile'];
  return {
    readFile: readInput,
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    sink: createLogSink(resolveLogFile(typeof logFile === 'string' ? logFile : undefined, env)),
    clock: () => new Date().toISOString(),
  };
}

/**
 * Run a check body, mapping an unreadable input file to EXIT_IO_ERROR.
 */
export function withFileErrors(body: () => number): number {
  try {
    return body();
  } catch (err: unknown) {
    if (err instanceof InputReadError) {
      process.stderr.write(`Error: ${err.message}\n`);
      return EXIT_IO_ERROR;
    }
    throw err;
  }
}
