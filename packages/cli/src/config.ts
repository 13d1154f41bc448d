/**
 * config.ts — CLI configuration resolution.
 *
 * Log file precedence (highest to lowest):
 *   1. --log-file flag
 *   2. SYSCONFIG_CHECK_LOG environment variable
 *   3. none (logging disabled)
 *
 * Keyword sets come from --supported (the built-in table) or --keywords
 * <file> (a JSON table of the same shape); the two are mutually exclusive.
 */

import { readFileSync } from 'node:fs';
import { KeywordRegistry, createSupportedRegistry, parseKeywordTable } from '@sysconfig/cfgparser';
import type { ValidationResult } from '@sysconfig/syntax';
import { FileLogSink, NullLogSink, type LogSink } from './logging/log-sink.js';

export const LOG_FILE_ENV = 'SYSCONFIG_CHECK_LOG';

export function resolveLogFile(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  if (explicit !== undefined && explicit !== '') {
    return explicit;
  }
  const fromEnv = env[LOG_FILE_ENV];
  if (fromEnv !== undefined && fromEnv !== '') {
    return fromEnv;
  }
  return null;
}

export function createLogSink(logFile: string | null): LogSink {
  return logFile === null ? new NullLogSink() : new FileLogSink(logFile);
}

/**
 * Load a keyword table from a JSON file.
 *
 * Unreadable files and malformed JSON are reported as validation errors
 * with the file path as context.
 */
export function loadKeywordFile(path: string): ValidationResult<KeywordRegistry> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    if (err instanceof Error) {
      return { ok: false, errors: [{ message: err.message, context: path }] };
    }
    throw err;
  }

  const table = parseKeywordTable(raw);
  if (!table.ok) {
    return table;
  }
  return { ok: true, value: new KeywordRegistry(table.value) };
}

export interface KeywordOptions {
  readonly keywords?: string | undefined;
  readonly supported?: boolean | undefined;
}

/**
 * Pick the keyword registry a config check validates against, if any.
 */
export function resolveRegistry(
  options: KeywordOptions,
): ValidationResult<KeywordRegistry | null> {
  if (options.keywords !== undefined && options.supported === true) {
    return {
      ok: false,
      errors: [{ message: '--keywords and --supported are mutually exclusive' }],
    };
  }
  if (options.supported === true) {
    return { ok: true, value: createSupportedRegistry() };
  }
  if (options.keywords !== undefined) {
    return loadKeywordFile(options.keywords);
  }
  return { ok: true, value: null };
}
