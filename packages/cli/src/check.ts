/**
 * check.ts — run one parser over one file and report the outcome.
 *
 * All I/O goes through an injected CheckIO so the same path runs under
 * commander and under tests.
 */

import type { ConfigDocument, KeywordRegistry } from '@sysconfig/cfgparser';
import { parseConfig } from '@sysconfig/cfgparser';
import type { ShadowDocument } from '@sysconfig/shadow';
import { parseShadow } from '@sysconfig/shadow';
import type { ParseError, ValidationError } from '@sysconfig/syntax';
import type { LogSink } from './logging/log-sink.js';
import { toCheckEvent } from './logging/log-sink.js';
import { renderProblems, renderSummary, renderSyntaxError } from './output/report.js';

export type CheckFormat = 'config' | 'shadow';

export type CheckOutcome<D> =
  | { readonly status: 'valid'; readonly records: number; readonly document: D }
  | { readonly status: 'syntax_error'; readonly error: ParseError }
  | { readonly status: 'invalid'; readonly problems: ReadonlyArray<ValidationError> };

export interface CheckIO {
  readFile(path: string): string;
  stdout(text: string): void;
  stderr(text: string): void;
  readonly sink: LogSink;
  readonly clock: () => string;
}

export interface CheckRequest {
  readonly format: CheckFormat;
  readonly path: string;
  readonly json: boolean;
  /** Keyword set to validate config commands against. Config only. */
  readonly registry: KeywordRegistry | null;
}

/** Exit codes: 0 valid, 1 syntax or validation error. */
export const EXIT_OK = 0;
export const EXIT_INVALID = 1;

export function checkConfigSource(
  source: string,
  registry: KeywordRegistry | null = null,
): CheckOutcome<ConfigDocument> {
  const parsed = parseConfig(source);
  if (!parsed.ok) {
    return { status: 'syntax_error', error: parsed.error };
  }
  if (registry !== null) {
    const validated = registry.validate(parsed.value);
    if (!validated.ok) {
      return { status: 'invalid', problems: validated.errors };
    }
  }
  return { status: 'valid', records: parsed.value.commands.length, document: parsed.value };
}

export function checkShadowSource(source: string): CheckOutcome<ShadowDocument> {
  const parsed = parseShadow(source);
  if (!parsed.ok) {
    return { status: 'syntax_error', error: parsed.error };
  }
  return { status: 'valid', records: parsed.value.entries.length, document: parsed.value };
}

/**
 * Check one file, print the result and append a check event to the sink.
 *
 * @returns process exit code
 */
export function runCheck(request: CheckRequest, io: CheckIO): number {
  const source = io.readFile(request.path);
  const outcome: CheckOutcome<ConfigDocument | ShadowDocument> =
    request.format === 'config'
      ? checkConfigSource(source, request.registry)
      : checkShadowSource(source);

  io.sink.append(toCheckEvent(request.format, request.path, outcome, io.clock()));

  switch (outcome.status) {
    case 'valid':
      if (request.json) {
        io.stdout(JSON.stringify(outcome.document, null, 2) + '\n');
      } else {
        io.stdout(renderSummary(request.path, request.format, outcome.records) + '\n');
      }
      return EXIT_OK;
    case 'syntax_error':
      io.stderr(renderSyntaxError(request.path, source, outcome.error) + '\n');
      return EXIT_INVALID;
    case 'invalid':
      io.stderr(renderProblems(request.path, outcome.problems) + '\n');
      return EXIT_INVALID;
  }
}
