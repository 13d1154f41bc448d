/**
 * output/report.ts — human-readable check results.
 *
 * Syntax errors use the compiler convention
 *   <path>:<line>:<column>: error[<kind>]: <message>
 * followed by the offending source line and a caret under the column.
 */

import type { ParseError, ValidationError } from '@sysconfig/syntax'
import { t } from './theme.js'

function sourceLine(source: string, line: number): string {
  const text = source.split('\n')[line - 1] ?? ''
  return text.endsWith('\r') ? text.slice(0, -1) : text
}

/**
 * Whitespace that lines up with `column` under `text`. Tabs are kept so the
 * caret stays aligned however the terminal expands them.
 */
function caretIndent(text: string, column: number): string {
  return Array.from(text.slice(0, column - 1), (ch) => (ch === '\t' ? '\t' : ' ')).join('')
}

export function renderSyntaxError(path: string, source: string, error: ParseError): string {
  const text = sourceLine(source, error.line)
  return [
    `${path}:${error.line}:${error.column}: ` +
      t.red(`error[${error.kind}]`) + `: ${error.message}`,
    '  ' + t.text(text),
    '  ' + caretIndent(text, error.column) + t.red('^'),
  ].join('\n')
}

export function renderProblems(path: string, problems: ReadonlyArray<ValidationError>): string {
  return problems
    .map((p) =>
      `${path}: ` +
      (p.context !== undefined ? t.muted(p.context) + ': ' : '') +
      t.amber(p.message),
    )
    .join('\n')
}

export function renderSummary(path: string, format: 'config' | 'shadow', records: number): string {
  const noun = format === 'config'
    ? (records === 1 ? 'command' : 'commands')
    : (records === 1 ? 'entry' : 'entries')
  return `${path}: ` + t.green('ok') + ` (${records} ${noun})`
}
