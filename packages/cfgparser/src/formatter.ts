/**
 * sysconfig Config Parser — Formatter
 *
 * Renders commands back into the configuration language. Output of
 * formatCommand() parses back to an equal Command.
 */

import type { Argument, Command, ConfigDocument } from './types.js';

const QUOTELESS = /^[A-Za-z0-9_.-]+$/;

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '\\"'],
  ['\\', '\\\\'],
  ['\b', '\\b'],
  ['\f', '\\f'],
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
]);

function escapeChar(ch: string): string {
  const escaped = ESCAPES.get(ch);
  if (escaped !== undefined) {
    return escaped;
  }
  const code = ch.charCodeAt(0);
  if (code < 0x20 || code === 0x7f) {
    return '\\u' + code.toString(16).padStart(4, '0');
  }
  return ch;
}

/**
 * Quote and escape a string value.
 *
 * Quotes, backslashes and control characters are escaped; everything else,
 * including non-ASCII text, is written as-is.
 *
 * @example
 * quoteString('say "hi"\n') // '"say \\"hi\\"\\n"'
 */
export function quoteString(value: string): string {
  let out = '"';
  for (let i = 0; i < value.length; i++) {
    out += escapeChar(value.charAt(i));
  }
  return out + '"';
}

function formatArgument(arg: Argument): string {
  switch (arg.kind) {
    case 'named':
      return `--${arg.key}=${quoteString(arg.value)}`;
    case 'positional':
      return QUOTELESS.test(arg.value) ? arg.value : quoteString(arg.value);
  }
}

export function formatCommand(command: Command): string {
  return [command.word, ...command.arguments.map(formatArgument)].join(' ');
}

/** One command per line, newline-terminated. */
export function formatConfig(document: ConfigDocument): string {
  return document.commands.map((command) => formatCommand(command) + '\n').join('');
}
