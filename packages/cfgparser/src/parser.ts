/**
 * sysconfig Config Parser — Grammar Engine and Document Builder
 *
 * Recursive descent over the configuration command language:
 *
 *   config           := command+ EOF
 *   command          := command_word (command_argument | command_option)* NEWLINE
 *   command_word     := (a-z | "." | "-" | "_")+
 *   command_argument := "--" command_word "=" quoted_string
 *   command_option   := quoteless_string | quoted_string
 *   quoteless_string := (A-Z | a-z | 0-9 | "_" | "-" | ".")+
 *   quoted_string    := '"' char* '"'
 *
 * Spaces and tabs between tokens are skipped, and `#` starts a comment that
 * runs to the end of the line. Alternatives are tried in grammar order, so a
 * token needs no separator from its neighbour: `abc123` is the word `abc`
 * followed by the positional `123`.
 *
 * Parsing is all-or-nothing. The first error aborts the call and no partial
 * document is returned.
 */

import { Cursor, ParseErrorKind, runParser, type ParseResult } from '@sysconfig/syntax';
import type { Argument, Command, ConfigDocument } from './types.js';

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

const WORD_CHAR = /^[a-z._-]$/;
const QUOTELESS_CHAR = /^[A-Za-z0-9_.-]$/;
const HEX4 = /^[0-9A-Fa-f]{4}$/;

const isWordChar = (ch: string): boolean => WORD_CHAR.test(ch);
const isQuotelessChar = (ch: string): boolean => QUOTELESS_CHAR.test(ch);
const isBlank = (ch: string): boolean => ch === ' ' || ch === '\t';
const isPlainStringChar = (ch: string): boolean => ch !== '"' && ch !== '\\';

/** Single-character escapes and what they decode to. */
const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ['\\', '\\'],
  ['/', '/'],
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
]);

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

function skipBlanksAndComment(cursor: Cursor): void {
  cursor.takeWhile(isBlank);
  if (cursor.peek() === '#') {
    cursor.takeWhile((ch) => ch !== '\n');
  }
}

function readCommandWord(cursor: Cursor): string {
  const word = cursor.takeWhile(isWordChar);
  if (word === '') {
    cursor.fail(
      ParseErrorKind.UnexpectedToken,
      `expected a command word, found ${describe(cursor.peek())}`,
    );
  }
  return word;
}

/**
 * Decode one escape sequence. The cursor sits on the backslash.
 */
function readEscape(cursor: Cursor, openQuote: number): string {
  const start = cursor.offset;
  const code = cursor.peek(1);

  if (code === '') {
    cursor.fail(ParseErrorKind.UnterminatedString, 'quoted string is never closed', openQuote);
  }

  const simple = SIMPLE_ESCAPES.get(code);
  if (simple !== undefined) {
    cursor.advance(2);
    return simple;
  }

  if (code === 'u') {
    const hex = cursor.source.slice(start + 2, start + 6);
    if (!HEX4.test(hex)) {
      cursor.fail(
        ParseErrorKind.InvalidEscape,
        '\\u must be followed by exactly four hexadecimal digits',
        start,
      );
    }
    cursor.advance(6);
    return String.fromCharCode(Number.parseInt(hex, 16));
  }

  return cursor.fail(ParseErrorKind.InvalidEscape, `unknown escape sequence \\${code}`, start);
}

/**
 * Read a quoted string and return its decoded value. The cursor sits on
 * the opening quote.
 */
function readQuotedString(cursor: Cursor): string {
  const openQuote = cursor.offset;
  cursor.advance();

  let value = '';
  for (;;) {
    value += cursor.takeWhile(isPlainStringChar);
    if (cursor.atEnd()) {
      cursor.fail(ParseErrorKind.UnterminatedString, 'quoted string is never closed', openQuote);
    }
    if (cursor.peek() === '"') {
      cursor.advance();
      return value;
    }
    value += readEscape(cursor, openQuote);
  }
}

/**
 * Try `--key="value"`. Returns null, with the cursor restored, when the
 * input is not `--` word `=`; after the `=` the token is committed and a
 * missing quoted value is an error.
 */
function readNamedArgument(cursor: Cursor): Argument | null {
  const start = cursor.offset;
  if (!cursor.consume('--')) {
    return null;
  }
  const key = cursor.takeWhile(isWordChar);
  if (key === '' || !cursor.consume('=')) {
    cursor.reset(start);
    return null;
  }
  if (cursor.peek() !== '"') {
    cursor.fail(
      ParseErrorKind.UnexpectedToken,
      `expected a quoted value for --${key}, found ${describe(cursor.peek())}`,
    );
  }
  return { kind: 'named', key, value: readQuotedString(cursor) };
}

function readArgument(cursor: Cursor): Argument {
  if (cursor.peek() === '"') {
    return { kind: 'positional', value: readQuotedString(cursor) };
  }

  const named = readNamedArgument(cursor);
  if (named !== null) {
    return named;
  }

  const token = cursor.takeWhile(isQuotelessChar);
  if (token === '') {
    cursor.fail(ParseErrorKind.UnexpectedToken, `unexpected character ${describe(cursor.peek())}`);
  }
  return { kind: 'positional', value: token };
}

/**
 * Read a command word and its arguments up to, not including, the line
 * terminator.
 */
function readCommand(cursor: Cursor): Command {
  const word = readCommandWord(cursor);
  const args: Argument[] = [];

  for (;;) {
    skipBlanksAndComment(cursor);
    if (cursor.atLineEnd()) {
      return { word, arguments: args };
    }
    args.push(readArgument(cursor));
  }
}

function describe(ch: string): string {
  if (ch === '') {
    return 'end of input';
  }
  if (ch === '\n' || ch === '\r') {
    return 'end of line';
  }
  return JSON.stringify(ch);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse a single command line.
 *
 * A trailing comment and one line terminator are accepted. Anything after
 * the terminator is reported as trailing input.
 *
 * @example
 * parseCommand('set-hostname --value="my-host"')
 * // { ok: true, value: { word: 'set-hostname',
 * //   arguments: [{ kind: 'named', key: 'value', value: 'my-host' }] } }
 */
export function parseCommand(line: string): ParseResult<Command> {
  return runParser(() => {
    const cursor = new Cursor(line);
    cursor.takeWhile(isBlank);
    const command = readCommand(cursor);
    cursor.skipLineEnd();
    if (!cursor.atEnd()) {
      cursor.fail(ParseErrorKind.TrailingInput, 'input continues after the end of the command');
    }
    return command;
  });
}

/**
 * Parse a whole configuration file.
 *
 * Blank and comment-only lines are skipped. Every command ends at `\n`,
 * `\r\n` or end of input, so a final newline is optional. At least one
 * command is required.
 */
export function parseConfig(text: string): ParseResult<ConfigDocument> {
  return runParser(() => {
    const cursor = new Cursor(text);
    const commands: Command[] = [];

    for (;;) {
      skipBlanksAndComment(cursor);
      if (cursor.skipLineEnd()) {
        continue;
      }
      if (cursor.atEnd()) {
        break;
      }
      commands.push(readCommand(cursor));
      cursor.skipLineEnd();
    }

    if (commands.length === 0) {
      cursor.fail(ParseErrorKind.UnexpectedToken, 'expected at least one command');
    }
    return { commands };
  });
}
