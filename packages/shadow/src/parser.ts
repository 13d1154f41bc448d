/**
 * sysconfig Shadow — Grammar Engine and Document Builder
 *
 *   entry          := username ":" password_field ":" lastchg? ":" min? ":" max?
 *                     ":" warn? ":" inactive? ":" expire? ":" flag?
 *   username       := alnum+
 *   password_field := "*LK*" | "NL" | "NP" | hash_char+
 *   hash_char      := "." | "/" | 0-9 | A-Z | a-z | "$" | ","
 *   aging fields   := digit+ | <empty>
 *
 * Every entry has exactly nine slots. Slots are read up to the next `:` or
 * line terminator and then checked as a whole, so a password such as
 * `NPx1` is a hash rather than a malformed sentinel.
 *
 * Parsing is all-or-nothing: the first malformed line aborts the whole
 * document.
 */

import { Cursor, ParseErrorKind, runParser, type ParseResult } from '@sysconfig/syntax';
import type { PasswordState, ShadowDocument, ShadowEntry } from './types.js';

const FIELD_COUNT = 9;

const NOT_USERNAME_CHAR = /[^A-Za-z0-9]/;
const NOT_HASH_CHAR = /[^A-Za-z0-9./$,]/;
const NOT_DIGIT = /[^0-9]/;

/** Read up to, not including, the next separator or line terminator. */
function readSlot(cursor: Cursor): string {
  const start = cursor.offset;
  while (!cursor.atLineEnd() && cursor.peek() !== ':') {
    cursor.advance();
  }
  return cursor.source.slice(start, cursor.offset);
}

/**
 * Consume the `:` that opens slot number `slot` (1-based).
 */
function expectSeparator(cursor: Cursor, slot: number): void {
  if (cursor.consume(':')) {
    return;
  }
  cursor.fail(
    ParseErrorKind.IncompleteRecord,
    `expected ${FIELD_COUNT} colon-separated fields, found ${slot - 1}`,
  );
}

function readUsername(cursor: Cursor): string {
  const start = cursor.offset;
  const username = readSlot(cursor);
  if (username === '') {
    cursor.fail(ParseErrorKind.UnexpectedToken, 'username is empty', start);
  }
  const bad = username.search(NOT_USERNAME_CHAR);
  if (bad !== -1) {
    cursor.fail(
      ParseErrorKind.UnexpectedToken,
      `invalid character ${JSON.stringify(username.charAt(bad))} in username`,
      start + bad,
    );
  }
  return username;
}

function readPassword(cursor: Cursor): PasswordState {
  const start = cursor.offset;
  const field = readSlot(cursor);

  switch (field) {
    case '*LK*':
      return { kind: 'locked' };
    case 'NL':
      return { kind: 'no_login' };
    case 'NP':
      return { kind: 'no_password' };
  }

  if (field === '') {
    cursor.fail(ParseErrorKind.InvalidPasswordField, 'password field is empty', start);
  }
  const bad = field.search(NOT_HASH_CHAR);
  if (bad !== -1) {
    cursor.fail(
      ParseErrorKind.InvalidPasswordField,
      `invalid character ${JSON.stringify(field.charAt(bad))} in password field`,
      start + bad,
    );
  }
  return { kind: 'hashed', hash: field };
}

function readAgingField(cursor: Cursor, slot: number, name: string): number | null {
  expectSeparator(cursor, slot);
  const start = cursor.offset;
  const field = readSlot(cursor);
  if (field === '') {
    return null;
  }
  const bad = field.search(NOT_DIGIT);
  if (bad !== -1) {
    cursor.fail(
      ParseErrorKind.InvalidNumericField,
      `${name} must be empty or decimal digits, found ${JSON.stringify(field)}`,
      start + bad,
    );
  }
  const value = Number.parseInt(field, 10);
  if (!Number.isSafeInteger(value)) {
    cursor.fail(
      ParseErrorKind.InvalidNumericField,
      `${name} exceeds ${Number.MAX_SAFE_INTEGER}, found ${JSON.stringify(field)}`,
      start,
    );
  }
  return value;
}

/**
 * Read one entry up to, not including, its line terminator.
 */
function readEntry(cursor: Cursor): ShadowEntry {
  const username = readUsername(cursor);
  expectSeparator(cursor, 2);
  const password = readPassword(cursor);

  const entry: ShadowEntry = {
    username,
    password,
    lastChange: readAgingField(cursor, 3, 'lastchg'),
    minAge: readAgingField(cursor, 4, 'min'),
    maxAge: readAgingField(cursor, 5, 'max'),
    warnPeriod: readAgingField(cursor, 6, 'warn'),
    inactivePeriod: readAgingField(cursor, 7, 'inactive'),
    expireDate: readAgingField(cursor, 8, 'expire'),
    flag: readAgingField(cursor, 9, 'flag'),
  };

  if (!cursor.atLineEnd()) {
    cursor.fail(
      ParseErrorKind.TrailingInput,
      `a shadow entry has exactly ${FIELD_COUNT} fields`,
    );
  }
  return entry;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse a single shadow entry. One trailing line terminator is accepted.
 *
 * @example
 * parseShadowEntry('daemon:NP:6445::::::')
 * // { ok: true, value: { username: 'daemon', password: { kind: 'no_password' },
 * //   lastChange: 6445, minAge: null, ... } }
 */
export function parseShadowEntry(line: string): ParseResult<ShadowEntry> {
  return runParser(() => {
    const cursor = new Cursor(line);
    const entry = readEntry(cursor);
    cursor.skipLineEnd();
    if (!cursor.atEnd()) {
      cursor.fail(ParseErrorKind.TrailingInput, 'input continues after the entry');
    }
    return entry;
  });
}

/**
 * Parse a whole shadow file: one entry per non-empty line, `\n` or `\r\n`
 * terminated, with the final terminator optional.
 */
export function parseShadow(text: string): ParseResult<ShadowDocument> {
  return runParser(() => {
    const cursor = new Cursor(text);
    const entries: ShadowEntry[] = [];
    while (!cursor.atEnd()) {
      if (cursor.skipLineEnd()) {
        continue;
      }
      entries.push(readEntry(cursor));
      cursor.skipLineEnd();
    }
    return { entries };
  });
}
