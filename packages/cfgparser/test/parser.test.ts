/**
 * sysconfig Config Parser — Grammar Tests
 *
 * Covers command words, named and positional arguments, string escapes,
 * comments and line endings, and the location of every error kind.
 *
 * Tests are pure: no I/O, no state.
 */

import { describe, it, expect } from 'vitest';
import { ParseErrorKind } from '@sysconfig/syntax';
import { parseCommand, parseConfig } from '../src/index.js';

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

describe('parseCommand: well-formed lines', () => {
  it('parses a bare command word with no arguments', () => {
    for (const word of ['locale', 'set-hostname', 'a', 'x.y_z', '-', '...']) {
      expect(parseCommand(`${word}\n`)).toEqual({ ok: true, value: { word, arguments: [] } });
    }
  });

  it('parses a named argument', () => {
    expect(parseCommand('set-hostname --value="my-host"')).toEqual({
      ok: true,
      value: {
        word: 'set-hostname',
        arguments: [{ kind: 'named', key: 'value', value: 'my-host' }],
      },
    });
  });

  it('keeps mixed named and positional arguments in source order', () => {
    const result = parseCommand('zpool-create --ashift="12" mirror c1t0d0s0 --name="rpool" c2t0d0s0');
    expect(result).toEqual({
      ok: true,
      value: {
        word: 'zpool-create',
        arguments: [
          { kind: 'named', key: 'ashift', value: '12' },
          { kind: 'positional', value: 'mirror' },
          { kind: 'positional', value: 'c1t0d0s0' },
          { kind: 'named', key: 'name', value: 'rpool' },
          { kind: 'positional', value: 'c2t0d0s0' },
        ],
      },
    });
  });

  it('preserves duplicate named keys in order', () => {
    const result = parseCommand('cmd --value="a" --value="b"');
    expect(result.ok && result.value.arguments).toEqual([
      { kind: 'named', key: 'value', value: 'a' },
      { kind: 'named', key: 'value', value: 'b' },
    ]);
  });

  it('decodes every recognized escape in quoted strings', () => {
    const result = parseCommand(String.raw`motd "q\"b\\s\/" "\b\f\n\r\t" "été"`);
    expect(result.ok && result.value.arguments).toEqual([
      { kind: 'positional', value: 'q"b\\s/' },
      { kind: 'positional', value: '\b\f\n\r\t' },
      { kind: 'positional', value: 'été' },
    ]);
  });

  it('decodes \\u escapes with upper- or lowercase hex digits', () => {
    const result = parseCommand('cmd "\\u00e9t\\u00E9 \\u263A"');
    expect(result.ok && result.value.arguments).toEqual([
      { kind: 'positional', value: '\u00e9t\u00e9 \u263a' },
    ]);
  });

  it('accepts raw line breaks inside a quoted string', () => {
    const result = parseCommand('banner "first\nsecond"\n');
    expect(result.ok && result.value.arguments).toEqual([
      { kind: 'positional', value: 'first\nsecond' },
    ]);
  });

  it('accepts an empty quoted string', () => {
    const result = parseCommand('cmd --key="" ""');
    expect(result.ok && result.value.arguments).toEqual([
      { kind: 'named', key: 'key', value: '' },
      { kind: 'positional', value: '' },
    ]);
  });

  it('treats --word without "=" as a positional token', () => {
    const result = parseCommand('cmd --verbose --dry.run');
    expect(result.ok && result.value.arguments).toEqual([
      { kind: 'positional', value: '--verbose' },
      { kind: 'positional', value: '--dry.run' },
    ]);
  });

  it('does not require separators between tokens', () => {
    expect(parseCommand('abc123')).toEqual({
      ok: true,
      value: { word: 'abc', arguments: [{ kind: 'positional', value: '123' }] },
    });
    const result = parseCommand('cmd"a"b');
    expect(result.ok && result.value.arguments).toEqual([
      { kind: 'positional', value: 'a' },
      { kind: 'positional', value: 'b' },
    ]);
  });

  it('skips tabs, leading blanks and a trailing comment', () => {
    expect(parseCommand('  \tlocale\ten_US   # the default\n')).toEqual({
      ok: true,
      value: { word: 'locale', arguments: [{ kind: 'positional', value: 'en_US' }] },
    });
  });
});

describe('parseCommand: errors', () => {
  it('reports an unterminated string at its opening quote', () => {
    expect(parseCommand('cmd --key="open')).toEqual({
      ok: false,
      error: {
        kind: ParseErrorKind.UnterminatedString,
        message: 'quoted string is never closed',
        offset: 10,
        line: 1,
        column: 11,
      },
    });
  });

  it('reports a trailing backslash as an unterminated string', () => {
    const result = parseCommand('cmd "abc\\');
    expect(!result.ok && result.error).toMatchObject({
      kind: ParseErrorKind.UnterminatedString,
      offset: 4,
    });
  });

  it('reports a disallowed character in a bare token at that character', () => {
    expect(parseCommand('cmd foo!bar')).toEqual({
      ok: false,
      error: {
        kind: ParseErrorKind.UnexpectedToken,
        message: 'unexpected character "!"',
        offset: 7,
        line: 1,
        column: 8,
      },
    });
  });

  it('reports an unknown escape at the backslash', () => {
    expect(parseCommand(String.raw`cmd "a\qb"`)).toEqual({
      ok: false,
      error: {
        kind: ParseErrorKind.InvalidEscape,
        message: 'unknown escape sequence \\q',
        offset: 6,
        line: 1,
        column: 7,
      },
    });
  });

  it('reports \\u without four hex digits at the backslash', () => {
    const short = parseCommand('cmd "\\u12G4"');
    expect(!short.ok && short.error).toMatchObject({ kind: ParseErrorKind.InvalidEscape, offset: 5 });

    const truncated = parseCommand('cmd "\\u12"');
    expect(!truncated.ok && truncated.error).toMatchObject({
      kind: ParseErrorKind.InvalidEscape,
      offset: 5,
    });
  });

  it('requires a quoted value once --key= has been read', () => {
    expect(parseCommand('cmd --key=value')).toEqual({
      ok: false,
      error: {
        kind: ParseErrorKind.UnexpectedToken,
        message: 'expected a quoted value for --key, found "v"',
        offset: 10,
        line: 1,
        column: 11,
      },
    });
  });

  it('rejects a line that does not start with a command word', () => {
    expect(parseCommand('Locale en')).toEqual({
      ok: false,
      error: {
        kind: ParseErrorKind.UnexpectedToken,
        message: 'expected a command word, found "L"',
        offset: 0,
        line: 1,
        column: 1,
      },
    });
  });

  it('rejects a second line as trailing input', () => {
    expect(parseCommand('locale en\ntimezone UTC')).toEqual({
      ok: false,
      error: {
        kind: ParseErrorKind.TrailingInput,
        message: 'input continues after the end of the command',
        offset: 10,
        line: 2,
        column: 1,
      },
    });
  });
});

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('parses one command per line', () => {
    const result = parseConfig(
      'zpool-create --ashift="12" mirror c1t0d0s0 c2t0d0s0\nlocale en_US\n',
    );
    expect(result).toEqual({
      ok: true,
      value: {
        commands: [
          {
            word: 'zpool-create',
            arguments: [
              { kind: 'named', key: 'ashift', value: '12' },
              { kind: 'positional', value: 'mirror' },
              { kind: 'positional', value: 'c1t0d0s0' },
              { kind: 'positional', value: 'c2t0d0s0' },
            ],
          },
          { word: 'locale', arguments: [{ kind: 'positional', value: 'en_US' }] },
        ],
      },
    });
  });

  it('skips blank and comment-only lines and accepts a missing final newline', () => {
    const result = parseConfig('# header\n\n  locale en_US  # trailing\n\t\ntimezone UTC');
    expect(result.ok && result.value.commands.map((c) => c.word)).toEqual(['locale', 'timezone']);
  });

  it('accepts CRLF line endings', () => {
    const result = parseConfig('locale en_US\r\n# note\r\ntimezone UTC\r\n');
    expect(result.ok && result.value.commands).toEqual([
      { word: 'locale', arguments: [{ kind: 'positional', value: 'en_US' }] },
      { word: 'timezone', arguments: [{ kind: 'positional', value: 'UTC' }] },
    ]);
  });

  it('rejects a document without commands', () => {
    expect(parseConfig('# only comments\n\n')).toEqual({
      ok: false,
      error: {
        kind: ParseErrorKind.UnexpectedToken,
        message: 'expected at least one command',
        offset: 17,
        line: 3,
        column: 1,
      },
    });
    const empty = parseConfig('');
    expect(!empty.ok && empty.error.kind).toBe(ParseErrorKind.UnexpectedToken);
  });

  it('locates an error on a later line', () => {
    expect(parseConfig('locale C\nLocale en\n')).toEqual({
      ok: false,
      error: {
        kind: ParseErrorKind.UnexpectedToken,
        message: 'expected a command word, found "L"',
        offset: 9,
        line: 2,
        column: 1,
      },
    });
  });

  it('reports an unterminated string that runs to end of input at its opening quote', () => {
    const result = parseConfig('locale en_US\ntimezone "UTC\nkeyboard US\n');
    expect(!result.ok && result.error).toMatchObject({
      kind: ParseErrorKind.UnterminatedString,
      offset: 22,
      line: 2,
      column: 10,
    });
  });

  it('returns no partial document when a later command is malformed', () => {
    const result = parseConfig('locale en_US\ntimezone foo!bar\n');
    expect(result.ok).toBe(false);
    expect('value' in result).toBe(false);
  });
});
