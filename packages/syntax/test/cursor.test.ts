/**
 * sysconfig Syntax — Cursor and Result Tests
 *
 * Tests are pure: no I/O, no state.
 */

import { describe, it, expect } from 'vitest';
import { Cursor, ParseErrorKind, ParseFailure, locate, runParser, unwrap } from '../src/index.js';

describe('locate', () => {
  it('maps an offset to a 1-based line and column', () => {
    expect(locate('ab\ncd', 4)).toEqual({ offset: 4, line: 2, column: 2 });
  });

  it('reports the start of input as line 1, column 1', () => {
    expect(locate('', 0)).toEqual({ offset: 0, line: 1, column: 1 });
  });

  it('counts a carriage return as the last column of its line', () => {
    expect(locate('ab\r\ncd', 2)).toEqual({ offset: 2, line: 1, column: 3 });
    expect(locate('ab\r\ncd', 4)).toEqual({ offset: 4, line: 2, column: 1 });
  });

  it('clamps offsets past the end of input', () => {
    expect(locate('abc', 10)).toEqual({ offset: 3, line: 1, column: 4 });
  });
});

describe('Cursor', () => {
  it('takeWhile consumes the longest matching run', () => {
    const cursor = new Cursor('aaab');
    expect(cursor.takeWhile((ch) => ch === 'a')).toBe('aaa');
    expect(cursor.offset).toBe(3);
    expect(cursor.peek()).toBe('b');
  });

  it('peek returns an empty string past the end', () => {
    const cursor = new Cursor('x', 1);
    expect(cursor.atEnd()).toBe(true);
    expect(cursor.peek()).toBe('');
  });

  it('consume only advances on a match', () => {
    const cursor = new Cursor('--key');
    expect(cursor.consume('-=')).toBe(false);
    expect(cursor.offset).toBe(0);
    expect(cursor.consume('--')).toBe(true);
    expect(cursor.offset).toBe(2);
  });

  it('reset returns to a saved offset', () => {
    const cursor = new Cursor('abc');
    const mark = cursor.offset;
    cursor.advance(2);
    cursor.reset(mark);
    expect(cursor.peek()).toBe('a');
  });

  it('recognizes LF and CRLF line ends', () => {
    const lf = new Cursor('a\nb', 1);
    expect(lf.atLineEnd()).toBe(true);
    expect(lf.skipLineEnd()).toBe(true);
    expect(lf.offset).toBe(2);

    const crlf = new Cursor('a\r\nb', 1);
    expect(crlf.atLineEnd()).toBe(true);
    expect(crlf.skipLineEnd()).toBe(true);
    expect(crlf.offset).toBe(3);
  });

  it('does not treat a lone carriage return as a line end', () => {
    const cursor = new Cursor('a\rb', 1);
    expect(cursor.atLineEnd()).toBe(false);
    expect(cursor.skipLineEnd()).toBe(false);
  });

  it('fail throws a located ParseFailure', () => {
    const cursor = new Cursor('x\nyz', 3);
    expect(() => cursor.fail(ParseErrorKind.UnexpectedToken, 'bad')).toThrow(ParseFailure);
    expect(() => cursor.fail(ParseErrorKind.UnexpectedToken, 'bad')).toThrow(
      'unexpected_token at line 2, column 2: bad',
    );
  });
});

describe('runParser / unwrap', () => {
  it('wraps a returned value', () => {
    expect(runParser(() => 42)).toEqual({ ok: true, value: 42 });
  });

  it('converts a ParseFailure into an error result', () => {
    const result = runParser(() => new Cursor('abc', 1).fail(ParseErrorKind.TrailingInput, 'extra'));
    expect(result).toEqual({
      ok: false,
      error: { kind: ParseErrorKind.TrailingInput, message: 'extra', offset: 1, line: 1, column: 2 },
    });
  });

  it('rethrows anything that is not a ParseFailure', () => {
    expect(() =>
      runParser(() => {
        throw new TypeError('defect');
      }),
    ).toThrow(TypeError);
  });

  it('unwrap returns the value or throws the error', () => {
    expect(unwrap({ ok: true, value: 'v' })).toBe('v');
    expect(() =>
      unwrap({
        ok: false,
        error: { kind: ParseErrorKind.IncompleteRecord, message: 'short', offset: 4, line: 1, column: 5 },
      }),
    ).toThrow('incomplete_record at line 1, column 5: short');
  });
});
