/**
 * sysconfig Syntax — Cursor
 *
 * A forward-only reader over parser input with backtracking marks and
 * position reporting. Both grammars are driven by one Cursor per parse call,
 * so every reported offset is absolute within the caller's input.
 */

import { ParseFailure, type ParseErrorKind, type SourcePosition } from './types.js';

/**
 * Convert an offset into a 1-based line and column.
 *
 * Lines are split on `\n`; a `\r` preceding it counts as the last column of
 * its line. Offsets past the end are clamped to the end of input.
 */
export function locate(source: string, offset: number): SourcePosition {
  const end = Math.min(Math.max(offset, 0), source.length);
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < end; i++) {
    if (source.charCodeAt(i) === 0x0a) {
      line++;
      lineStart = i + 1;
    }
  }
  return { offset: end, line, column: end - lineStart + 1 };
}

export class Cursor {
  private pos: number;

  constructor(
    readonly source: string,
    start = 0,
  ) {
    this.pos = start;
  }

  get offset(): number {
    return this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  /** Character at `pos + ahead`, or `''` past the end of input. */
  peek(ahead = 0): string {
    return this.source.charAt(this.pos + ahead);
  }

  advance(count = 1): void {
    this.pos = Math.min(this.pos + count, this.source.length);
  }

  /** Move back to an offset previously read from `offset`. */
  reset(offset: number): void {
    this.pos = offset;
  }

  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.pos);
  }

  /** Consume `text` if the input continues with it. */
  consume(text: string): boolean {
    if (!this.startsWith(text)) {
      return false;
    }
    this.pos += text.length;
    return true;
  }

  takeWhile(predicate: (ch: string) => boolean): string {
    const start = this.pos;
    while (!this.atEnd() && predicate(this.peek())) {
      this.pos++;
    }
    return this.source.slice(start, this.pos);
  }

  /** True at end of input or before a `\n` / `\r\n` terminator. */
  atLineEnd(): boolean {
    return this.atEnd() || this.peek() === '\n' || this.startsWith('\r\n');
  }

  /** Consume one line terminator. Returns false when none is present. */
  skipLineEnd(): boolean {
    return this.consume('\n') || this.consume('\r\n');
  }

  position(offset = this.pos): SourcePosition {
    return locate(this.source, offset);
  }

  /** Abort the parse with a located error. */
  fail(kind: ParseErrorKind, message: string, offset = this.pos): never {
    throw new ParseFailure({ kind, message, ...this.position(offset) });
  }
}
