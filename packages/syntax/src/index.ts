/**
 * @sysconfig/syntax
 *
 * Shared error, position and result infrastructure for the sysconfig parsers.
 */

// Types
export type {
  ParseError,
  ParseResult,
  SourcePosition,
  ValidationError,
  ValidationResult,
} from './types.js';

export { ParseErrorKind, ParseFailure } from './types.js';

// Functions
export { Cursor, locate } from './cursor.js';
export { runParser, unwrap } from './result.js';
