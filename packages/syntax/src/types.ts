/**
 * sysconfig Syntax — Core Type Definitions
 *
 * Error and result types shared by the configuration command parser and the
 * shadow entry parser. This package is the base layer: both parser packages
 * depend on it, and it has no internal dependencies of its own.
 */

// ---------------------------------------------------------------------------
// Error Kinds
// ---------------------------------------------------------------------------

/**
 * The closed set of syntax error kinds reported by the parsers.
 *
 * Kinds are stable identifiers: callers may switch on them, and the CLI
 * prints them verbatim in diagnostics.
 */
export enum ParseErrorKind {
  /** Input does not match any expected alternative at the current position. */
  UnexpectedToken = 'unexpected_token',
  /** A quoted string was opened but never closed. */
  UnterminatedString = 'unterminated_string',
  /** An escape sequence inside a quoted string is not recognized. */
  InvalidEscape = 'invalid_escape',
  /** A non-empty shadow aging field is not all decimal digits. */
  InvalidNumericField = 'invalid_numeric_field',
  /** A shadow password slot matches none of the recognized forms. */
  InvalidPasswordField = 'invalid_password_field',
  /** A shadow line has fewer than nine colon-delimited slots. */
  IncompleteRecord = 'incomplete_record',
  /** Input remains after a complete record or command. */
  TrailingInput = 'trailing_input',
}

// ---------------------------------------------------------------------------
// Positions and Errors
// ---------------------------------------------------------------------------

/**
 * A location in parser input.
 *
 * `offset` is the UTF-16 code unit index into the whole input handed to the
 * parse call. `line` and `column` are 1-based and derived from `offset`.
 */
export interface SourcePosition {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

/**
 * A syntax error with the position at which parsing could not proceed.
 */
export interface ParseError extends SourcePosition {
  readonly kind: ParseErrorKind;
  readonly message: string;
}

/**
 * Result of a parse call. Parsing is all-or-nothing: a failure never
 * carries a partial value.
 */
export type ParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ParseError };

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * A semantic validation problem, reported after a successful parse.
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/**
 * Thrown inside the recursive descent parsers to abort at the first error.
 *
 * Public parse entry points catch it and return `{ ok: false, error }`.
 * `unwrap()` rethrows it for callers that prefer exceptions.
 */
export class ParseFailure extends Error {
  readonly error: ParseError;

  constructor(error: ParseError) {
    super(`${error.kind} at line ${error.line}, column ${error.column}: ${error.message}`);
    this.name = 'ParseFailure';
    this.error = error;
  }
}
