/**
 * sysconfig Syntax — Result helpers
 */

import { ParseFailure, type ParseResult } from './types.js';

/**
 * Run a throwing parser body and fold its outcome into a ParseResult.
 *
 * Only ParseFailure is converted; any other exception is a defect in the
 * parser and propagates unchanged.
 */
export function runParser<T>(body: () => T): ParseResult<T> {
  try {
    return { ok: true, value: body() };
  } catch (err: unknown) {
    if (err instanceof ParseFailure) {
      return { ok: false, error: err.error };
    }
    throw err;
  }
}

/**
 * Return the parsed value, or throw the error as a ParseFailure.
 */
export function unwrap<T>(result: ParseResult<T>): T {
  if (!result.ok) {
    throw new ParseFailure(result.error);
  }
  return result.value;
}
