/**
 * sysconfig Config Parser — Type Definitions
 *
 * Structures produced from the configuration command language. Every
 * structure is produced fresh by a parse call and owned by the caller.
 */

// ---------------------------------------------------------------------------
// Parsed Commands
// ---------------------------------------------------------------------------

/**
 * One argument of a command, in source order.
 *
 * - `named`: `--key="value"`; the value is escape-decoded.
 * - `positional`: a bare quoteless token or a decoded quoted string.
 */
export type Argument =
  | { readonly kind: 'named'; readonly key: string; readonly value: string }
  | { readonly kind: 'positional'; readonly value: string };

/**
 * One line of the configuration language.
 *
 * Arguments are passed through verbatim: a key given twice appears twice,
 * in order. Interpreting duplicates is the applier's decision.
 */
export interface Command {
  /** Lowercase identifier (letters, `.`, `-`, `_`). */
  readonly word: string;
  readonly arguments: ReadonlyArray<Argument>;
}

/**
 * A parsed configuration file. Never empty.
 */
export interface ConfigDocument {
  readonly commands: ReadonlyArray<Command>;
}

// ---------------------------------------------------------------------------
// Keywords
// ---------------------------------------------------------------------------

/**
 * The named options a keyword accepts.
 */
export interface KeywordDefinition {
  readonly options: ReadonlyArray<string>;
}

/**
 * The applier's view of a command: named arguments folded into a map,
 * positional arguments in order.
 */
export interface Keyword {
  readonly name: string;
  readonly options: ReadonlyMap<string, string>;
  readonly arguments: ReadonlyArray<string>;
}
