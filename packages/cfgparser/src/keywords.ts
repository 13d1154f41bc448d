/**
 * sysconfig Config Parser — Keyword Registry
 *
 * The installer only acts on command words it knows. A KeywordRegistry holds
 * the known words and the named options each accepts, and checks a parsed
 * document against them. Parsing itself never consults the registry: an
 * unknown keyword is a semantic problem, not a syntax error.
 */

import type { ValidationError, ValidationResult } from '@sysconfig/syntax';
import type { Command, ConfigDocument, Keyword, KeywordDefinition } from './types.js';

const IDENTIFIER = /^[a-z._-]+$/;

/**
 * Build the applier's view of a command.
 *
 * When a named key repeats, the first occurrence wins. Positional arguments
 * keep their order.
 */
export function toKeyword(command: Command): Keyword {
  const options = new Map<string, string>();
  const args: string[] = [];
  for (const arg of command.arguments) {
    if (arg.kind === 'named') {
      if (!options.has(arg.key)) {
        options.set(arg.key, arg.value);
      }
    } else {
      args.push(arg.value);
    }
  }
  return { name: command.word, options, arguments: args };
}

export class KeywordRegistry {
  private readonly definitions: Map<string, KeywordDefinition> = new Map();

  constructor(entries?: Iterable<readonly [string, KeywordDefinition]>) {
    for (const [name, definition] of entries ?? []) {
      this.define(name, definition);
    }
  }

  /**
   * Register a keyword. Returns the definition it replaced, if any.
   */
  define(name: string, definition: KeywordDefinition): KeywordDefinition | undefined {
    const previous = this.definitions.get(name);
    this.definitions.set(name, definition);
    return previous;
  }

  get(name: string): KeywordDefinition | undefined {
    return this.definitions.get(name);
  }

  names(): ReadonlyArray<string> {
    return [...this.definitions.keys()].sort();
  }

  /**
   * Check every command of a parsed document against the registry.
   *
   * All problems are collected. Each names the command's 1-based position
   * in the document as its context.
   */
  validate(document: ConfigDocument): ValidationResult<ReadonlyArray<Keyword>> {
    const errors: ValidationError[] = [];

    document.commands.forEach((command, index) => {
      const context = `command ${index + 1} (${command.word})`;
      const definition = this.definitions.get(command.word);
      if (definition === undefined) {
        errors.push({ message: `Unknown keyword: ${JSON.stringify(command.word)}`, context });
        return;
      }
      const allowed = new Set(definition.options);
      for (const arg of command.arguments) {
        if (arg.kind === 'named' && !allowed.has(arg.key)) {
          errors.push({
            message:
              `Unknown option --${arg.key} for ${command.word}. ` +
              (allowed.size > 0
                ? `Must be one of: ${[...allowed].sort().join(', ')}`
                : 'This keyword takes no options'),
            context,
          });
        }
      }
    });

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true, value: document.commands.map(toKeyword) };
  }
}

/**
 * Validate an unknown JSON value as a keyword table of the form
 * `{ "<word>": { "options": ["<key>", ...] } }`.
 */
export function parseKeywordTable(
  raw: unknown,
): ValidationResult<ReadonlyArray<readonly [string, KeywordDefinition]>> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, errors: [{ message: 'Keyword table must be a JSON object' }] };
  }

  const errors: ValidationError[] = [];
  const entries: Array<readonly [string, KeywordDefinition]> = [];

  for (const [name, value] of Object.entries(raw)) {
    if (!IDENTIFIER.test(name)) {
      errors.push({ message: `Invalid keyword name: ${JSON.stringify(name)}`, context: name });
      continue;
    }
    const options: unknown =
      typeof value === 'object' && value !== null && 'options' in value ? value.options : undefined;
    if (!Array.isArray(options)) {
      errors.push({ message: 'Expected an "options" array', context: name });
      continue;
    }
    const keys: string[] = [];
    for (const option of options) {
      if (typeof option !== 'string' || !IDENTIFIER.test(option)) {
        errors.push({ message: `Invalid option name: ${JSON.stringify(option)}`, context: name });
        continue;
      }
      keys.push(option);
    }
    entries.push([name, { options: keys }]);
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: entries };
}
