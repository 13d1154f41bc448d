/**
 * sysconfig Config Parser — Supported Keywords
 *
 * The keyword table the installer ships with, kept as data in
 * `data/supported-keywords.json`.
 */

import { readFileSync } from 'node:fs';
import { KeywordRegistry, parseKeywordTable } from './keywords.js';
import type { KeywordDefinition } from './types.js';

const TABLE_URL = new URL('../data/supported-keywords.json', import.meta.url);

/**
 * Load the built-in keyword table.
 *
 * @throws {Error} If the bundled table is missing or malformed
 */
export function supportedKeywords(): ReadonlyArray<readonly [string, KeywordDefinition]> {
  const raw: unknown = JSON.parse(readFileSync(TABLE_URL, 'utf-8'));
  const table = parseKeywordTable(raw);
  if (!table.ok) {
    const detail = table.errors.map((e) => `${e.context ?? ''}: ${e.message}`).join('; ');
    throw new Error(`Built-in keyword table is invalid: ${detail}`);
  }
  return table.value;
}

export function createSupportedRegistry(): KeywordRegistry {
  return new KeywordRegistry(supportedKeywords());
}
