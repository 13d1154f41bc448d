/**
 * @sysconfig/cfgparser
 *
 * Parser, formatter and keyword registry for the sysconfig configuration
 * command language.
 */

// Types
export type { Argument, Command, ConfigDocument, Keyword, KeywordDefinition } from './types.js';

// Functions
export { parseCommand, parseConfig } from './parser.js';
export { formatCommand, formatConfig, quoteString } from './formatter.js';
export { KeywordRegistry, parseKeywordTable, toKeyword } from './keywords.js';
export { createSupportedRegistry, supportedKeywords } from './supported.js';
