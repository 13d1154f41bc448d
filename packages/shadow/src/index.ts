/**
 * @sysconfig/shadow
 *
 * Parser, serializer and document operations for shadow password database
 * entries.
 */

// Types
export type { PasswordState, ShadowDocument, ShadowEntry } from './types.js';

// Functions
export { parseShadow, parseShadowEntry } from './parser.js';
export { formatPasswordField, serializeShadow, serializeShadowEntry } from './serializer.js';
export { findEntry, upsertEntry } from './document.js';
