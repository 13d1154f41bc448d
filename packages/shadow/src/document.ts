/**
 * sysconfig Shadow — Document Operations
 *
 * Documents are immutable: operations return a new document and leave
 * their input untouched.
 */

import type { ShadowDocument, ShadowEntry } from './types.js';

export function findEntry(document: ShadowDocument, username: string): ShadowEntry | undefined {
  return document.entries.find((entry) => entry.username === username);
}

/**
 * Replace the entry with the same username in place, or append the entry
 * when no such user exists.
 */
export function upsertEntry(document: ShadowDocument, entry: ShadowEntry): ShadowDocument {
  const index = document.entries.findIndex((e) => e.username === entry.username);
  if (index === -1) {
    return { entries: [...document.entries, entry] };
  }
  return {
    entries: document.entries.map((e, i) => (i === index ? entry : e)),
  };
}
