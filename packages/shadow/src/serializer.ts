/**
 * sysconfig Shadow — Serializer
 *
 * Renders entries in the on-disk shadow layout. For canonical input
 * (no leading zeros, `\n` terminators, no trailing newline) serializing a
 * parsed document reproduces the input exactly.
 */

import type { PasswordState, ShadowDocument, ShadowEntry } from './types.js';

export function formatPasswordField(state: PasswordState): string {
  switch (state.kind) {
    case 'locked':
      return '*LK*';
    case 'no_login':
      return 'NL';
    case 'no_password':
      return 'NP';
    case 'hashed':
      return state.hash;
  }
}

const formatAging = (value: number | null): string => (value === null ? '' : String(value));

export function serializeShadowEntry(entry: ShadowEntry): string {
  return [
    entry.username,
    formatPasswordField(entry.password),
    formatAging(entry.lastChange),
    formatAging(entry.minAge),
    formatAging(entry.maxAge),
    formatAging(entry.warnPeriod),
    formatAging(entry.inactivePeriod),
    formatAging(entry.expireDate),
    formatAging(entry.flag),
  ].join(':');
}

/** Entries joined by `\n`, without a trailing newline. */
export function serializeShadow(document: ShadowDocument): string {
  return document.entries.map(serializeShadowEntry).join('\n');
}
