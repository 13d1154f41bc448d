/**
 * logging/log-sink.ts — check event log.
 *
 * Every check run produces one CheckEvent. The sink is injected: the CLI
 * uses FileLogSink when a log file is configured and NullLogSink otherwise;
 * tests use MemoryLogSink.
 *
 * FileLogSink appends one JSON object per line (JSONL). The write is
 * synchronous and completes before append() returns.
 */

import { randomUUID } from 'node:crypto';
import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CheckFormat, CheckOutcome } from '../check.js';

export interface CheckEvent {
  readonly timestamp: string;
  readonly format: CheckFormat;
  readonly path: string;
  readonly outcome: CheckOutcome<unknown>['status'];
  /** Commands or entries parsed; null unless the outcome is valid. */
  readonly records: number | null;
  /** ParseErrorKind for syntax errors, 'validation' for keyword problems. */
  readonly errorKind: string | null;
  readonly line: number | null;
  readonly column: number | null;
}

export interface LogSink {
  append(event: CheckEvent): void;
}

export function toCheckEvent(
  format: CheckFormat,
  path: string,
  outcome: CheckOutcome<unknown>,
  timestamp: string,
): CheckEvent {
  const base = { timestamp, format, path, outcome: outcome.status };
  switch (outcome.status) {
    case 'valid':
      return { ...base, records: outcome.records, errorKind: null, line: null, column: null };
    case 'syntax_error':
      return {
        ...base,
        records: null,
        errorKind: outcome.error.kind,
        line: outcome.error.line,
        column: outcome.error.column,
      };
    case 'invalid':
      return { ...base, records: null, errorKind: 'validation', line: null, column: null };
  }
}

/**
 * Appends each check event as a single JSONL line to `logFile`.
 * The parent directory is created on first write.
 */
export class FileLogSink implements LogSink {
  constructor(private readonly logFile: string) {}

  append(event: CheckEvent): void {
    const line = JSON.stringify({
      event_id: randomUUID(),
      timestamp: event.timestamp,
      format: event.format,
      path: event.path,
      outcome: event.outcome,
      records: event.records,
      error_kind: event.errorKind,
      line: event.line,
      column: event.column,
    });
    mkdirSync(dirname(this.logFile), { recursive: true });
    appendFileSync(this.logFile, line + '\n', 'utf-8');
  }
}

/** Keeps events in memory. For tests and embedded use. */
export class MemoryLogSink implements LogSink {
  private readonly events: CheckEvent[] = [];

  append(event: CheckEvent): void {
    this.events.push(event);
  }

  entries(): ReadonlyArray<CheckEvent> {
    return this.events;
  }
}

/** Discards events. Used when no log file is configured. */
export class NullLogSink implements LogSink {
  append(_event: CheckEvent): void {}
}
