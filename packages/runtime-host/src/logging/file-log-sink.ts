/**
 * Mantle Runtime Host — File-backed Compile Log Sink
 *
 * Implements the LogSink interface from @mantle/kernel by appending one JSON
 * line per compilation to `logs/compiles.jsonl`.
 *
 * The kernel owns the LogSink interface and the CompileLogger class. This is
 * the only place that writes compile log entries to disk.
 *
 * Each line carries a fresh ULID `event_id` so that logs merged from several
 * machines can be deduplicated on read (see readLog()).
 */

import type { CompileLog, LogSink } from '@mantle/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const COMPILE_LOG_FILE = 'compiles.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = ulid,
  ) {}

  append(entry: CompileLog): void {
    this.stateIO.appendLine(COMPILE_LOG_FILE, JSON.stringify({ event_id: this.nextId(), ...entry }));
  }
}
