/**
 * Mantle Runtime Host — StateIO Tests
 *
 * state-io/json: readJson fallback and guard handling, writeJson round trip
 * state-io/logs: readLogRaw contract for both implementations
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO, type StateIO } from '../src/state/state-io.js';

interface Saved {
  readonly hash: string;
}

function isSaved(value: unknown): value is Saved {
  return typeof value === 'object' && value !== null && 'hash' in value && typeof value.hash === 'string';
}

const NONE: Saved = { hash: 'none' };

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'mantle-state-'));
}

const implementations: ReadonlyArray<[string, () => StateIO]> = [
  ['MemoryStateIO', () => new MemoryStateIO()],
  ['FileStateIO', () => new FileStateIO(tempHome())],
];

// ---------------------------------------------------------------------------
// state-io/json
// ---------------------------------------------------------------------------

describe.each(implementations)('%s: JSON state', (_name, make) => {
  it('returns the fallback for a file never written', () => {
    expect(make().readJson('catalog.json', NONE, isSaved)).toBe(NONE);
  });

  it('round-trips a written value', () => {
    const stateIO = make();
    stateIO.writeJson('catalog.json', { hash: 'abc', extra: [1, 2] });
    expect(stateIO.readJson('catalog.json', NONE, isSaved)).toEqual({ hash: 'abc', extra: [1, 2] });
  });

  it('returns the fallback when the guard rejects the stored value', () => {
    const stateIO = make();
    stateIO.writeJson('catalog.json', { hash: 42 });
    expect(stateIO.readJson('catalog.json', NONE, isSaved)).toBe(NONE);
  });

  it('keeps log files separate from state files', () => {
    const stateIO = make();
    stateIO.writeJson('compiles.jsonl', { hash: 'state' });
    expect(stateIO.readLogRaw('compiles.jsonl')).toBe('');
  });
});

describe('FileStateIO: on disk', () => {
  it('writes pretty-printed JSON under state/', () => {
    const home = tempHome();
    new FileStateIO(home).writeJson('catalog.json', { hash: 'abc' });
    expect(readFileSync(join(home, 'state', 'catalog.json'), 'utf-8')).toBe('{\n  "hash": "abc"\n}');
  });

  it('returns the fallback for unparseable JSON', () => {
    const home = tempHome();
    mkdirSync(join(home, 'state'));
    writeFileSync(join(home, 'state', 'catalog.json'), '{ broken', 'utf-8');
    expect(new FileStateIO(home).readJson('catalog.json', NONE, isSaved)).toBe(NONE);
  });
});

// ---------------------------------------------------------------------------
// state-io/logs
// ---------------------------------------------------------------------------

describe.each(implementations)('%s: log lines', (_name, make) => {
  it('returns an empty string for a log never written', () => {
    const stateIO = make();
    stateIO.appendLine('other.jsonl', '{"event_id":"X"}');
    expect(stateIO.readLogRaw('compiles.jsonl')).toBe('');
  });

  it('returns appended lines, each newline-terminated', () => {
    const stateIO = make();
    stateIO.appendLine('compiles.jsonl', '{"event_id":"A"}');
    stateIO.appendLine('compiles.jsonl', '{"event_id":"B"}');
    expect(stateIO.readLogRaw('compiles.jsonl')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
  });
});

describe('FileStateIO: log files', () => {
  it('returns an existing file verbatim', () => {
    const home = tempHome();
    mkdirSync(join(home, 'logs'));
    writeFileSync(join(home, 'logs', 'compiles.jsonl'), '{"event_id":"A"}\npartial', 'utf-8');
    expect(new FileStateIO(home).readLogRaw('compiles.jsonl')).toBe('{"event_id":"A"}\npartial');
  });
});
