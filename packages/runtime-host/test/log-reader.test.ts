/**
 * Mantle Runtime Host — LogReader Tests
 *
 * log-reader/parse: valid JSONL events are parsed, malformed lines counted
 * log-reader/dedupe: duplicate event_ids are dropped, first occurrence wins
 * log-reader/partial: an unterminated last line is dropped and flagged
 * log-reader/order: regression detection and (timestamp, event_id) sorting
 * log-reader/empty: empty input
 *
 * Tests are pure: no I/O, no clock dependency.
 */

import { describe, it, expect } from 'vitest';
import { readLog } from '../src/logging/log-reader.js';

function line(id: string, timestamp?: string, extra?: Record<string, unknown>): string {
  return JSON.stringify({ event_id: id, ...(timestamp !== undefined ? { timestamp } : {}), ...extra });
}

function jsonl(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

const A = '01HX0000000000000000000001';
const B = '01HX0000000000000000000002';
const C = '01HX0000000000000000000003';

// ---------------------------------------------------------------------------
// log-reader/parse
// ---------------------------------------------------------------------------

describe('readLog: parse', () => {
  it('returns one event per valid line and skips blank lines', () => {
    const result = readLog(jsonl(line(A, '2026-01-01T00:00:01.000Z'), line(B, '2026-01-01T00:00:02.000Z'), ''));
    expect(result.stats.totalLines).toBe(2);
    expect(result.stats.parsedEvents).toBe(2);
    expect(result.events.map((e) => e.event_id)).toEqual([A, B]);
  });

  it('keeps compile log fields on the event', () => {
    const result = readLog(jsonl(line(A, '2026-01-01T00:00:01.000Z', { outcome: 'ok', node_count: 3 })));
    expect(result.events[0]).toEqual({
      event_id: A,
      timestamp: '2026-01-01T00:00:01.000Z',
      outcome: 'ok',
      node_count: 3,
    });
  });

  it('counts invalid JSON, non-objects and missing event_ids as parse errors', () => {
    const result = readLog(jsonl(line(A), 'not json', '[1, 2]', JSON.stringify({ outcome: 'ok' })));
    expect(result.stats.parseErrors).toBe(3);
    expect(result.events).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// log-reader/dedupe
// ---------------------------------------------------------------------------

describe('readLog: dedupe', () => {
  it('keeps the first occurrence of an event_id', () => {
    const result = readLog(
      jsonl(
        line(A, '2026-01-01T00:00:01.000Z', { source_name: 'first.mf' }),
        line(A, '2026-01-01T00:00:02.000Z', { source_name: 'second.mf' }),
        line(A),
      ),
    );
    expect(result.stats.duplicates).toBe(2);
    expect(result.stats.parsedEvents).toBe(1);
    expect(result.events[0]?.['source_name']).toBe('first.mf');
  });
});

// ---------------------------------------------------------------------------
// log-reader/partial
// ---------------------------------------------------------------------------

describe('readLog: partial trailing line', () => {
  it('drops and flags a last line without a newline', () => {
    const raw = jsonl(line(A), line(B)) + '{"event_id":"' + C + '","outc';
    const result = readLog(raw);
    expect(result.stats.partialTrailingLine).toBe(true);
    expect(result.events.map((e) => e.event_id)).toEqual([A, B]);
  });

  it('does not flag newline-terminated content', () => {
    expect(readLog(jsonl(line(A))).stats.partialTrailingLine).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// log-reader/order
// ---------------------------------------------------------------------------

describe('readLog: order', () => {
  it('tolerates a single timestamp regression', () => {
    const result = readLog(
      jsonl(
        line(A, '2026-01-01T00:00:03.000Z'),
        line(B, '2026-01-01T00:00:04.000Z'),
        line(C, '2026-01-01T00:00:02.000Z'),
      ),
    );
    expect(result.stats.outOfOrder).toBe(false);
  });

  it('flags more than one regression', () => {
    const result = readLog(
      jsonl(
        line(A, '2026-01-01T00:00:05.000Z'),
        line(B, '2026-01-01T00:00:03.000Z'),
        line(C, '2026-01-01T00:00:01.000Z'),
      ),
    );
    expect(result.stats.outOfOrder).toBe(true);
  });

  it('sorts by timestamp, then event_id', () => {
    const result = readLog(
      jsonl(
        line(C, '2026-01-01T00:00:01.000Z'),
        line(B, '2026-01-01T00:00:03.000Z'),
        line(A, '2026-01-01T00:00:01.000Z'),
      ),
    );
    expect(result.events.map((e) => e.event_id)).toEqual([A, C, B]);
  });
});

// ---------------------------------------------------------------------------
// log-reader/empty
// ---------------------------------------------------------------------------

describe('readLog: empty input', () => {
  it('returns no events and zero stats', () => {
    expect(readLog('')).toEqual({
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    });
  });
});
