/**
 * Mantle Runtime Host — LogReader
 *
 * Reads JSONL log content with dedupe-on-read.
 *
 * Guarantees:
 *   - every valid JSONL event is parsed; malformed lines are dropped and counted
 *   - events are deduplicated by event_id, first occurrence wins
 *   - content not ending in '\n' has its last line dropped and flagged
 *   - more than one timestamp regression in file order flags outOfOrder
 *   - output is sorted by (timestamp asc, event_id asc)
 *   - empty input returns an empty result with zero stats
 *
 * This function has no I/O. Callers obtain raw content via StateIO.readLogRaw().
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One parsed log event. Fields beyond event_id depend on the log file; for
 * compiles.jsonl they are those of a CompileLog.
 */
export interface LogEvent {
  /** 26-character ULID, the deduplication key. */
  readonly event_id: string;
  /** ISO 8601. Used for ordering. */
  readonly timestamp?: string | undefined;
  readonly [key: string]: unknown;
}

/** Counts reflect the raw content, before deduplication and sorting. */
export interface LogReadStats {
  /** Non-empty lines processed. */
  readonly totalLines: number;
  /** Events kept after deduplication. */
  readonly parsedEvents: number;
  /** Events dropped because their event_id was already seen. */
  readonly duplicates: number;
  /** Lines dropped for invalid JSON or a missing event_id. */
  readonly parseErrors: number;
  /** The content did not end with '\n'; its last line was dropped. */
  readonly partialTrailingLine: boolean;
  /** More than one timestamp regression in file order. One is tolerated as clock skew. */
  readonly outOfOrder: boolean;
}

export interface LogReadResult {
  /** Deduplicated, time-sorted events. */
  readonly events: ReadonlyArray<LogEvent>;
  readonly stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function toLogEvent(value: unknown): LogEvent | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  if (!('event_id' in value) || typeof value.event_id !== 'string') {
    return undefined;
  }
  const timestamp = 'timestamp' in value && typeof value.timestamp === 'string' ? value.timestamp : undefined;
  return { ...value, event_id: value.event_id, timestamp };
}

/**
 * Parse, deduplicate and sort JSONL log content.
 */
export function readLog(rawContent: string): LogReadResult {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
        outOfOrder: false,
      },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  // The element after the last '\n' is either empty or an incomplete line.
  const lines = rawLines.slice(0, -1).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const events: LogEvent[] = [];

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const event = toLogEvent(parsed);
    if (event === undefined) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    events.push(event);
  }

  let regressions = 0;
  let previous: string | undefined;
  for (const { timestamp } of events) {
    if (previous !== undefined && timestamp !== undefined && timestamp < previous) {
      regressions++;
    }
    previous = timestamp ?? previous;
  }

  const sorted = [...events].sort((a, b) => {
    const ta = a.timestamp ?? '';
    const tb = b.timestamp ?? '';
    if (ta !== tb) return ta < tb ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return {
    events: sorted,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}
