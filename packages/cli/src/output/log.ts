import type { LogEvent, LogReadResult } from '@mantle/runtime-host'
import { outcomeColor, t } from '../theme.js'

function text(event: LogEvent, key: string): string {
  const value = event[key]
  return typeof value === 'string' ? value : '?'
}

function count(event: LogEvent, key: string): number {
  const value = event[key]
  return typeof value === 'number' ? value : 0
}

function errorCount(event: LogEvent): number {
  const errors = event['errors']
  return Array.isArray(errors) ? errors.length : 0
}

/** The most recent `limit` events, oldest first. */
export function latest(events: ReadonlyArray<LogEvent>, limit: number): ReadonlyArray<LogEvent> {
  return limit <= 0 ? [] : events.slice(-limit)
}

/**
 * renderLogEntry — one line per compilation.
 *
 *   2026-01-01T00:00:00.000Z  ok      site.mf  8 resources  6 edges
 *   2026-01-01T00:00:05.000Z  failed  site.mf  2 errors
 */
export function renderLogEntry(event: LogEvent): string {
  const outcome = text(event, 'outcome')
  const detail = outcome === 'ok'
    ? `${count(event, 'node_count')} resources  ${count(event, 'edge_count')} edges`
    : `${errorCount(event)} errors`
  return (
    t.muted(event.timestamp ?? '?') + '  ' +
    outcomeColor(outcome)(outcome.padEnd(6)) + '  ' +
    t.white(text(event, 'source_name')) + '  ' +
    t.text(detail)
  )
}

/**
 * renderLog — entries plus a warning line for anything readLog() dropped.
 */
export function renderLog(result: LogReadResult, limit: number): string {
  const { stats } = result
  let out = ''
  if (result.events.length === 0) {
    out += t.muted('no compilations logged') + '\n'
  }
  for (const event of latest(result.events, limit)) {
    out += renderLogEntry(event) + '\n'
  }

  const dropped = stats.parseErrors + (stats.partialTrailingLine ? 1 : 0)
  if (dropped > 0) {
    out += t.amber(`warning: skipped ${dropped} malformed log line(s)`) + '\n'
  }
  if (stats.duplicates > 0) {
    out += t.muted(`${stats.duplicates} duplicate event(s) ignored`) + '\n'
  }
  if (stats.outOfOrder) {
    out += t.muted('entries out of time order; shown sorted by timestamp') + '\n'
  }
  return out
}
