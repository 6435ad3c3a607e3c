/**
 * Mantle Runtime Host — StateIO Interface
 *
 * An injectable I/O abstraction for reading and writing JSON state files and
 * appending to JSONL log files under the Mantle home directory.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * The CLI never touches state or log files directly; it goes through a
 * StateIO bound to the resolved home.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Validates a parsed JSON value. Persisted JSON is never trusted blindly.
 */
export type JsonGuard<T> = (value: unknown) => value is T;

/**
 * All file paths are relative filenames; the implementation resolves them.
 *
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory
 * - appendLine and readLogRaw address the `logs/` subdirectory
 * - Files from one StateIO instance cannot be accessed from another
 */
export interface StateIO {
  /**
   * Read and parse a JSON state file.
   *
   * Returns `fallback` if the file does not exist, cannot be parsed, or fails
   * the guard.
   */
  readJson<T>(filename: string, fallback: T, guard: JsonGuard<T>): T;

  /**
   * Serialize a value as JSON and write it, replacing any existing file.
   * Creates the state subdirectory if it does not exist.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append one line (a newline is added) to a log file.
   * Creates the logs subdirectory if it does not exist.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Raw text content of a log file, or an empty string if it does not exist.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO.
 *
 * Reads and writes JSON state at  `<homeDir>/state/<filename>`.
 * Appends log lines to            `<homeDir>/logs/<logfilename>`.
 *
 * Directories are created on demand. I/O is synchronous, matching the CLI's
 * single-process design. ENOENT and SyntaxError are recoverable (fallback);
 * other I/O errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson<T>(filename: string, fallback: T, guard: JsonGuard<T>): T {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
      return guard(parsed) ? parsed : fallback;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    const logPath = join(this.homeDir, 'logs', logfilename);
    try {
      return readFileSync(logPath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. No file system access.
 *
 * Values round-trip through JSON text on write, matching FileStateIO
 * serialization (undefined properties disappear, Dates become strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly store = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson<T>(filename: string, fallback: T, guard: JsonGuard<T>): T {
    const raw = this.store.get(filename);
    if (raw === undefined) {
      return fallback;
    }
    const parsed: unknown = JSON.parse(raw);
    return guard(parsed) ? parsed : fallback;
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value, null, 2));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * All lines appended to a log file. Not part of the StateIO interface;
   * tests use it to inspect log output.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Each FileStateIO append writes 'line\n', so raw content is 'a\nb\n'.
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
