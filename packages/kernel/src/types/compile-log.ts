/**
 * Mantle Kernel — Compile Log Types
 *
 * One CompileLog entry is recorded for every check() or compile() call that
 * receives a CompileLogger, whatever the outcome. Field names are snake_case:
 * entries are persisted verbatim as JSONL.
 */

import type { ManifestErrorCode } from '@mantle/manifest-dsl';
import type { CatalogHash } from './catalog.js';

export type CompileOutcome = 'ok' | 'failed';

export interface CompileDiagnostic {
  readonly code: ManifestErrorCode;
  readonly message: string;
  readonly line: number;
  readonly column: number;
}

export interface CompileLog {
  /** ISO 8601, from the injected clock. */
  readonly timestamp: string;
  /** Label of the compiled unit, usually its file path. */
  readonly source_name: string;
  /** SHA-256 of the manifest source text. */
  readonly source_hash: string;
  readonly outcome: CompileOutcome;
  readonly node_count: number;
  readonly edge_count: number;
  /** Null when compilation failed. */
  readonly catalog_hash: CatalogHash | null;
  /** Empty when compilation succeeded. */
  readonly errors: ReadonlyArray<CompileDiagnostic>;
}
