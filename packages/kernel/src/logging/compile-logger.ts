/**
 * Mantle Kernel — Compile Logger
 *
 * Builds and records one CompileLog entry per compilation. The entry is
 * recorded for failed compilations as well as successful ones.
 *
 * If no sink is injected (tests, embedded use) record() is a no-op.
 */

import type { ManifestError } from '@mantle/manifest-dsl';
import type { Catalog } from '../types/catalog.js';
import type { CompileLog } from '../types/compile-log.js';
import { hashSource } from '../catalog/hash.js';
import type { LogSink } from './log-sink.js';

export type Clock = () => string;

const systemClock: Clock = () => new Date().toISOString();

export class CompileLogger {
  constructor(
    private readonly sink?: LogSink | undefined,
    private readonly clock: Clock = systemClock,
  ) {}

  record(entry: CompileLog): void {
    this.sink?.append(entry);
  }

  /**
   * Build the entry for one compilation outcome and record it.
   */
  recordOutcome(
    sourceName: string,
    source: string,
    outcome: { readonly catalog: Catalog } | { readonly errors: ReadonlyArray<ManifestError> },
  ): CompileLog {
    const base = {
      timestamp: this.clock(),
      source_name: sourceName,
      source_hash: hashSource(source),
    };
    const entry: CompileLog =
      'catalog' in outcome
        ? {
            ...base,
            outcome: 'ok',
            node_count: outcome.catalog.nodes.length,
            edge_count: outcome.catalog.edges.length,
            catalog_hash: outcome.catalog.hash,
            errors: [],
          }
        : {
            ...base,
            outcome: 'failed',
            node_count: 0,
            edge_count: 0,
            catalog_hash: null,
            errors: outcome.errors.map((error) => ({
              code: error.code,
              message: error.message,
              line: error.position.line,
              column: error.position.column,
            })),
          };
    this.record(entry);
    return entry;
  }
}
