/**
 * Shared command context: reading the manifest and opening the Mantle home.
 */

import { readFileSync } from 'node:fs';
import type { Command } from 'commander';
import { CompileLogger, check, type Catalog, type CompileOptions } from '@mantle/kernel';
import { FileLogSink, FileStateIO, resolveMantleHome, type StateIO } from '@mantle/runtime-host';
import { renderDiagnostics } from '../output/diagnostics.js';

export const SAVED_CATALOG_FILE = 'catalog.json';

export interface Manifest {
  readonly source: string;
  /** The path as given on the command line; used in diagnostics and the log. */
  readonly sourceName: string;
}

export interface HomeContext {
  readonly home: string;
  readonly stateIO: StateIO;
  readonly logger: CompileLogger;
}

/**
 * Read a manifest file. A file that cannot be read ends the command with
 * exit code 2.
 */
export function readManifest(command: Command, file: string): Manifest {
  try {
    return { source: readFileSync(file, 'utf-8'), sourceName: file };
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return command.error(`cannot read ${file}: ${reason}`, { exitCode: 2 });
  }
}

/**
 * Resolve the home from the global --home option and bind state and the
 * compile log to it.
 */
export function openHome(command: Command): HomeContext {
  const globals = command.optsWithGlobals<{ home?: string }>();
  const home = resolveMantleHome({ home: globals.home });
  const stateIO = new FileStateIO(home);
  return { home, stateIO, logger: new CompileLogger(new FileLogSink(stateIO)) };
}

/**
 * Compile, or print every diagnostic to stderr and set exit code 1.
 */
export function compileOrReport(manifest: Manifest, options: CompileOptions = {}): Catalog | undefined {
  const result = check(manifest.source, { ...options, sourceName: manifest.sourceName });
  if (result.ok) {
    return result.catalog;
  }
  process.stderr.write(renderDiagnostics(result.errors, manifest.sourceName));
  process.exitCode = 1;
  return undefined;
}
