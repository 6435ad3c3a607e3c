/**
 * Mantle Kernel — Compiler
 *
 * Runs one compilation: parse, register declarations, resolve relationships,
 * order the graph, and assemble the frozen Catalog.
 *
 * Failure policy:
 * - Lex, parse and duplicate-declaration errors stop compilation at once
 *   (one error)
 * - Unresolved references are collected across the whole manifest and
 *   reported together, one error per occurrence, in source order; the graph
 *   is not built
 * - A cyclic graph is one CycleError naming one witness cycle
 *
 * No partial catalog is ever returned. Each call builds its own registry,
 * resolver and graph builder, so compilations share no state.
 */

import { ManifestError, parse } from '@mantle/manifest-dsl';
import { createCatalog } from '../catalog/catalog.js';
import { GraphBuilder } from '../graph/graph-builder.js';
import type { CompileLogger } from '../logging/compile-logger.js';
import { declareResources } from '../registry/declarations.js';
import { ResourceRegistry } from '../registry/resource-registry.js';
import { RelationshipResolver } from '../resolver/relationship-resolver.js';
import type { Catalog } from '../types/catalog.js';

export interface CompileOptions {
  /** Receives one CompileLog entry for this compilation. */
  readonly logger?: CompileLogger | undefined;
  /** Label recorded in the log entry, usually the manifest's path. */
  readonly sourceName?: string | undefined;
}

export type CheckResult =
  | { readonly ok: true; readonly catalog: Catalog }
  | { readonly ok: false; readonly errors: ReadonlyArray<ManifestError> };

const INLINE_SOURCE = '<inline>';

/**
 * Compile manifest source without throwing on manifest errors.
 */
export function check(source: string, options: CompileOptions = {}): CheckResult {
  const result = run(source);
  options.logger?.recordOutcome(
    options.sourceName ?? INLINE_SOURCE,
    source,
    result.ok ? { catalog: result.catalog } : { errors: result.errors },
  );
  return result;
}

/**
 * Compile manifest source.
 *
 * @throws {ManifestError} The first error of a failed compilation.
 */
export function compile(source: string, options: CompileOptions = {}): Catalog {
  const result = check(source, options);
  if (result.ok) {
    return result.catalog;
  }
  const [first] = result.errors;
  throw first ?? new Error('Compilation failed without a diagnostic');
}

function run(source: string): CheckResult {
  const parsed = parse(source);
  if (!parsed.ok) {
    return { ok: false, errors: parsed.errors };
  }
  const { ast } = parsed;

  return stopOnError(() => {
    const registry = new ResourceRegistry();
    const declarations = declareResources(ast, registry);

    const { edges, unresolved } = new RelationshipResolver(registry, declarations).resolve(ast);
    if (unresolved.length > 0) {
      return { ok: false, errors: unresolved };
    }

    const order = new GraphBuilder(registry.all(), edges).topologicalOrder();
    return { ok: true, catalog: createCatalog(registry.all(), edges, order) };
  });
}

function stopOnError(step: () => CheckResult): CheckResult {
  try {
    return step();
  } catch (err: unknown) {
    if (err instanceof ManifestError) {
      return { ok: false, errors: [err] };
    }
    throw err;
  }
}
