/**
 * Mantle Manifest DSL — Error Taxonomy
 *
 * Every compilation failure is one of five ManifestError subclasses. All of
 * them are terminal for the compilation that raised them and all of them
 * carry the source position the diagnostic points at.
 *
 * The kernel re-exports these classes; consumers do not need a direct
 * dependency on this package to match on them.
 */

import type { ResourceIdentity } from './identity.js';
import { formatIdentity } from './printer.js';
import type { SourcePosition } from './types.js';

export type ManifestErrorCode =
  | 'lex'
  | 'parse'
  | 'duplicate-resource'
  | 'unresolved-reference'
  | 'cycle';

export abstract class ManifestError extends Error {
  abstract readonly code: ManifestErrorCode;

  constructor(
    message: string,
    readonly position: SourcePosition,
  ) {
    super(message);
  }
}

/** Malformed token: unterminated string or comment, bad interpolation, stray character. */
export class LexError extends ManifestError {
  readonly code = 'lex';

  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = 'LexError';
  }
}

/** Token sequence that does not form a known statement shape. */
export class ParseError extends ManifestError {
  readonly code = 'parse';

  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = 'ParseError';
  }
}

/** The same (type, title) pair declared twice. */
export class DuplicateResourceError extends ManifestError {
  readonly code = 'duplicate-resource';

  constructor(
    readonly identity: ResourceIdentity,
    position: SourcePosition,
    readonly firstDeclaredAt: SourcePosition,
  ) {
    super(
      `Duplicate declaration of ${formatIdentity(identity)}; ` +
        `first declared at line ${firstDeclaredAt.line}, column ${firstDeclaredAt.column}`,
      position,
    );
    this.name = 'DuplicateResourceError';
  }
}

/** A relationship names a resource that is never declared. */
export class UnresolvedReferenceError extends ManifestError {
  readonly code = 'unresolved-reference';

  constructor(
    readonly identity: ResourceIdentity,
    position: SourcePosition,
  ) {
    super(`Reference to undeclared resource ${formatIdentity(identity)}`, position);
    this.name = 'UnresolvedReferenceError';
  }
}

/**
 * The relationship graph is not acyclic. `cycle` lists one witness cycle in
 * edge order; the edge from the last identity back to the first closes it.
 */
export class CycleError extends ManifestError {
  readonly code = 'cycle';

  constructor(
    readonly cycle: ReadonlyArray<ResourceIdentity>,
    position: SourcePosition,
  ) {
    const path = [...cycle, ...cycle.slice(0, 1)].map(formatIdentity).join(' -> ');
    super(`Dependency cycle: ${path}`, position);
    this.name = 'CycleError';
  }
}

/**
 * Render an error as a one-line diagnostic: `file:line:column code: message`.
 * Without a file name the location starts at the line number.
 */
export function formatDiagnostic(error: ManifestError, file?: string): string {
  const location = `${error.position.line}:${error.position.column}`;
  const prefix = file === undefined ? location : `${file}:${location}`;
  return `${prefix} ${error.code}: ${error.message}`;
}
