/**
 * @mantle/kernel
 *
 * Mantle compiler kernel: resource registry, relationship resolver, graph
 * builder, catalog construction and hashing, catalog printer, Graphviz
 * export, execution planner, and the compile log contract.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for hashing (pure computation, not I/O).
 *
 * Log persistence and providers live in @mantle/runtime-host.
 */

// Types
export type { Catalog, CatalogHash, EdgeKind, NodeId, RelationshipEdge, ResourceNode } from './types/catalog.js';
export type { ExecutionPlan, PlanStep, Provider } from './types/provider.js';
export type { CompileDiagnostic, CompileLog, CompileOutcome } from './types/compile-log.js';

// Compilation
export { check, compile } from './compiler/compile.js';
export type { CheckResult, CompileOptions } from './compiler/compile.js';
export { ResourceRegistry } from './registry/resource-registry.js';
export { collectDeclarations, declareResources } from './registry/declarations.js';
export type { DeclarationTable, DeclaredBody, Metaparameter, MetaparameterName } from './registry/declarations.js';
export { RelationshipResolver } from './resolver/relationship-resolver.js';
export type { ResolvedRelationships } from './resolver/relationship-resolver.js';
export { GraphBuilder } from './graph/graph-builder.js';

// Catalog consumers
export { createCatalog, nodeOf } from './catalog/catalog.js';
export { canonicalize, hashCatalog, hashSource } from './catalog/hash.js';
export { printCatalog, printEdge } from './catalog/printer.js';
export { toDot } from './catalog/dot.js';
export { buildPlan } from './plan/planner.js';

// Log sink interface (implementation lives in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export { CompileLogger } from './logging/compile-logger.js';
export type { Clock } from './logging/compile-logger.js';

// Re-export the language surface so consumers of @mantle/kernel do not need
// a direct dependency on manifest-dsl.
export {
  ChainOperator,
  CycleError,
  DuplicateResourceError,
  LexError,
  ManifestError,
  ParseError,
  UnresolvedReferenceError,
  formatDiagnostic,
  formatIdentity,
  identityKey,
  literal,
  literalText,
  makeIdentity,
  normalizeTypeName,
  parse,
  printString,
  printValue,
  sameIdentity,
} from '@mantle/manifest-dsl';
export type {
  Attribute,
  AttributeValue,
  IdentityKey,
  ManifestAST,
  ManifestErrorCode,
  ManifestString,
  ResourceIdentity,
  SourcePosition,
} from '@mantle/manifest-dsl';
