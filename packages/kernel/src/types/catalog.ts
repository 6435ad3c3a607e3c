/**
 * Mantle Kernel — Catalog Type Definitions
 *
 * The Catalog is the output of one compilation: every declared resource, the
 * relationship edges between them, and a deterministic application order.
 *
 * Catalog invariants:
 * - Closure: every edge's source and target is a node of the catalog
 * - Acyclicity: the edge set, as a directed graph over nodes, has no cycle
 * - Uniqueness: no two nodes share a ResourceIdentity
 * - `order` is a linear extension of the edge set
 *
 * Catalogs are created once, deep-frozen, and never modified.
 */

import type { Attribute, ResourceIdentity, SourcePosition } from '@mantle/manifest-dsl';

/**
 * A node's index in declaration order. Node `n` is `catalog.nodes[n]`.
 * Used as a tie-break when ordering, never as a correctness dependency.
 */
export type NodeId = number;

declare const __catalogHashBrand: unique symbol;

/**
 * SHA-256 hex digest of the canonical JSON of a catalog's nodes and edges.
 * Source positions are excluded: reformatting a manifest keeps its hash.
 */
export type CatalogHash = string & { readonly [__catalogHashBrand]: 'CatalogHash' };

/**
 * `order` carries only "apply source before target". `notify` also sends a
 * refresh to the target when the source changes; it is an ordering constraint
 * as well.
 */
export type EdgeKind = 'order' | 'notify';

export interface ResourceNode {
  readonly id: NodeId;
  readonly identity: ResourceIdentity;
  /** Insertion order preserved. Relationship metaparameters are not attributes. */
  readonly attributes: ReadonlyArray<Attribute>;
  readonly position: SourcePosition;
}

export interface RelationshipEdge {
  readonly source: NodeId;
  readonly target: NodeId;
  readonly kind: EdgeKind;
  /** The chain operator or metaparameter that produced the edge. */
  readonly position: SourcePosition;
}

export interface Catalog {
  /** Declaration order. */
  readonly nodes: ReadonlyArray<ResourceNode>;
  /** Emission order, de-duplicated on (source, target, kind). */
  readonly edges: ReadonlyArray<RelationshipEdge>;
  /** Topological order; ties broken by ascending NodeId. */
  readonly order: ReadonlyArray<NodeId>;
  readonly hash: CatalogHash;
}
