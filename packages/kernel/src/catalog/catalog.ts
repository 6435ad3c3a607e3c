/**
 * Mantle Kernel — Catalog Construction
 */

import type { Catalog, NodeId, RelationshipEdge, ResourceNode } from '../types/catalog.js';
import { hashCatalog } from './hash.js';

/**
 * Assemble, hash and deep-freeze a catalog. Callers guarantee the catalog
 * invariants (closure, acyclicity, unique identities, valid order).
 */
export function createCatalog(
  nodes: ReadonlyArray<ResourceNode>,
  edges: ReadonlyArray<RelationshipEdge>,
  order: ReadonlyArray<NodeId>,
): Catalog {
  return deepFreeze({
    nodes: [...nodes],
    edges: [...edges],
    order: [...order],
    hash: hashCatalog(nodes, edges),
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** The node with the given id. */
export function nodeOf(catalog: Catalog, id: NodeId): ResourceNode {
  const node = catalog.nodes[id];
  if (node === undefined) {
    throw new RangeError(`Catalog has no node ${id}`);
  }
  return node;
}
