/**
 * Mantle Kernel — Catalog Hashing
 *
 * The catalog hash is SHA-256 over the canonical JSON of the catalog's nodes
 * and edges. Positions are left out and attribute values are hashed in their
 * printed form, so two manifests that differ only in layout, comments or
 * type-name spelling hash the same.
 *
 * Identical catalogs always produce identical hashes: canonical JSON sorts
 * object keys at every level, and node and edge arrays keep catalog order.
 */

import { createHash } from 'node:crypto';
import { printValue } from '@mantle/manifest-dsl';
import type { CatalogHash, RelationshipEdge, ResourceNode } from '../types/catalog.js';

type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<CanonicalValue>
  | { readonly [key: string]: CanonicalValue };

function isList(value: CanonicalValue): value is ReadonlyArray<CanonicalValue> {
  return Array.isArray(value);
}

/**
 * JSON with object keys sorted at every level. Identical data produces
 * identical text regardless of property insertion order.
 */
export function canonicalize(value: CanonicalValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (isList(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  const pairs = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalize(value[key] ?? null)}`);
  return '{' + pairs.join(',') + '}';
}

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/** SHA-256 of manifest source text, recorded in compile logs. */
export function hashSource(source: string): string {
  return sha256(source);
}

export function hashCatalog(
  nodes: ReadonlyArray<ResourceNode>,
  edges: ReadonlyArray<RelationshipEdge>,
): CatalogHash {
  const content: CanonicalValue = {
    nodes: nodes.map((node) => ({
      type: node.identity.type,
      title: node.identity.title.map((segment) =>
        segment.kind === 'literal' ? ['literal', segment.text] : ['reference', segment.name],
      ),
      attributes: node.attributes.map((a) => [a.name, printValue(a.value)]),
    })),
    edges: edges.map((e) => [e.source, e.target, e.kind]),
  };
  // The brand is applied only here.
  return sha256(canonicalize(content)) as CatalogHash;
}
