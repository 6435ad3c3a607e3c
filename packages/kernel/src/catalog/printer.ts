/**
 * Mantle Kernel — Catalog Printer
 *
 * Renders a catalog back into canonical manifest text: every declaration in
 * declaration order, then one chain statement per edge in emission order.
 * Compiling the printed text yields the same nodes, edges and catalog hash.
 */

import { formatIdentity, printDeclaration } from '@mantle/manifest-dsl';
import type { Catalog, RelationshipEdge } from '../types/catalog.js';
import { nodeOf } from './catalog.js';

export function printCatalog(catalog: Catalog): string {
  const blocks = catalog.nodes.map((node) => printDeclaration(node.identity, node.attributes));
  if (catalog.edges.length > 0) {
    blocks.push(catalog.edges.map((edge) => printEdge(catalog, edge)).join('\n'));
  }
  return blocks.length === 0 ? '' : blocks.join('\n\n') + '\n';
}

/** `File['/tmp/one'] ~> Service['ssh']` */
export function printEdge(catalog: Catalog, edge: RelationshipEdge): string {
  const operator = edge.kind === 'notify' ? '~>' : '->';
  const source = formatIdentity(nodeOf(catalog, edge.source).identity);
  const target = formatIdentity(nodeOf(catalog, edge.target).identity);
  return `${source} ${operator} ${target}`;
}
