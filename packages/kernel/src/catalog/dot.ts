/**
 * Mantle Kernel — Graphviz Export
 *
 * Nodes are emitted in topological order. Notify edges are dashed and
 * labelled `~>`.
 *
 * @example
 * digraph catalog {
 *   n0 [label="File['/tmp/one']"];
 *   n1 [label="Service['ssh']"];
 *   n0 -> n1 [style=dashed, label="~>"];
 * }
 */

import { formatIdentity } from '@mantle/manifest-dsl';
import type { Catalog } from '../types/catalog.js';
import { nodeOf } from './catalog.js';

function quote(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function toDot(catalog: Catalog): string {
  const lines = ['digraph catalog {'];
  for (const id of catalog.order) {
    lines.push(`  n${id} [label=${quote(formatIdentity(nodeOf(catalog, id).identity))}];`);
  }
  for (const edge of catalog.edges) {
    const attributes = edge.kind === 'notify' ? ' [style=dashed, label="~>"]' : '';
    lines.push(`  n${edge.source} -> n${edge.target}${attributes};`);
  }
  lines.push('}');
  return lines.join('\n') + '\n';
}
