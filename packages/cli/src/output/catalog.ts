import { formatIdentity, printValue, type Catalog } from '@mantle/kernel'
import { t } from '../theme.js'

/**
 * JSON form of a catalog, as printed by `mantle compile --json` and saved to
 * `state/catalog.json`. Identities and values use manifest syntax.
 */
export interface CatalogJson {
  readonly hash: string
  readonly nodes: ReadonlyArray<{
    readonly id: number
    readonly resource: string
    readonly attributes: ReadonlyArray<{ readonly name: string; readonly value: string }>
    readonly line: number
    readonly column: number
  }>
  readonly edges: ReadonlyArray<{ readonly source: number; readonly target: number; readonly kind: string }>
  readonly order: ReadonlyArray<number>
}

export function catalogToJson(catalog: Catalog): CatalogJson {
  return {
    hash: catalog.hash,
    nodes: catalog.nodes.map((node) => ({
      id: node.id,
      resource: formatIdentity(node.identity),
      attributes: node.attributes.map((a) => ({ name: a.name, value: printValue(a.value) })),
      line: node.position.line,
      column: node.position.column,
    })),
    edges: catalog.edges.map((e) => ({ source: e.source, target: e.target, kind: e.kind })),
    order: catalog.order,
  }
}

export function isCatalogJson(value: unknown): value is CatalogJson {
  return (
    typeof value === 'object' &&
    value !== null &&
    'hash' in value &&
    typeof value.hash === 'string' &&
    'nodes' in value &&
    Array.isArray(value.nodes) &&
    'edges' in value &&
    Array.isArray(value.edges)
  )
}

/**
 * renderCompileSummary — one status line plus the catalog hash.
 *
 *   ✓ site.mf  8 resources  6 edges
 *     hash 3f2a...
 */
export function renderCompileSummary(catalog: Catalog, sourceName: string): string {
  const resources = catalog.nodes.length === 1 ? 'resource' : 'resources'
  const edges = catalog.edges.length === 1 ? 'edge' : 'edges'
  return (
    t.green('✓') + ' ' + t.white(sourceName) + '  ' +
    t.text(`${catalog.nodes.length} ${resources}  ${catalog.edges.length} ${edges}`) + '\n' +
    '  ' + t.muted('hash ') + t.blueDim(catalog.hash) + '\n'
  )
}

/**
 * renderSaveNote — compare the saved catalog with the previous save.
 */
export function renderSaveNote(previous: CatalogJson | null, current: Catalog): string {
  if (previous === null) {
    return t.muted('saved catalog.json') + '\n'
  }
  if (previous.hash === current.hash) {
    return t.muted('saved catalog.json (unchanged)') + '\n'
  }
  return t.amber('saved catalog.json (changed from ' + previous.hash.slice(0, 12) + ')') + '\n'
}
