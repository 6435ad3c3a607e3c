import {
  formatIdentity,
  nodeOf,
  type Catalog,
  type ExecutionPlan,
  type NodeId,
  type ResourceNode,
} from '@mantle/kernel'
import { t } from '../theme.js'

/** Anything that can describe a node: a ProviderSet or a single provider. */
export interface Describer {
  describe(node: ResourceNode): string
}

/**
 * renderPlan — the dry-run plan, one numbered step per resource.
 *
 *   1. File['/tmp/one']
 *      Ensure file present: /tmp/one
 *   2. Service['ssh']
 *      Ensure service running: ssh
 *      after File['/tmp/one']
 *      refreshed by File['/tmp/one']
 */
export function renderPlan(catalog: Catalog, plan: ExecutionPlan, providers: Describer): string {
  if (plan.steps.length === 0) {
    return t.muted('nothing to do') + '\n'
  }

  const width = String(plan.steps.length).length
  const indent = ' '.repeat(width + 2)
  const name = (id: NodeId): string => formatIdentity(nodeOf(catalog, id).identity)

  let out = ''
  plan.steps.forEach((step, index) => {
    const node = nodeOf(catalog, step.node)
    out += t.muted(String(index + 1).padStart(width) + '.') + ' ' + t.white(name(step.node)) + '\n'
    out += indent + t.text(providers.describe(node)) + '\n'
    if (step.after.length > 0) {
      out += indent + t.muted('after ') + step.after.map(name).join(', ') + '\n'
    }
    if (step.refreshedBy.length > 0) {
      out += indent + t.amber('refreshed by ') + step.refreshedBy.map(name).join(', ') + '\n'
    }
  })
  return out
}
