/**
 * Mantle Kernel — Execution Planner
 *
 * Derives the dry-run execution plan from a catalog: one step per node in
 * topological order, each naming the nodes it waits for and the nodes whose
 * change refreshes it. Nothing is applied.
 */

import type { Catalog, NodeId } from '../types/catalog.js';
import type { ExecutionPlan, PlanStep } from '../types/provider.js';

export function buildPlan(catalog: Catalog): ExecutionPlan {
  const after = new Map<NodeId, NodeId[]>();
  const refreshedBy = new Map<NodeId, NodeId[]>();

  for (const edge of catalog.edges) {
    addUnique(after, edge.target, edge.source);
    if (edge.kind === 'notify') {
      addUnique(refreshedBy, edge.target, edge.source);
    }
  }

  const steps: PlanStep[] = catalog.order.map((node) => ({
    node,
    after: after.get(node) ?? [],
    refreshedBy: refreshedBy.get(node) ?? [],
  }));
  return { steps };
}

function addUnique(map: Map<NodeId, NodeId[]>, key: NodeId, value: NodeId): void {
  const list = map.get(key);
  if (list === undefined) {
    map.set(key, [value]);
  } else if (!list.includes(value)) {
    list.push(value);
  }
}
