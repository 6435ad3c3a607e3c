/**
 * Mantle Kernel — Provider and Plan Types
 *
 * Providers apply resources to a machine. The kernel only defines their
 * contract: concrete providers live in the runtime host, and none of them
 * run during compilation.
 */

import type { NodeId, ResourceNode } from './catalog.js';

/**
 * Describes (and, in a real applier, performs) the action for one resource.
 */
export interface Provider {
  /** Normalized type names handled by this provider, e.g. `['file']`. */
  readonly types: ReadonlyArray<string>;
  /** One-line description of the action the provider would take. */
  describe(node: ResourceNode): string;
}

/** One entry of an execution plan. */
export interface PlanStep {
  readonly node: NodeId;
  /** Nodes that must be applied before this one (every incoming edge). */
  readonly after: ReadonlyArray<NodeId>;
  /** Nodes whose change refreshes this one (incoming notify edges). */
  readonly refreshedBy: ReadonlyArray<NodeId>;
}

/** Steps in catalog topological order. */
export interface ExecutionPlan {
  readonly steps: ReadonlyArray<PlanStep>;
}
