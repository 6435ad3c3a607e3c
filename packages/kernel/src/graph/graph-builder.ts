/**
 * Mantle Kernel — Graph Builder
 *
 * Orders catalog nodes topologically and rejects cyclic edge sets.
 *
 * Ordering uses Kahn's algorithm. The ready set is a min-heap on NodeId, so
 * among nodes with no relationship between them the one declared first is
 * applied first. The same source therefore always yields the same order.
 *
 * When Kahn's algorithm stalls, the nodes left over contain at least one
 * cycle. A depth-first search over that remainder extracts one witness cycle
 * for the CycleError.
 */

import { CycleError, type SourcePosition } from '@mantle/manifest-dsl';
import type { NodeId, RelationshipEdge, ResourceNode } from '../types/catalog.js';
import { NodeHeap } from './node-heap.js';

interface Successor {
  readonly target: NodeId;
  readonly position: SourcePosition;
}

export class GraphBuilder {
  private readonly successors: Successor[][];
  private readonly inDegree: number[];

  constructor(
    private readonly nodes: ReadonlyArray<ResourceNode>,
    edges: ReadonlyArray<RelationshipEdge>,
  ) {
    this.successors = nodes.map(() => []);
    this.inDegree = nodes.map(() => 0);
    for (const edge of edges) {
      this.successorsOf(edge.source).push({ target: edge.target, position: edge.position });
      this.inDegree[edge.target] = (this.inDegree[edge.target] ?? 0) + 1;
    }
  }

  /**
   * Compute the topological order of all nodes.
   *
   * @throws {CycleError} Naming one witness cycle when the edges are cyclic.
   */
  topologicalOrder(): ReadonlyArray<NodeId> {
    const remaining = [...this.inDegree];
    const ready = new NodeHeap();
    remaining.forEach((degree, id) => {
      if (degree === 0) ready.push(id);
    });

    const order: NodeId[] = [];
    for (let id = ready.pop(); id !== undefined; id = ready.pop()) {
      order.push(id);
      for (const { target } of this.successorsOf(id)) {
        const degree = (remaining[target] ?? 0) - 1;
        remaining[target] = degree;
        if (degree === 0) ready.push(target);
      }
    }

    if (order.length < this.nodes.length) {
      const placed = new Set(order);
      throw this.cycleError(this.nodes.map((n) => n.id).filter((id) => !placed.has(id)));
    }
    return order;
  }

  /**
   * Find one cycle among `candidates` by iterative depth-first search,
   * starting from the lowest NodeId. The cycle starts at the node the search
   * re-entered and follows edge direction.
   */
  private cycleError(candidates: ReadonlyArray<NodeId>): CycleError {
    const inScope = new Set(candidates);
    const state = new Map<NodeId, 'active' | 'done'>();

    for (const start of candidates) {
      if (state.has(start)) continue;

      const path: NodeId[] = [start];
      const cursors: number[] = [0];
      state.set(start, 'active');

      while (path.length > 0) {
        const top = path.length - 1;
        const node = path[top];
        const cursor = cursors[top];
        if (node === undefined || cursor === undefined) break;

        const next = this.successorsOf(node)[cursor];
        if (next === undefined) {
          state.set(node, 'done');
          path.pop();
          cursors.pop();
          continue;
        }
        cursors[top] = cursor + 1;
        if (!inScope.has(next.target)) continue;

        const seen = state.get(next.target);
        if (seen === 'active') {
          const cycle = path.slice(path.indexOf(next.target));
          return new CycleError(
            cycle.map((id) => this.node(id).identity),
            next.position,
          );
        }
        if (seen === undefined) {
          state.set(next.target, 'active');
          path.push(next.target);
          cursors.push(0);
        }
      }
    }

    throw new Error('Topological sort stalled without a cycle');
  }

  private successorsOf(id: NodeId): Successor[] {
    const list = this.successors[id];
    if (list === undefined) {
      throw new RangeError(`Edge endpoint ${id} is not a catalog node`);
    }
    return list;
  }

  private node(id: NodeId): ResourceNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new RangeError(`Unknown node id ${id}`);
    }
    return node;
  }
}
