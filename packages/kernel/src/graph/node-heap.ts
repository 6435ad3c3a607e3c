/**
 * Binary min-heap of NodeIds: the ready set of the topological sort.
 */

import type { NodeId } from '../types/catalog.js';

export class NodeHeap {
  private readonly items: NodeId[] = [];

  get size(): number {
    return this.items.length;
  }

  push(id: NodeId): void {
    const items = this.items;
    items.push(id);
    let child = items.length - 1;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      const parentId = items[parent];
      if (parentId === undefined || parentId <= id) break;
      items[child] = parentId;
      child = parent;
    }
    items[child] = id;
  }

  /** The smallest NodeId, or undefined when empty. */
  pop(): NodeId | undefined {
    const items = this.items;
    const smallest = items[0];
    const last = items.pop();
    if (smallest === undefined || last === undefined || items.length === 0) {
      return smallest;
    }

    let parent = 0;
    for (;;) {
      const left = 2 * parent + 1;
      if (left >= items.length) break;
      const right = left + 1;
      const leftId = items[left] ?? last;
      const rightId = items[right];
      const child = rightId !== undefined && rightId < leftId ? right : left;
      const childId = items[child] ?? last;
      if (last <= childId) break;
      items[parent] = childId;
      parent = child;
    }
    items[parent] = last;
    return smallest;
  }
}
