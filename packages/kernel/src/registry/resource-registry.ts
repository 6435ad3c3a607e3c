/**
 * Mantle Kernel — Resource Registry
 *
 * Assigns each declared resource a NodeId and detects duplicate identities.
 * One registry is created per compilation and passed explicitly to the
 * resolver; there is no shared registry.
 *
 * Every declaration is registered before any reference is resolved, so a
 * chain may name a resource declared further down the manifest.
 */

import {
  DuplicateResourceError,
  UnresolvedReferenceError,
  identityKey,
  type Attribute,
  type IdentityKey,
  type ResourceIdentity,
  type SourcePosition,
} from '@mantle/manifest-dsl';
import type { NodeId, ResourceNode } from '../types/catalog.js';

export class ResourceRegistry {
  private readonly nodes: ResourceNode[] = [];
  private readonly byKey = new Map<IdentityKey, NodeId>();

  /**
   * Register a resource. NodeIds are assigned in call order, starting at 0.
   *
   * @throws {DuplicateResourceError} If the identity is already declared.
   */
  declare(
    identity: ResourceIdentity,
    attributes: ReadonlyArray<Attribute>,
    position: SourcePosition,
  ): NodeId {
    const key = identityKey(identity);
    const existing = this.byKey.get(key);
    if (existing !== undefined) {
      throw new DuplicateResourceError(identity, position, this.get(existing).position);
    }

    const id = this.nodes.length;
    this.nodes.push({ id, identity, attributes, position });
    this.byKey.set(key, id);
    return id;
  }

  /**
   * @throws {UnresolvedReferenceError} If the identity was never declared.
   *   `position` is the position of the offending reference.
   */
  lookup(identity: ResourceIdentity, position: SourcePosition): NodeId {
    const id = this.find(identity);
    if (id === undefined) {
      throw new UnresolvedReferenceError(identity, position);
    }
    return id;
  }

  find(identity: ResourceIdentity): NodeId | undefined {
    return this.byKey.get(identityKey(identity));
  }

  get(id: NodeId): ResourceNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new RangeError(`Unknown node id ${id}`);
    }
    return node;
  }

  /** All nodes, in declaration order. */
  all(): ReadonlyArray<ResourceNode> {
    return this.nodes;
  }

  get size(): number {
    return this.nodes.length;
  }
}
