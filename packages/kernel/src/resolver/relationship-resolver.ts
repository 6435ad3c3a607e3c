/**
 * Mantle Kernel — Relationship Resolver
 *
 * Turns relationship chains and relationship metaparameters into edges
 * between registered nodes.
 *
 * Chains are read pairwise, left to right. For `A op B`:
 *
 *   ->   A before B            order,  A → B
 *   ~>   A before B, refresh   notify, A → B
 *   <-   B before A            order,  B → A
 *   <~   B before A, refresh   notify, B → A
 *
 * Array operands expand to the cross product of the two adjacent operands.
 * An operand only takes part in the edges of the operators beside it.
 *
 * Unresolved references do not stop resolution: every one is collected, in
 * source order, so a manifest can be fixed in one pass.
 */

import {
  ChainOperator,
  UnresolvedReferenceError,
  makeIdentity,
  type ChainOperand,
  type ManifestAST,
  type RelationshipChain,
  type ResourceDeclaration,
  type ResourceReference,
  type SourcePosition,
} from '@mantle/manifest-dsl';
import type { DeclarationTable, DeclaredBody, Metaparameter } from '../registry/declarations.js';
import type { ResourceRegistry } from '../registry/resource-registry.js';
import type { EdgeKind, NodeId, RelationshipEdge } from '../types/catalog.js';

export interface ResolvedRelationships {
  /** Emission order, de-duplicated on (source, target, kind). */
  readonly edges: ReadonlyArray<RelationshipEdge>;
  /** One error per unresolved reference occurrence, in source order. */
  readonly unresolved: ReadonlyArray<UnresolvedReferenceError>;
}

interface Direction {
  readonly kind: EdgeKind;
  /** True when the right operand is the edge source. */
  readonly reversed: boolean;
}

const OPERATOR_DIRECTIONS: Readonly<Record<ChainOperator, Direction>> = {
  [ChainOperator.Before]: { kind: 'order', reversed: false },
  [ChainOperator.Notify]: { kind: 'notify', reversed: false },
  [ChainOperator.Require]: { kind: 'order', reversed: true },
  [ChainOperator.Subscribe]: { kind: 'notify', reversed: true },
};

/** Metaparameters relate the declaring resource (left) to the referenced ones (right). */
const METAPARAMETER_DIRECTIONS: Readonly<Record<Metaparameter['name'], Direction>> = {
  before: { kind: 'order', reversed: false },
  notify: { kind: 'notify', reversed: false },
  require: { kind: 'order', reversed: true },
  subscribe: { kind: 'notify', reversed: true },
};

export class RelationshipResolver {
  private readonly edges: RelationshipEdge[] = [];
  private readonly edgeKeys = new Set<string>();
  private readonly unresolved: UnresolvedReferenceError[] = [];

  constructor(
    private readonly registry: ResourceRegistry,
    private readonly declarations: DeclarationTable,
  ) {}

  /**
   * Resolve every relationship in the manifest. Call once per resolver.
   */
  resolve(ast: ManifestAST): ResolvedRelationships {
    for (const statement of ast.statements) {
      if (statement.kind === 'resource') {
        this.resolveMetaparameters(statement);
      } else {
        this.resolveChain(statement);
      }
    }
    return { edges: this.edges, unresolved: this.unresolved };
  }

  // ── Chains ──────────────────────────────────────────────────────────────

  private resolveChain(chain: RelationshipChain): void {
    let left = this.resolveOperand(chain.head);
    for (const link of chain.links) {
      const right = this.resolveOperand(link.operand);
      this.connect(left, right, OPERATOR_DIRECTIONS[link.operator], link.position);
      left = right;
    }
  }

  /**
   * The nodes an operand stands for. Unresolved references are recorded and
   * left out, so the surrounding edges that can be resolved still are.
   */
  private resolveOperand(operand: ChainOperand): ReadonlyArray<NodeId> {
    switch (operand.kind) {
      case 'reference':
        return this.resolveReference(operand.reference);
      case 'array':
        return operand.references.flatMap((reference) => this.resolveReference(reference));
      case 'declaration':
        this.resolveMetaparameters(operand.declaration);
        return this.declaredNodes(operand.declaration);
    }
  }

  private resolveReference(reference: ResourceReference): ReadonlyArray<NodeId> {
    const ids: NodeId[] = [];
    for (const title of reference.titles) {
      const identity = makeIdentity(reference.typeName, title);
      const id = this.registry.find(identity);
      if (id === undefined) {
        this.unresolved.push(new UnresolvedReferenceError(identity, reference.position));
      } else {
        ids.push(id);
      }
    }
    return ids;
  }

  // ── Metaparameters ──────────────────────────────────────────────────────

  private resolveMetaparameters(declaration: ResourceDeclaration): void {
    for (const body of this.bodiesOf(declaration)) {
      for (const metaparameter of body.metaparameters) {
        const targets = metaparameter.references.flatMap((reference) => this.resolveReference(reference));
        this.connect(body.nodes, targets, METAPARAMETER_DIRECTIONS[metaparameter.name], metaparameter.position);
      }
    }
  }

  private declaredNodes(declaration: ResourceDeclaration): ReadonlyArray<NodeId> {
    return this.bodiesOf(declaration).flatMap((body) => body.nodes);
  }

  private bodiesOf(declaration: ResourceDeclaration): ReadonlyArray<DeclaredBody> {
    const bodies = this.declarations.get(declaration);
    if (bodies === undefined) {
      throw new Error(`Declaration of '${declaration.typeName}' was not registered`);
    }
    return bodies;
  }

  // ── Edges ───────────────────────────────────────────────────────────────

  private connect(
    left: ReadonlyArray<NodeId>,
    right: ReadonlyArray<NodeId>,
    direction: Direction,
    position: SourcePosition,
  ): void {
    for (const l of left) {
      for (const r of right) {
        const [source, target] = direction.reversed ? [r, l] : [l, r];
        this.emit({ source, target, kind: direction.kind, position });
      }
    }
  }

  private emit(edge: RelationshipEdge): void {
    const key = `${edge.source}:${edge.target}:${edge.kind}`;
    if (this.edgeKeys.has(key)) return;
    this.edgeKeys.add(key);
    this.edges.push(edge);
  }
}
