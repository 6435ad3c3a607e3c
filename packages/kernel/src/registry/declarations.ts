/**
 * Mantle Kernel — Declaration Collection
 *
 * Walks the AST in source order and registers every resource a declaration
 * introduces, including declarations used as chain operands. Each title of
 * an array-titled body becomes its own node with the body's attributes.
 *
 * Relationship metaparameters (`before`, `require`, `notify`, `subscribe`)
 * are split off the attribute list here. They are not attributes of the
 * node; the resolver turns them into edges.
 */

import {
  ParseError,
  makeIdentity,
  type Attribute,
  type AttributeValue,
  type ManifestAST,
  type ResourceDeclaration,
  type ResourceReference,
  type SourcePosition,
} from '@mantle/manifest-dsl';
import type { NodeId } from '../types/catalog.js';
import type { ResourceRegistry } from './resource-registry.js';

export type MetaparameterName = 'before' | 'require' | 'notify' | 'subscribe';

const METAPARAMETERS: ReadonlyArray<MetaparameterName> = ['before', 'require', 'notify', 'subscribe'];

function isMetaparameter(name: string): name is MetaparameterName {
  return METAPARAMETERS.some((m) => m === name);
}

export interface Metaparameter {
  readonly name: MetaparameterName;
  readonly references: ReadonlyArray<ResourceReference>;
  readonly position: SourcePosition;
}

/** The nodes one declaration body introduced, and its metaparameters. */
export interface DeclaredBody {
  readonly nodes: ReadonlyArray<NodeId>;
  readonly metaparameters: ReadonlyArray<Metaparameter>;
}

export type DeclarationTable = ReadonlyMap<ResourceDeclaration, ReadonlyArray<DeclaredBody>>;

/**
 * Every declaration in the AST, in source order: top-level declarations and
 * declarations used as chain operands.
 */
export function collectDeclarations(ast: ManifestAST): ReadonlyArray<ResourceDeclaration> {
  const declarations: ResourceDeclaration[] = [];
  for (const statement of ast.statements) {
    if (statement.kind === 'resource') {
      declarations.push(statement);
      continue;
    }
    for (const operand of [statement.head, ...statement.links.map((l) => l.operand)]) {
      if (operand.kind === 'declaration') {
        declarations.push(operand.declaration);
      }
    }
  }
  return declarations;
}

/**
 * Register every declared resource with the registry.
 *
 * @throws {DuplicateResourceError} On the first repeated identity.
 * @throws {ParseError} When a relationship metaparameter holds anything but
 *   references.
 */
export function declareResources(ast: ManifestAST, registry: ResourceRegistry): DeclarationTable {
  const table = new Map<ResourceDeclaration, ReadonlyArray<DeclaredBody>>();

  for (const declaration of collectDeclarations(ast)) {
    const bodies: DeclaredBody[] = [];
    for (const body of declaration.bodies) {
      const attributes: Attribute[] = [];
      const metaparameters: Metaparameter[] = [];
      for (const attribute of body.attributes) {
        if (isMetaparameter(attribute.name)) {
          metaparameters.push({
            name: attribute.name,
            references: metaparameterReferences(attribute),
            position: attribute.position,
          });
        } else {
          attributes.push(attribute);
        }
      }

      const nodes = body.titles.map((title) =>
        registry.declare(makeIdentity(declaration.typeName, title.title), attributes, title.position),
      );
      bodies.push({ nodes, metaparameters });
    }
    table.set(declaration, bodies);
  }

  return table;
}

function metaparameterReferences(attribute: Attribute): ReadonlyArray<ResourceReference> {
  const references: ResourceReference[] = [];
  const collect = (value: AttributeValue): void => {
    if (value.kind === 'reference') {
      references.push(value.reference);
    } else if (value.kind === 'array') {
      value.items.forEach(collect);
    } else {
      throw new ParseError(
        `Relationship metaparameter '${attribute.name}' expects a resource reference or an array of resource references`,
        attribute.position,
      );
    }
  };
  collect(attribute.value);
  return references;
}
