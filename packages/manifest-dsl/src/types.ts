/**
 * Mantle Manifest DSL — Core Type Definitions
 *
 * This module defines the token stream, the interpolated string model, the
 * AST produced by the parser, and the parse result type.
 *
 * These types are the base layer of the Mantle type system. The kernel
 * depends on this package; this package has no internal Mantle dependencies.
 */

import type { ManifestError } from './errors.js';

// ---------------------------------------------------------------------------
// Source Positions
// ---------------------------------------------------------------------------

/**
 * A location in manifest source. `line` and `column` are 1-based;
 * `offset` is the 0-based UTF-16 index into the source text.
 */
export interface SourcePosition {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

// ---------------------------------------------------------------------------
// Relationship Operators
// ---------------------------------------------------------------------------

/**
 * The four relationship-chaining operators.
 *
 * `->` and `<-` express ordering only. `~>` and `<~` additionally send a
 * refresh signal to the target when the source changes. The arrow points
 * from the resource applied first to the resource applied second.
 */
export enum ChainOperator {
  /** Left is applied before right. */
  Before = '->',
  /** Left is applied before right and refreshes it on change. */
  Notify = '~>',
  /** Right is applied before left. */
  Require = '<-',
  /** Right is applied before left and refreshes it on change. */
  Subscribe = '<~',
}

// ---------------------------------------------------------------------------
// Tokens — produced by the lexer
// ---------------------------------------------------------------------------

export type Punctuator = '{' | '}' | '[' | ']' | ':' | ',' | ';' | '=>';

/**
 * A `${name}` or `$name` span inside a double-quoted string.
 * `start` and `end` are offsets into the token's raw content
 * (`start` at the `$`, `end` one past the span).
 */
export interface InterpolationSpan {
  readonly start: number;
  readonly end: number;
  readonly name: string;
}

export type Token =
  | { readonly kind: 'word'; readonly text: string; readonly position: SourcePosition }
  | {
      readonly kind: 'string';
      readonly quote: '"' | "'";
      /** Content between the quotes, escapes not yet processed. */
      readonly raw: string;
      readonly spans: ReadonlyArray<InterpolationSpan>;
      readonly position: SourcePosition;
    }
  | {
      readonly kind: 'number';
      readonly text: string;
      readonly value: number;
      readonly position: SourcePosition;
    }
  | { readonly kind: 'chain'; readonly operator: ChainOperator; readonly position: SourcePosition }
  | { readonly kind: 'punct'; readonly value: Punctuator; readonly position: SourcePosition }
  | { readonly kind: 'eof'; readonly position: SourcePosition };

export type StringToken = Extract<Token, { kind: 'string' }>;

// ---------------------------------------------------------------------------
// Interpolated Strings
// ---------------------------------------------------------------------------

/**
 * One piece of a manifest string. References are left unevaluated; a later
 * evaluator substitutes them from a variable scope.
 */
export type StringSegment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'reference'; readonly name: string };

/**
 * A string literal as an ordered list of segments. A string with no
 * interpolation is a single literal segment.
 */
export type ManifestString = ReadonlyArray<StringSegment>;

// ---------------------------------------------------------------------------
// AST — produced by the parser
// ---------------------------------------------------------------------------

/**
 * `Type['title']`, `Type["title"]` or `Type['a', 'b']`.
 * `typeName` keeps the spelling from the source; canonicalization happens
 * when the reference is resolved.
 */
export interface ResourceReference {
  readonly typeName: string;
  readonly titles: ReadonlyArray<ManifestString>;
  readonly position: SourcePosition;
}

/**
 * An attribute value. Closed: every consumer switches on `kind`.
 */
export type AttributeValue =
  | { readonly kind: 'string'; readonly value: ManifestString }
  | { readonly kind: 'word'; readonly value: string }
  | { readonly kind: 'number'; readonly text: string; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'undef' }
  | { readonly kind: 'array'; readonly items: ReadonlyArray<AttributeValue> }
  | { readonly kind: 'reference'; readonly reference: ResourceReference };

export interface Attribute {
  readonly name: string;
  readonly value: AttributeValue;
  readonly position: SourcePosition;
}

export interface ResourceTitle {
  readonly title: ManifestString;
  readonly position: SourcePosition;
}

/**
 * One `title: attributes` body. An array title declares one resource per
 * element, all sharing the same attributes.
 */
export interface ResourceBody {
  readonly titles: ReadonlyArray<ResourceTitle>;
  readonly attributes: ReadonlyArray<Attribute>;
  readonly position: SourcePosition;
}

/** `type { body; body; ... }` */
export interface ResourceDeclaration {
  readonly kind: 'resource';
  readonly typeName: string;
  readonly bodies: ReadonlyArray<ResourceBody>;
  readonly position: SourcePosition;
}

/**
 * An operand of a relationship chain. Arrays are flattened at parse time,
 * so `references` never nests.
 */
export type ChainOperand =
  | { readonly kind: 'reference'; readonly reference: ResourceReference }
  | {
      readonly kind: 'array';
      readonly references: ReadonlyArray<ResourceReference>;
      readonly position: SourcePosition;
    }
  | { readonly kind: 'declaration'; readonly declaration: ResourceDeclaration };

export interface ChainLink {
  readonly operator: ChainOperator;
  readonly position: SourcePosition;
  readonly operand: ChainOperand;
}

/**
 * `A op B op C ...`. A chain with no links is a bare reference statement:
 * it produces no edges but its references must still resolve.
 */
export interface RelationshipChain {
  readonly kind: 'chain';
  readonly head: ChainOperand;
  readonly links: ReadonlyArray<ChainLink>;
  readonly position: SourcePosition;
}

export type Statement = ResourceDeclaration | RelationshipChain;

/** The AST of one manifest body, statements in source order. */
export interface ManifestAST {
  readonly statements: ReadonlyArray<Statement>;
}

// ---------------------------------------------------------------------------
// Parse Result
// ---------------------------------------------------------------------------

/**
 * Result of parsing manifest source.
 * Parse failures are never partial: if any error is encountered, no AST
 * is returned.
 */
export type ParseResult =
  | { readonly ok: true; readonly ast: ManifestAST }
  | { readonly ok: false; readonly errors: ReadonlyArray<ManifestError> };
