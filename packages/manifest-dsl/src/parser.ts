/**
 * Mantle Manifest DSL — Parser
 *
 * Parses manifest source text into an Abstract Syntax Tree (AST).
 *
 * The parser is responsible for syntactic analysis only. It does not check
 * that references name declared resources, that identities are unique, or
 * that the relationship graph is acyclic — those are the kernel's
 * responsibility.
 *
 * Grammar (one token of lookahead):
 *
 *   manifest    := statement* EOF
 *   statement   := ';' | declaration chainTail? | operand chainTail
 *   declaration := WORD '{' body (';' body)* ';'? '}'
 *   body        := title ':' (attribute (',' attribute)* ','?)?
 *   title       := STRING | WORD | '[' (STRING | WORD) (',' ...)* ','? ']'
 *   attribute   := WORD '=>' value
 *   value       := STRING | NUMBER | WORD | reference | '[' (value (',' value)* ','?)? ']'
 *   reference   := WORD '[' (STRING | WORD) (',' ...)* ','? ']'
 *   operand     := reference | declaration | '[' (reference | array) (',' ...)* ','? ']'
 *   chainTail   := (('->' | '~>' | '<-' | '<~') operand)+
 *
 * `WORD '{'` starts a declaration; `WORD '['` or `'['` starts a chain.
 *
 * Parser guarantees:
 * - Deterministic: identical source produces identical AST
 * - Rejecting: invalid syntax produces an error, never a partial AST
 */

import { splitInterpolation } from './interpolation.js';
import { ManifestError, ParseError } from './errors.js';
import { tokenize } from './lexer.js';
import type {
  Attribute,
  AttributeValue,
  ChainLink,
  ChainOperand,
  ManifestAST,
  ManifestString,
  ParseResult,
  Punctuator,
  ResourceBody,
  ResourceDeclaration,
  ResourceReference,
  ResourceTitle,
  SourcePosition,
  Statement,
  Token,
} from './types.js';

/**
 * Parse manifest source.
 *
 * Returns a discriminated union:
 * - `{ ok: true, ast }` on success
 * - `{ ok: false, errors }` carrying the LexError or ParseError that stopped parsing
 *
 * Failures are never partial: no AST is returned alongside errors.
 */
export function parse(source: string): ParseResult {
  try {
    return { ok: true, ast: parseManifest(source) };
  } catch (err: unknown) {
    if (err instanceof ManifestError) {
      return { ok: false, errors: [err] };
    }
    throw err;
  }
}

/**
 * Parse manifest source, throwing the first LexError or ParseError.
 */
export function parseManifest(source: string): ManifestAST {
  return new Parser(tokenize(source)).parseManifest();
}

const OPERAND_MESSAGE = 'a resource reference or an array of resource references';

/** Deepest array nesting accepted in attribute values and chain operands. */
export const MAX_NESTING = 64;

class Parser {
  private index = 0;

  constructor(private readonly tokens: ReadonlyArray<Token>) {}

  parseManifest(): ManifestAST {
    const statements: Statement[] = [];
    while (this.peek().kind !== 'eof') {
      if (this.isPunct(';')) {
        this.next();
        continue;
      }
      statements.push(this.parseStatement());
    }
    return { statements };
  }

  // ── Statements ──────────────────────────────────────────────────────────

  private parseStatement(): Statement {
    const token = this.peek();
    let head: ChainOperand;

    if (token.kind === 'word' && this.isPunct('{', 1)) {
      const declaration = this.parseDeclaration();
      if (this.peek().kind !== 'chain') {
        this.skipSemicolon();
        return declaration;
      }
      head = { kind: 'declaration', declaration };
    } else if ((token.kind === 'word' && this.isPunct('[', 1)) || this.isPunct('[')) {
      head = this.parseOperand();
    } else {
      throw this.unexpected('a resource declaration or a relationship chain');
    }

    const links: ChainLink[] = [];
    for (;;) {
      const operatorToken = this.peek();
      if (operatorToken.kind !== 'chain') break;
      this.next();
      links.push({
        operator: operatorToken.operator,
        position: operatorToken.position,
        operand: this.parseOperand(),
      });
    }
    this.skipSemicolon();

    return { kind: 'chain', head, links, position: token.position };
  }

  private skipSemicolon(): void {
    if (this.isPunct(';')) this.next();
  }

  // ── Declarations ────────────────────────────────────────────────────────

  private parseDeclaration(): ResourceDeclaration {
    const typeToken = this.expectWord('a resource type');
    this.expectPunct('{', `'{' after resource type '${typeToken.text}'`);

    const bodies: ResourceBody[] = [];
    for (;;) {
      if (this.isPunct('}') && bodies.length > 0) {
        this.next();
        break;
      }
      bodies.push(this.parseBody());
      if (this.isPunct(';')) {
        this.next();
        continue;
      }
      this.expectPunct('}', `'}' to close the '${typeToken.text}' declaration`);
      break;
    }

    return {
      kind: 'resource',
      typeName: typeToken.text,
      bodies,
      position: typeToken.position,
    };
  }

  private parseBody(): ResourceBody {
    const position = this.peek().position;
    const titles = this.parseTitles();
    this.expectPunct(':', "':' after resource title");

    const attributes: Attribute[] = [];
    const seen = new Set<string>();
    while (this.peek().kind === 'word') {
      const attribute = this.parseAttribute();
      if (seen.has(attribute.name)) {
        throw new ParseError(`Duplicate attribute '${attribute.name}'`, attribute.position);
      }
      seen.add(attribute.name);
      attributes.push(attribute);

      if (this.isPunct(',')) {
        this.next();
        continue;
      }
      if (!this.isPunct(';') && !this.isPunct('}')) {
        throw this.unexpected("',', ';' or '}' after attribute value");
      }
      break;
    }

    return { titles, attributes, position };
  }

  private parseTitles(): ReadonlyArray<ResourceTitle> {
    const token = this.peek();
    if (token.kind === 'string' || token.kind === 'word') {
      return [{ title: this.parseTitleText(), position: token.position }];
    }
    if (this.isPunct('[')) {
      this.next();
      const titles: ResourceTitle[] = [];
      while (!this.isPunct(']')) {
        const position = this.peek().position;
        titles.push({ title: this.parseTitleText(), position });
        if (!this.isPunct(']')) {
          this.expectPunct(',', "',' or ']' in title array");
        }
      }
      if (titles.length === 0) {
        throw new ParseError('Resource title array must not be empty', token.position);
      }
      this.next();
      return titles;
    }
    throw this.unexpected('a resource title');
  }

  /** A title is a string or a bare word. */
  private parseTitleText(): ManifestString {
    const token = this.peek();
    if (token.kind === 'string') {
      this.next();
      return splitInterpolation(token);
    }
    if (token.kind === 'word') {
      this.next();
      return [{ kind: 'literal', text: token.text }];
    }
    throw this.unexpected('a resource title');
  }

  private parseAttribute(): Attribute {
    const nameToken = this.expectWord('an attribute name');
    this.expectPunct('=>', `'=>' after attribute name '${nameToken.text}'`);
    return { name: nameToken.text, value: this.parseValue(), position: nameToken.position };
  }

  private parseValue(depth = 0): AttributeValue {
    const token = this.peek();
    switch (token.kind) {
      case 'string':
        this.next();
        return { kind: 'string', value: splitInterpolation(token) };
      case 'number':
        this.next();
        return { kind: 'number', text: token.text, value: token.value };
      case 'word':
        if (this.isPunct('[', 1)) {
          return { kind: 'reference', reference: this.parseReference() };
        }
        this.next();
        if (token.text === 'true' || token.text === 'false') {
          return { kind: 'boolean', value: token.text === 'true' };
        }
        if (token.text === 'undef') {
          return { kind: 'undef' };
        }
        return { kind: 'word', value: token.text };
      default:
        break;
    }

    if (this.isPunct('[')) {
      this.checkNesting(depth + 1);
      this.next();
      const items: AttributeValue[] = [];
      while (!this.isPunct(']')) {
        items.push(this.parseValue(depth + 1));
        if (!this.isPunct(']')) {
          this.expectPunct(',', "',' or ']' in array value");
        }
      }
      this.next();
      return { kind: 'array', items };
    }
    throw this.unexpected('an attribute value');
  }

  // ── References and chain operands ───────────────────────────────────────

  private parseReference(): ResourceReference {
    const typeToken = this.expectWord('a resource type');
    this.expectPunct('[', `'[' after resource type '${typeToken.text}'`);

    const titles: ManifestString[] = [];
    while (!this.isPunct(']')) {
      titles.push(this.parseTitleText());
      if (!this.isPunct(']')) {
        this.expectPunct(',', "',' or ']' in resource reference");
      }
    }
    if (titles.length === 0) {
      throw new ParseError(
        `Resource reference '${typeToken.text}[]' must name at least one title`,
        typeToken.position,
      );
    }
    this.next();

    return { typeName: typeToken.text, titles, position: typeToken.position };
  }

  private parseOperand(): ChainOperand {
    const token = this.peek();
    if (token.kind === 'word' && this.isPunct('{', 1)) {
      return { kind: 'declaration', declaration: this.parseDeclaration() };
    }
    if (token.kind === 'word' && this.isPunct('[', 1)) {
      return { kind: 'reference', reference: this.parseReference() };
    }
    if (this.isPunct('[')) {
      const references: ResourceReference[] = [];
      this.parseReferenceArray(references, 1);
      return { kind: 'array', references, position: token.position };
    }
    throw this.unexpected(OPERAND_MESSAGE);
  }

  /** Parse `[ ... ]` at the cursor, flattening nested arrays into `into`. */
  private parseReferenceArray(into: ResourceReference[], depth: number): void {
    this.checkNesting(depth);
    this.expectPunct('[', OPERAND_MESSAGE);
    while (!this.isPunct(']')) {
      const token = this.peek();
      if (this.isPunct('[')) {
        this.parseReferenceArray(into, depth + 1);
      } else if (token.kind === 'word' && this.isPunct('[', 1)) {
        into.push(this.parseReference());
      } else {
        throw this.unexpected(OPERAND_MESSAGE);
      }
      if (!this.isPunct(']')) {
        this.expectPunct(',', "',' or ']' in reference array");
      }
    }
    this.next();
  }

  /** Reject the array opening at the cursor when it is nested too deep. */
  private checkNesting(depth: number): void {
    if (depth > MAX_NESTING) {
      throw new ParseError(`Array nesting too deep (more than ${MAX_NESTING} levels)`, this.peek().position);
    }
  }

  // ── Token helpers ───────────────────────────────────────────────────────

  private peek(ahead = 0): Token {
    const token = this.tokens[Math.min(this.index + ahead, this.tokens.length - 1)];
    if (token === undefined) {
      throw new ParseError('Empty token stream', { line: 1, column: 1, offset: 0 });
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private isPunct(value: Punctuator, ahead = 0): boolean {
    const token = this.peek(ahead);
    return token.kind === 'punct' && token.value === value;
  }

  private expectPunct(value: Punctuator, expected: string): SourcePosition {
    if (!this.isPunct(value)) {
      throw this.unexpected(expected);
    }
    return this.next().position;
  }

  private expectWord(expected: string): Extract<Token, { kind: 'word' }> {
    const token = this.peek();
    if (token.kind !== 'word') {
      throw this.unexpected(expected);
    }
    this.next();
    return token;
  }

  private unexpected(expected: string): ParseError {
    const token = this.peek();
    if (token.kind === 'eof') {
      return new ParseError(`Unexpected end of input; expected ${expected}`, token.position);
    }
    return new ParseError(`Unexpected ${describeToken(token)}; expected ${expected}`, token.position);
  }
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case 'word':
      return `word '${token.text}'`;
    case 'string':
      return 'string';
    case 'number':
      return `number ${token.text}`;
    case 'chain':
      return `operator '${token.operator}'`;
    case 'punct':
      return `'${token.value}'`;
    case 'eof':
      return 'end of input';
  }
}
