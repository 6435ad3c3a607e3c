/**
 * Mantle Manifest DSL — Lexer
 *
 * Turns manifest source text into a finite token sequence ending in a single
 * `eof` token. Whitespace, `#` line comments and `/* *\/` block comments are
 * skipped.
 *
 * Double-quoted strings record the span of every `${name}` and `$name`
 * interpolation; the interpolation splitter uses those spans to build
 * segments. Escapes are left in the raw content for the splitter to process.
 *
 * Lexer guarantees:
 * - Deterministic: identical source produces identical tokens
 * - Rejecting: the first malformed token throws a LexError, no partial stream
 */

import { LexError } from './errors.js';
import {
  ChainOperator,
  type InterpolationSpan,
  type Punctuator,
  type SourcePosition,
  type Token,
} from './types.js';

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const INTERPOLATION_NAME = /^(::)?[A-Za-z_][A-Za-z0-9_]*(::[A-Za-z_][A-Za-z0-9_]*)*$/;

const SINGLE_PUNCTUATORS: ReadonlyArray<Punctuator> = ['{', '}', '[', ']', ':', ',', ';'];

function isSinglePunctuator(ch: string): ch is Punctuator {
  return SINGLE_PUNCTUATORS.some((p) => p === ch);
}

/**
 * Tokenize manifest source.
 *
 * @throws {LexError} On an unterminated string, comment or interpolation,
 *   an empty or non-name interpolation, or a character outside the grammar.
 */
export function tokenize(source: string): ReadonlyArray<Token> {
  return new Lexer(source).run();
}

class Lexer {
  private offset = 0;
  private line = 1;
  private column = 1;
  private readonly tokens: Token[] = [];

  constructor(private readonly source: string) {
    // Byte order mark
    if (source.charCodeAt(0) === 0xfeff) {
      this.offset = 1;
    }
  }

  run(): ReadonlyArray<Token> {
    for (;;) {
      this.skipTrivia();
      const position = this.position();
      const ch = this.peek();
      if (ch === '') {
        this.tokens.push({ kind: 'eof', position });
        return this.tokens;
      }

      if (ch === '"' || ch === "'") {
        this.tokens.push(this.readString(ch));
      } else if (NAME_START.test(ch) || (ch === ':' && this.peek(1) === ':' && NAME_START.test(this.peek(2)))) {
        this.tokens.push({ kind: 'word', text: this.readName(), position });
      } else if (DIGIT.test(ch) || (ch === '-' && DIGIT.test(this.peek(1)))) {
        this.tokens.push(this.readNumber());
      } else {
        this.tokens.push(this.readOperator());
      }
    }
  }

  // ── Trivia ──────────────────────────────────────────────────────────────

  private skipTrivia(): void {
    for (;;) {
      const ch = this.peek();
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
        this.advance();
      } else if (ch === '#') {
        while (this.peek() !== '' && this.peek() !== '\n') this.advance();
      } else if (ch === '/' && this.peek(1) === '*') {
        const start = this.position();
        this.advance();
        this.advance();
        while (!(this.peek() === '*' && this.peek(1) === '/')) {
          if (this.peek() === '') {
            throw new LexError('Unterminated block comment', start);
          }
          this.advance();
        }
        this.advance();
        this.advance();
      } else {
        return;
      }
    }
  }

  // ── Names and numbers ───────────────────────────────────────────────────

  /** `name`, `a::b::c`, or top-scoped `::name`. */
  private readName(): string {
    const start = this.offset;
    if (this.peek() === ':') {
      this.advance();
      this.advance();
    }
    for (;;) {
      while (NAME_PART.test(this.peek())) this.advance();
      if (this.peek() === ':' && this.peek(1) === ':' && NAME_START.test(this.peek(2))) {
        this.advance();
        this.advance();
        continue;
      }
      return this.source.slice(start, this.offset);
    }
  }

  private readNumber(): Token {
    const position = this.position();
    const start = this.offset;
    if (this.peek() === '-') this.advance();
    while (DIGIT.test(this.peek())) this.advance();
    if (this.peek() === '.' && DIGIT.test(this.peek(1))) {
      this.advance();
      while (DIGIT.test(this.peek())) this.advance();
    }
    if (NAME_START.test(this.peek())) {
      throw new LexError(`Invalid number '${this.source.slice(start, this.offset)}${this.peek()}'`, position);
    }
    const text = this.source.slice(start, this.offset);
    return { kind: 'number', text, value: Number(text), position };
  }

  // ── Operators and punctuation ───────────────────────────────────────────

  private readOperator(): Token {
    const position = this.position();
    const ch = this.peek();
    const pair = ch + this.peek(1);

    const operator = chainOperator(pair);
    if (operator !== undefined) {
      this.advance();
      this.advance();
      return { kind: 'chain', operator, position };
    }
    if (pair === '=>') {
      this.advance();
      this.advance();
      return { kind: 'punct', value: '=>', position };
    }
    if (isSinglePunctuator(ch)) {
      this.advance();
      return { kind: 'punct', value: ch, position };
    }
    throw new LexError(`Unexpected character ${JSON.stringify(ch)}`, position);
  }

  // ── Strings ─────────────────────────────────────────────────────────────

  private readString(quote: '"' | "'"): Token {
    const position = this.position();
    this.advance();
    const contentStart = this.offset;
    const spans: InterpolationSpan[] = [];

    for (;;) {
      const ch = this.peek();
      if (ch === '') {
        throw new LexError('Unterminated string literal', position);
      }
      if (ch === quote) {
        const raw = this.source.slice(contentStart, this.offset);
        this.advance();
        return { kind: 'string', quote, raw, spans, position };
      }
      if (ch === '\\') {
        this.advance();
        if (this.peek() === '') {
          throw new LexError('Unterminated string literal', position);
        }
        this.advance();
        continue;
      }
      if (ch === '$' && quote === '"') {
        const span = this.readInterpolation(contentStart, quote);
        if (span !== undefined) {
          spans.push(span);
          continue;
        }
      }
      this.advance();
    }
  }

  /**
   * Read `${name}` or `$name` at the current `$`. Returns undefined when the
   * `$` does not start an interpolation (it is then an ordinary character).
   */
  private readInterpolation(contentStart: number, quote: string): InterpolationSpan | undefined {
    const dollar = this.position();
    const start = this.offset - contentStart;

    if (this.peek(1) === '{') {
      const close = this.findBraceClose(quote);
      if (close === -1) {
        throw new LexError('Unterminated interpolation', dollar);
      }
      const expression = this.source.slice(this.offset + 2, close).trim();
      if (expression === '') {
        throw new LexError('Empty interpolation', dollar);
      }
      if (!INTERPOLATION_NAME.test(expression)) {
        throw new LexError(`Unsupported interpolation expression \${${expression}}`, dollar);
      }
      while (this.offset <= close) this.advance();
      return { start, end: this.offset - contentStart, name: expression };
    }

    const next = this.peek(1);
    const topScoped = next === ':' && this.peek(2) === ':' && NAME_START.test(this.peek(3));
    if (!NAME_START.test(next) && !topScoped) {
      return undefined;
    }
    this.advance();
    const name = this.readName();
    return { start, end: this.offset - contentStart, name };
  }

  /** Offset of the `}` closing the `${` at the cursor, or -1. */
  private findBraceClose(quote: string): number {
    for (let i = this.offset + 2; i < this.source.length; i++) {
      const ch = this.source[i];
      if (ch === '}') return i;
      if (ch === quote || ch === '\n') return -1;
    }
    return -1;
  }

  // ── Cursor ──────────────────────────────────────────────────────────────

  private peek(ahead = 0): string {
    return this.source.charAt(this.offset + ahead);
  }

  private advance(): void {
    if (this.source.charAt(this.offset) === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.offset++;
  }

  private position(): SourcePosition {
    return { line: this.line, column: this.column, offset: this.offset };
  }
}

function chainOperator(text: string): ChainOperator | undefined {
  switch (text) {
    case '->':
      return ChainOperator.Before;
    case '~>':
      return ChainOperator.Notify;
    case '<-':
      return ChainOperator.Require;
    case '<~':
      return ChainOperator.Subscribe;
    default:
      return undefined;
  }
}
