/**
 * Mantle Manifest DSL — Interpolation Splitter Tests
 *
 * interpolation/segments: spans become ordered literal and reference segments
 * interpolation/escapes: escape processing for both quote styles
 * interpolation/helpers: literal() and literalText()
 *
 * Tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import { tokenize } from '../src/lexer.js';
import { literal, literalText, splitInterpolation } from '../src/interpolation.js';
import type { ManifestString, StringToken } from '../src/types.js';

function stringToken(source: string): StringToken {
  const token = tokenize(source)[0];
  if (token?.kind !== 'string') {
    throw new Error(`expected a string token in ${source}`);
  }
  return token;
}

function split(source: string): ManifestString {
  return splitInterpolation(stringToken(source));
}

// ---------------------------------------------------------------------------
// interpolation/segments
// ---------------------------------------------------------------------------

describe('interpolation: segments', () => {
  it('splits a braced reference out of a path', () => {
    expect(split('"/root/${scripts}/yo.sh"')).toEqual([
      { kind: 'literal', text: '/root/' },
      { kind: 'reference', name: 'scripts' },
      { kind: 'literal', text: '/yo.sh' },
    ]);
  });

  it('treats $name and ${name} alike', () => {
    expect(split('"/root/$scripts/yo.sh"')).toEqual(split('"/root/${scripts}/yo.sh"'));
  });

  it('drops empty literals between adjacent references', () => {
    expect(split('"${a}${b}"')).toEqual([
      { kind: 'reference', name: 'a' },
      { kind: 'reference', name: 'b' },
    ]);
  });

  it('ends a bare reference at the first non-name character', () => {
    expect(split('"$a-$b"')).toEqual([
      { kind: 'reference', name: 'a' },
      { kind: 'literal', text: '-' },
      { kind: 'reference', name: 'b' },
    ]);
  });

  it('keeps a string without spans as one literal', () => {
    expect(split('"/tmp/one"')).toEqual([{ kind: 'literal', text: '/tmp/one' }]);
    expect(split("'${x}'")).toEqual([{ kind: 'literal', text: '${x}' }]);
  });

  it('represents the empty string as one empty literal', () => {
    expect(split('""')).toEqual([{ kind: 'literal', text: '' }]);
  });
});

// ---------------------------------------------------------------------------
// interpolation/escapes
// ---------------------------------------------------------------------------

describe('interpolation: escapes', () => {
  it('processes double-quoted escapes', () => {
    expect(split('"a\\tb\\n\\"c\\""')).toEqual([{ kind: 'literal', text: 'a\tb\n"c"' }]);
  });

  it('turns an escaped dollar into a literal dollar', () => {
    expect(split('"\\${x}"')).toEqual([{ kind: 'literal', text: '${x}' }]);
  });

  it('only unescapes quote and backslash in single quotes', () => {
    expect(split("'it\\'s \\n \\\\'")).toEqual([{ kind: 'literal', text: "it's \\n \\" }]);
  });

  it('unescapes literal pieces around references', () => {
    expect(split('"\\"$x\\""')).toEqual([
      { kind: 'literal', text: '"' },
      { kind: 'reference', name: 'x' },
      { kind: 'literal', text: '"' },
    ]);
  });
});

// ---------------------------------------------------------------------------
// interpolation/helpers
// ---------------------------------------------------------------------------

describe('interpolation: helpers', () => {
  it('literal() builds a single segment', () => {
    expect(literal('ssh')).toEqual([{ kind: 'literal', text: 'ssh' }]);
  });

  it('literalText() joins literal segments', () => {
    expect(literalText(literal('/tmp/one'))).toBe('/tmp/one');
  });

  it('literalText() is undefined once a reference appears', () => {
    expect(literalText(split('"/root/$x"'))).toBeUndefined();
  });
});
