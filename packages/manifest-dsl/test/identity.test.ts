/**
 * Mantle Manifest DSL — Resource Identity and Error Tests
 *
 * identity/normalization: type names are case-insensitive per segment
 * identity/keys: identityKey() equality follows (normalized type, title segments)
 * errors/messages: error classes carry code, position and message
 * errors/diagnostics: formatDiagnostic() renders one line
 *
 * Tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import {
  capitalizeTypeName,
  identityKey,
  isLiteralTitle,
  makeIdentity,
  normalizeTypeName,
  sameIdentity,
} from '../src/identity.js';
import {
  CycleError,
  DuplicateResourceError,
  ParseError,
  UnresolvedReferenceError,
  formatDiagnostic,
} from '../src/errors.js';
import { literal } from '../src/interpolation.js';
import type { ManifestString } from '../src/types.js';

const AT = { line: 4, column: 7, offset: 40 };
const EARLIER = { line: 1, column: 1, offset: 0 };

const SCRIPT_TITLE: ManifestString = [
  { kind: 'literal', text: '/root/' },
  { kind: 'reference', name: 'scripts' },
];

// ---------------------------------------------------------------------------
// identity/normalization
// ---------------------------------------------------------------------------

describe('identity: normalization', () => {
  it('lower-cases every segment', () => {
    expect(normalizeTypeName('File')).toBe('file');
    expect(normalizeTypeName('Foo::Bar')).toBe('foo::bar');
    expect(normalizeTypeName('FOO::bar')).toBe('foo::bar');
  });

  it('capitalizes every segment', () => {
    expect(capitalizeTypeName('file')).toBe('File');
    expect(capitalizeTypeName('foo::bar')).toBe('Foo::Bar');
  });

  it('makeIdentity() stores the normalized type', () => {
    expect(makeIdentity('Service', literal('ssh')).type).toBe('service');
  });
});

// ---------------------------------------------------------------------------
// identity/keys
// ---------------------------------------------------------------------------

describe('identity: keys', () => {
  it('ignores type spelling', () => {
    const a = makeIdentity('Foo::Bar', literal('x'));
    const b = { type: 'foo::BAR', title: literal('x') };
    expect(identityKey(a)).toBe(identityKey(b));
    expect(sameIdentity(a, b)).toBe(true);
  });

  it('distinguishes titles', () => {
    expect(sameIdentity(makeIdentity('file', literal('/tmp/one')), makeIdentity('file', literal('/tmp/two')))).toBe(false);
  });

  it('distinguishes types with the same title', () => {
    expect(sameIdentity(makeIdentity('file', literal('x')), makeIdentity('exec', literal('x')))).toBe(false);
  });

  it('distinguishes a reference from literal text of the same name', () => {
    const asReference = makeIdentity('file', [{ kind: 'reference', name: 'x' }]);
    expect(sameIdentity(asReference, makeIdentity('file', literal('x')))).toBe(false);
    expect(sameIdentity(asReference, makeIdentity('file', literal('$x')))).toBe(false);
  });

  it('compares interpolated titles on their segments', () => {
    expect(sameIdentity(makeIdentity('exec', SCRIPT_TITLE), makeIdentity('Exec', [...SCRIPT_TITLE]))).toBe(true);
  });

  it('reports whether a title is literal', () => {
    expect(isLiteralTitle(literal('/tmp/one'))).toBe(true);
    expect(isLiteralTitle(SCRIPT_TITLE)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// errors/messages
// ---------------------------------------------------------------------------

describe('errors: messages', () => {
  it('DuplicateResourceError names both declarations', () => {
    const err = new DuplicateResourceError(makeIdentity('file', literal('/tmp/one')), AT, EARLIER);
    expect(err.code).toBe('duplicate-resource');
    expect(err.position).toEqual(AT);
    expect(err.firstDeclaredAt).toEqual(EARLIER);
    expect(err.message).toBe(
      "Duplicate declaration of File['/tmp/one']; first declared at line 1, column 1",
    );
  });

  it('UnresolvedReferenceError prints the interpolated title', () => {
    const err = new UnresolvedReferenceError(makeIdentity('exec', SCRIPT_TITLE), AT);
    expect(err.code).toBe('unresolved-reference');
    expect(err.message).toBe('Reference to undeclared resource Exec["/root/${scripts}"]');
  });

  it('CycleError closes the cycle back to its first member', () => {
    const err = new CycleError(
      [makeIdentity('file', literal('a')), makeIdentity('service', literal('b'))],
      AT,
    );
    expect(err.code).toBe('cycle');
    expect(err.message).toBe("Dependency cycle: File['a'] -> Service['b'] -> File['a']");
  });

  it('CycleError prints a self-loop', () => {
    const err = new CycleError([makeIdentity('file', literal('a'))], AT);
    expect(err.message).toBe("Dependency cycle: File['a'] -> File['a']");
  });

  it('errors are Error instances with a name', () => {
    const err = new ParseError('boom', AT);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ParseError');
  });
});

// ---------------------------------------------------------------------------
// errors/diagnostics
// ---------------------------------------------------------------------------

describe('errors: diagnostics', () => {
  it('prefixes the file name when given', () => {
    expect(formatDiagnostic(new ParseError('boom', AT), 'site.mf')).toBe('site.mf:4:7 parse: boom');
  });

  it('starts at the line number without a file', () => {
    expect(formatDiagnostic(new ParseError('boom', AT))).toBe('4:7 parse: boom');
  });
});
