/**
 * Mantle Manifest DSL — Interpolation Splitter
 *
 * Decomposes a string token into ordered literal and reference segments,
 * using the interpolation spans the lexer recorded. Nothing is evaluated:
 * references stay references for the downstream evaluator.
 *
 * Segment boundaries follow the spans exactly. Empty literal pieces between
 * adjacent references are dropped; a string without spans is always exactly
 * one literal segment (possibly empty), so plain titles like `/tmp/one`
 * compare and print without any interpolation handling.
 */

import type { ManifestString, StringSegment, StringToken } from './types.js';

const DOUBLE_QUOTED_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  "'": "'",
  '\\': '\\',
  $: '$',
};

const SINGLE_QUOTED_ESCAPES: Readonly<Record<string, string>> = {
  "'": "'",
  '\\': '\\',
};

/**
 * Split a string token into segments.
 *
 * @example
 * // "/root/${scripts}/yo.sh"
 * // → [literal '/root/', reference 'scripts', literal '/yo.sh']
 */
export function splitInterpolation(token: StringToken): ManifestString {
  const escapes = token.quote === '"' ? DOUBLE_QUOTED_ESCAPES : SINGLE_QUOTED_ESCAPES;

  if (token.spans.length === 0) {
    return [{ kind: 'literal', text: unescape(token.raw, escapes) }];
  }

  const segments: StringSegment[] = [];
  let cursor = 0;
  for (const span of token.spans) {
    const text = unescape(token.raw.slice(cursor, span.start), escapes);
    if (text !== '') {
      segments.push({ kind: 'literal', text });
    }
    segments.push({ kind: 'reference', name: span.name });
    cursor = span.end;
  }
  const tail = unescape(token.raw.slice(cursor), escapes);
  if (tail !== '') {
    segments.push({ kind: 'literal', text: tail });
  }
  return segments;
}

/**
 * Process backslash escapes. An unknown escape keeps its backslash.
 */
function unescape(raw: string, escapes: Readonly<Record<string, string>>): string {
  if (!raw.includes('\\')) return raw;

  let out = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (ch !== '\\' || i + 1 >= raw.length) {
      out += ch;
      continue;
    }
    const next = raw.charAt(i + 1);
    const replacement = escapes[next];
    out += replacement ?? ch + next;
    i++;
  }
  return out;
}

/** A string with no interpolation; the literal text, or undefined. */
export function literalText(value: ManifestString): string | undefined {
  let text = '';
  for (const segment of value) {
    if (segment.kind !== 'literal') return undefined;
    text += segment.text;
  }
  return text;
}

/** Build a single-literal ManifestString. */
export function literal(text: string): ManifestString {
  return [{ kind: 'literal', text }];
}
