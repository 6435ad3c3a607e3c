/**
 * Mantle Manifest DSL — Printer
 *
 * Renders strings, attribute values, references and declarations back into
 * manifest syntax. Output is canonical: re-parsing printed text yields the
 * same segments and values.
 *
 * Literal-only strings print single-quoted. Strings with interpolation print
 * double-quoted, every reference as `${name}`.
 */

import { capitalizeTypeName, normalizeTypeName, type ResourceIdentity } from './identity.js';
import type { Attribute, AttributeValue, ManifestString, ResourceReference } from './types.js';

export function printString(value: ManifestString): string {
  const interpolated = value.some((segment) => segment.kind === 'reference');
  if (!interpolated) {
    const text = value.map((segment) => (segment.kind === 'literal' ? segment.text : '')).join('');
    return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
  }

  let out = '"';
  for (const segment of value) {
    if (segment.kind === 'reference') {
      out += `\${${segment.name}}`;
      continue;
    }
    out += segment.text
      .replace(/\\/g, '\\\\')
      .replace(/"/g, '\\"')
      .replace(/\$/g, '\\$')
      .replace(/\n/g, '\\n')
      .replace(/\t/g, '\\t')
      .replace(/\r/g, '\\r');
  }
  return out + '"';
}

export function printReference(reference: ResourceReference): string {
  const type = capitalizeTypeName(normalizeTypeName(reference.typeName));
  return `${type}[${reference.titles.map(printString).join(', ')}]`;
}

export function printValue(value: AttributeValue): string {
  switch (value.kind) {
    case 'string':
      return printString(value.value);
    case 'word':
      return value.value;
    case 'number':
      return value.text;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'undef':
      return 'undef';
    case 'array':
      return `[${value.items.map(printValue).join(', ')}]`;
    case 'reference':
      return printReference(value.reference);
  }
}

/**
 * `File['/tmp/one']`, `Foo::Bar['x']`, `Exec["/root/${scripts}/yo.sh"]`.
 * Used for diagnostics and for relationship statements.
 */
export function formatIdentity(identity: ResourceIdentity): string {
  return `${capitalizeTypeName(normalizeTypeName(identity.type))}[${printString(identity.title)}]`;
}

/**
 * Print one resource declaration with `=>` arrows aligned.
 *
 * @example
 * file { '/tmp/one':
 *   ensure => 'present',
 *   mode   => '0644',
 * }
 */
export function printDeclaration(
  identity: ResourceIdentity,
  attributes: ReadonlyArray<Pick<Attribute, 'name' | 'value'>>,
): string {
  const head = `${normalizeTypeName(identity.type)} { ${printString(identity.title)}:`;
  if (attributes.length === 0) {
    return `${head} }`;
  }
  const width = Math.max(...attributes.map((a) => a.name.length));
  const lines = attributes.map(
    (a) => `  ${a.name.padEnd(width)} => ${printValue(a.value)},`,
  );
  return [head, ...lines, '}'].join('\n');
}
