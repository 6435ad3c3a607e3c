/**
 * Mantle Manifest DSL — Resource Identity
 *
 * A resource is identified by its normalized type name and its title.
 * Every identity comparison, map key and lookup goes through identityKey();
 * the source spelling of a type name is never compared directly.
 *
 * Type names are case-insensitive and segmented: `Foo::Bar`, `foo::bar` and
 * `FOO::bar` all normalize to `foo::bar`.
 *
 * Titles are compared on their unevaluated segments. Two titles holding the
 * same interpolation (`"/root/${scripts}"` and `"/root/$scripts"`) are the
 * same identity, whatever the variable later evaluates to.
 */

import type { ManifestString, StringSegment } from './types.js';

declare const __identityKeyBrand: unique symbol;

/**
 * Canonical, hashable form of a ResourceIdentity.
 * Only identityKey() produces values of this type.
 */
export type IdentityKey = string & { readonly [__identityKeyBrand]: 'IdentityKey' };

export interface ResourceIdentity {
  /** Normalized type name, e.g. `file` or `foo::bar`. */
  readonly type: string;
  readonly title: ManifestString;
}

/**
 * Lower-case every `::`-separated segment of a type name.
 *
 * @example
 * normalizeTypeName('Foo::Bar') // 'foo::bar'
 * normalizeTypeName('File')     // 'file'
 */
export function normalizeTypeName(typeName: string): string {
  return typeName
    .split('::')
    .map((segment) => segment.toLowerCase())
    .join('::');
}

/**
 * Capitalize every `::`-separated segment, the spelling used for references.
 *
 * @example
 * capitalizeTypeName('foo::bar') // 'Foo::Bar'
 */
export function capitalizeTypeName(typeName: string): string {
  return typeName
    .split('::')
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join('::');
}

export function makeIdentity(typeName: string, title: ManifestString): ResourceIdentity {
  return { type: normalizeTypeName(typeName), title };
}

function segmentKey(segment: StringSegment): [string, string] {
  return segment.kind === 'literal' ? ['l', segment.text] : ['r', segment.name];
}

/**
 * Compute the canonical key of an identity.
 *
 * The type is normalized again here so that identities built by hand
 * (tests, providers) compare equal to those built by makeIdentity().
 */
export function identityKey(identity: ResourceIdentity): IdentityKey {
  const title = JSON.stringify(identity.title.map(segmentKey));
  // The brand is only ever applied here.
  return `${normalizeTypeName(identity.type)}${title}` as IdentityKey;
}

export function sameIdentity(a: ResourceIdentity, b: ResourceIdentity): boolean {
  return identityKey(a) === identityKey(b);
}

/** True when the title contains no interpolation. */
export function isLiteralTitle(title: ManifestString): boolean {
  return title.every((segment) => segment.kind === 'literal');
}
