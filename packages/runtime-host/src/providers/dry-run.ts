/**
 * Mantle Runtime Host — Dry-run Providers
 *
 * Providers that describe what applying a resource would do, without doing
 * it. Built-in providers cover `file`, `service` and `exec`; every other
 * type falls back to the generic provider, which only knows `ensure`.
 *
 * Interpolated titles and values are shown unevaluated, as `${name}`.
 */

import {
  formatIdentity,
  literalText,
  printString,
  type ManifestString,
  type Provider,
  type ResourceNode,
} from '@mantle/kernel';

// ---------------------------------------------------------------------------
// Attribute helpers
// ---------------------------------------------------------------------------

function titleText(title: ManifestString): string {
  return literalText(title) ?? printString(title);
}

/**
 * Scalar attribute text: words, strings, numbers and booleans. Undefined for
 * absent attributes and for undef, arrays and references.
 */
export function attributeText(node: ResourceNode, name: string): string | undefined {
  const attribute = node.attributes.find((a) => a.name === name);
  if (attribute === undefined) return undefined;
  const { value } = attribute;
  switch (value.kind) {
    case 'word':
      return value.value;
    case 'string':
      return titleText(value.value);
    case 'number':
      return value.text;
    case 'boolean':
      return String(value.value);
    default:
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Built-in providers
// ---------------------------------------------------------------------------

export class FileProvider implements Provider {
  readonly types = ['file'];

  describe(node: ResourceNode): string {
    const path = attributeText(node, 'path') ?? titleText(node.identity.title);
    const ensure = attributeText(node, 'ensure') ?? 'file';
    const mode = attributeText(node, 'mode');
    const suffix = mode === undefined ? '' : ` (mode ${mode})`;

    switch (ensure) {
      case 'absent':
        return `Ensure absent: ${path}`;
      case 'directory':
        return `Ensure directory present: ${path}${suffix}`;
      default:
        return `Ensure file present: ${path}${suffix}`;
    }
  }
}

export class ServiceProvider implements Provider {
  readonly types = ['service'];

  describe(node: ResourceNode): string {
    const name = attributeText(node, 'name') ?? titleText(node.identity.title);
    const ensure = attributeText(node, 'ensure') ?? 'running';
    return ensure === 'stopped' ? `Ensure service stopped: ${name}` : `Ensure service running: ${name}`;
  }
}

export class ExecProvider implements Provider {
  readonly types = ['exec'];

  describe(node: ResourceNode): string {
    const command = attributeText(node, 'command') ?? titleText(node.identity.title);
    return `Run command: ${command}`;
  }
}

/** Fallback for types without a dedicated provider. */
export class GenericProvider implements Provider {
  readonly types: ReadonlyArray<string> = [];

  describe(node: ResourceNode): string {
    const ensure = attributeText(node, 'ensure');
    const state = ensure === 'absent' ? 'absent' : 'present';
    return `Ensure ${state}: ${formatIdentity(node.identity)}`;
  }
}

// ---------------------------------------------------------------------------
// ProviderSet
// ---------------------------------------------------------------------------

/**
 * Picks the provider for a node by its normalized type. The first provider
 * listing a type wins.
 */
export class ProviderSet {
  private readonly byType = new Map<string, Provider>();

  constructor(
    providers: ReadonlyArray<Provider> = [new FileProvider(), new ServiceProvider(), new ExecProvider()],
    private readonly fallback: Provider = new GenericProvider(),
  ) {
    for (const provider of providers) {
      for (const type of provider.types) {
        if (!this.byType.has(type)) this.byType.set(type, provider);
      }
    }
  }

  forType(type: string): Provider {
    return this.byType.get(type) ?? this.fallback;
  }

  describe(node: ResourceNode): string {
    return this.forType(node.identity.type).describe(node);
  }
}
