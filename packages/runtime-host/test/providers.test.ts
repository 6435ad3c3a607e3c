/**
 * Mantle Runtime Host — Dry-run Provider Tests
 *
 * providers/builtin: file, service and exec descriptions
 * providers/fallback: generic provider for user-defined types
 * providers/set: type lookup and precedence
 *
 * Tests are pure: catalogs are compiled in memory.
 */

import { describe, it, expect } from 'vitest';
import { compile, type Provider, type ResourceNode } from '@mantle/kernel';
import { ProviderSet, attributeText } from '../src/providers/dry-run.js';

const MANIFEST = `file { '/etc/motd': ensure => present, mode => '0644' }
file { '/srv': ensure => directory }
file { '/tmp/old': ensure => absent }
service { 'ssh': ensure => running }
service { 'cups': ensure => stopped }
exec { 'refresh': command => '/usr/bin/refresh' }
exec { "/root/\${scripts}/yo.sh": }
foo::bar { 'baz': }
`;

const catalog = compile(MANIFEST);

function node(id: number): ResourceNode {
  const found = catalog.nodes[id];
  if (found === undefined) throw new Error(`no node ${id}`);
  return found;
}

// ---------------------------------------------------------------------------
// providers/builtin
// ---------------------------------------------------------------------------

describe('providers: built-in types', () => {
  const providers = new ProviderSet();

  it('describes files by ensure state, with the mode when given', () => {
    expect(providers.describe(node(0))).toBe('Ensure file present: /etc/motd (mode 0644)');
    expect(providers.describe(node(1))).toBe('Ensure directory present: /srv');
    expect(providers.describe(node(2))).toBe('Ensure absent: /tmp/old');
  });

  it('describes services as running or stopped', () => {
    expect(providers.describe(node(3))).toBe('Ensure service running: ssh');
    expect(providers.describe(node(4))).toBe('Ensure service stopped: cups');
  });

  it('prefers the command attribute over the exec title', () => {
    expect(providers.describe(node(5))).toBe('Run command: /usr/bin/refresh');
  });

  it('shows an interpolated title unevaluated', () => {
    expect(providers.describe(node(6))).toBe('Run command: "/root/${scripts}/yo.sh"');
  });
});

// ---------------------------------------------------------------------------
// providers/fallback
// ---------------------------------------------------------------------------

describe('providers: fallback', () => {
  it('describes a user-defined type by its reference spelling', () => {
    expect(new ProviderSet().describe(node(7))).toBe("Ensure present: Foo::Bar['baz']");
  });

  it('reads scalar attributes and skips missing ones', () => {
    expect(attributeText(node(0), 'mode')).toBe('0644');
    expect(attributeText(node(0), 'ensure')).toBe('present');
    expect(attributeText(node(7), 'ensure')).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// providers/set
// ---------------------------------------------------------------------------

describe('providers: ProviderSet', () => {
  it('uses the first provider that lists a type', () => {
    const first: Provider = { types: ['file'], describe: () => 'first' };
    const second: Provider = { types: ['file'], describe: () => 'second' };
    const providers = new ProviderSet([first, second]);
    expect(providers.describe(node(0))).toBe('first');
  });

  it('falls back for types no provider lists', () => {
    const fallback: Provider = { types: [], describe: () => 'fallback' };
    const providers = new ProviderSet([], fallback);
    expect(providers.forType('service')).toBe(fallback);
    expect(providers.describe(node(3))).toBe('fallback');
  });
});
