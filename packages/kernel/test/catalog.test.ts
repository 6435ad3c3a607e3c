/**
 * Mantle Kernel — Catalog Output Tests
 *
 * catalog-hash/stability: identical or reformatted manifests hash identically
 * catalog-hash/sensitivity: any change to nodes or edges changes the hash
 * catalog-printer/output: canonical manifest text
 * catalog-printer/round-trip: compile(printCatalog(c)) reproduces c
 * catalog-dot/output: Graphviz rendering
 * catalog-plan/steps: execution plan steps
 *
 * Tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import { buildPlan, canonicalize, compile, printCatalog, toDot, type Catalog } from '../src/index.js';
import { METAPARAMETER_MANIFEST, SAMPLE_MANIFEST } from './fixtures.js';

const SMALL = "file { '/tmp/one': ensure => present, mode => '0644' }\nservice { 'ssh': }\nFile['/tmp/one'] ~> Service['ssh']\n";

function shape(catalog: Catalog) {
  return {
    nodes: catalog.nodes.map((n) => ({
      identity: n.identity,
      attributes: n.attributes.map((a) => ({ name: a.name, value: a.value })),
    })),
    edges: catalog.edges.map((e) => [e.source, e.target, e.kind]),
    order: catalog.order,
  };
}

// ---------------------------------------------------------------------------
// catalog-hash
// ---------------------------------------------------------------------------

describe('catalog-hash: stability', () => {
  it('is a 64-character hex digest', () => {
    expect(compile(SAMPLE_MANIFEST).hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is identical across repeated compilations', () => {
    expect(compile(SAMPLE_MANIFEST).hash).toBe(compile(SAMPLE_MANIFEST).hash);
  });

  it('ignores layout, comments and type-name spelling', () => {
    const compact = "File{'/tmp/one':ensure=>present,mode=>'0644'}service{'ssh':}File['/tmp/one']~>SERVICE['ssh']";
    const commented = `# header\n${SMALL}/* trailing */\n`;
    const hash = compile(SMALL).hash;
    expect(compile(compact).hash).toBe(hash);
    expect(compile(commented).hash).toBe(hash);
  });
});

describe('catalog-hash: sensitivity', () => {
  const base = compile(SMALL).hash;

  it('changes when an attribute value changes', () => {
    expect(compile(SMALL.replace("'0644'", "'0600'")).hash).not.toBe(base);
  });

  it('changes when an edge kind changes', () => {
    expect(compile(SMALL.replace('~>', '->')).hash).not.toBe(base);
  });

  it('changes when declaration order changes', () => {
    const swapped = "service { 'ssh': }\nfile { '/tmp/one': ensure => present, mode => '0644' }\nFile['/tmp/one'] ~> Service['ssh']\n";
    expect(compile(swapped).hash).not.toBe(base);
  });

  it('distinguishes a word from the same text quoted', () => {
    expect(compile("file { 'a': ensure => present }").hash).not.toBe(
      compile("file { 'a': ensure => 'present' }").hash,
    );
  });
});

describe('catalog-hash: canonicalize', () => {
  it('sorts object keys at every level', () => {
    expect(canonicalize({ b: 1, a: { d: [true, null], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[true,null]},"b":1}',
    );
  });
});

// ---------------------------------------------------------------------------
// catalog-printer
// ---------------------------------------------------------------------------

describe('catalog-printer: output', () => {
  it('prints declarations, then one chain per edge', () => {
    expect(printCatalog(compile(SMALL))).toBe(
      [
        "file { '/tmp/one':",
        '  ensure => present,',
        "  mode   => '0644',",
        '}',
        '',
        "service { 'ssh': }",
        '',
        "File['/tmp/one'] ~> Service['ssh']",
        '',
      ].join('\n'),
    );
  });

  it('prints metaparameter edges as chains', () => {
    expect(printCatalog(compile(METAPARAMETER_MANIFEST))).toBe(
      [
        "file { '/etc/ssh/sshd_config':",
        '  ensure => present,',
        '}',
        '',
        "service { 'ssh':",
        '  ensure => running,',
        '}',
        '',
        "exec { 'setup': }",
        '',
        "File['/etc/ssh/sshd_config'] ~> Service['ssh']",
        "File['/etc/ssh/sshd_config'] -> Service['ssh']",
        "Exec['setup'] -> Service['ssh']",
        "Exec['setup'] -> File['/etc/ssh/sshd_config']",
        '',
      ].join('\n'),
    );
  });

  it('prints an empty catalog as empty text', () => {
    expect(printCatalog(compile(''))).toBe('');
  });
});

describe('catalog-printer: round-trip', () => {
  it.each([
    ['sample', SAMPLE_MANIFEST],
    ['metaparameters', METAPARAMETER_MANIFEST],
    ['small', SMALL],
  ])('reproduces the %s catalog', (_name, source) => {
    const original = compile(source);
    const reprinted = compile(printCatalog(original));
    expect(shape(reprinted)).toEqual(shape(original));
    expect(reprinted.hash).toBe(original.hash);
  });

  it('is idempotent', () => {
    const once = printCatalog(compile(SAMPLE_MANIFEST));
    expect(printCatalog(compile(once))).toBe(once);
  });
});

// ---------------------------------------------------------------------------
// catalog-dot
// ---------------------------------------------------------------------------

describe('catalog-dot: output', () => {
  it('renders nodes in topological order and dashes notify edges', () => {
    const catalog = compile("service { 'ssh': }\nfile { '/tmp/one': }\nexec { 'x': }\nFile['/tmp/one'] ~> Service['ssh']\nExec['x'] -> File['/tmp/one']");
    expect(toDot(catalog)).toBe(
      [
        'digraph catalog {',
        '  n2 [label="Exec[\'x\']"];',
        '  n1 [label="File[\'/tmp/one\']"];',
        '  n0 [label="Service[\'ssh\']"];',
        '  n1 -> n0 [style=dashed, label="~>"];',
        '  n2 -> n1;',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('escapes double quotes in labels', () => {
    const dot = toDot(compile('exec { "/root/$dir": }'));
    expect(dot).toContain('  n0 [label="Exec[\\"/root/${dir}\\"]"];');
  });
});

// ---------------------------------------------------------------------------
// catalog-plan
// ---------------------------------------------------------------------------

describe('catalog-plan: steps', () => {
  it('lists predecessors and refresh sources per node in order', () => {
    expect(buildPlan(compile(METAPARAMETER_MANIFEST)).steps).toEqual([
      { node: 2, after: [], refreshedBy: [] },
      { node: 0, after: [2], refreshedBy: [] },
      { node: 1, after: [0, 2], refreshedBy: [0] },
    ]);
  });

  it('has one step per node', () => {
    const catalog = compile(SAMPLE_MANIFEST);
    const plan = buildPlan(catalog);
    expect(plan.steps.map((s) => s.node)).toEqual(catalog.order);
    expect(plan.steps.find((s) => s.node === 4)?.refreshedBy).toEqual([2, 3]);
  });
});
