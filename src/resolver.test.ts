import { describe, expect, it } from 'vitest';
import {
  CircularDependencyError,
  ManifestError,
  UnknownDependencyError,
  VersionMismatchError,
  isResolutionError,
} from './errors';
import { buildGraph } from './graph';
import { getBuildOrder, planWaves, resolveBuildOrder } from './resolver';
import { component, manifestOf } from './test-helpers';

describe('resolveBuildOrder', () => {
  it('orders a chain of requirements dependencies first', () => {
    const manifest = manifestOf(
      component('consensus', '0.1.0'),
      component('protocol', '0.1.0', 'consensus=0.1.0'),
      component('node', '0.1.0', 'protocol=0.1.0', 'consensus=0.1.0')
    );

    expect(resolveBuildOrder(manifest)).toEqual({
      ok: true,
      order: ['consensus', 'protocol', 'node'],
    });
  });

  it('puts independent components ahead of a dependent that sorts between them', () => {
    const manifest = manifestOf(
      component('consensus', '0.1.0'),
      component('sdk', '0.1.0'),
      component('protocol', '0.1.0', 'consensus=0.1.0')
    );

    expect(getBuildOrder(manifest)).toEqual(['consensus', 'sdk', 'protocol']);
  });

  it('fails on a two-component cycle', () => {
    const manifest = manifestOf(
      component('A', '0.1.0', 'B=0.1.0'),
      component('B', '0.1.0', 'A=0.1.0')
    );

    const result = resolveBuildOrder(manifest);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CircularDependencyError);
    expect(result.error.kind).toBe('circular-dependency');
    expect(result.error.message).toContain('Circular dependency');
    expect(result.error.message).toBe('Circular dependency detected among: A, B');
  });

  it('reports a version pin that does not match the declared version', () => {
    const manifest = manifestOf(
      component('consensus', '0.1.0'),
      component('protocol', '0.1.0', 'consensus=0.2.0')
    );

    const result = resolveBuildOrder(manifest);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(VersionMismatchError);
    expect(result.error).toMatchObject({
      requirer: 'protocol',
      dependency: 'consensus',
      expected: '0.2.0',
      actual: '0.1.0',
    });
    expect(result.error.message).toBe(
      'Version mismatch: protocol requires consensus=0.2.0, but the manifest declares consensus at version 0.1.0'
    );
  });

  it('reports a requirement on an undeclared component', () => {
    const manifest = manifestOf(component('protocol', '0.1.0', 'consensus=0.1.0'));

    const result = resolveBuildOrder(manifest);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownDependencyError);
    expect(result.error).toMatchObject({ requirer: 'protocol', missing: 'consensus' });
  });

  it('returns an empty order for an empty manifest', () => {
    expect(resolveBuildOrder(manifestOf())).toEqual({ ok: true, order: [] });
  });

  it('does not depend on declaration order', () => {
    const first = manifestOf(
      component('app', '1.0.0', 'lib-b=2.0.0', 'lib-a=1.0.0'),
      component('lib-a', '1.0.0', 'core=3.0.0'),
      component('lib-b', '2.0.0', 'core=3.0.0'),
      component('core', '3.0.0'),
      component('tools', '0.0.1')
    );
    const second = manifestOf(
      component('tools', '0.0.1'),
      component('core', '3.0.0'),
      component('lib-b', '2.0.0', 'core=3.0.0'),
      component('lib-a', '1.0.0', 'core=3.0.0'),
      component('app', '1.0.0', 'lib-a=1.0.0', 'lib-b=2.0.0')
    );

    const order = getBuildOrder(first);

    expect(order).toEqual(['core', 'tools', 'lib-a', 'lib-b', 'app']);
    expect(getBuildOrder(second)).toEqual(order);
    expect(getBuildOrder(first)).toEqual(order);
  });

  it('places every requirement before its requirer', () => {
    const manifest = manifestOf(
      component('gateway', '1.0.0', 'auth=1.0.0', 'storage=2.1.0'),
      component('auth', '1.0.0', 'crypto=0.9.0'),
      component('storage', '2.1.0', 'crypto=0.9.0', 'codec=1.2.0'),
      component('codec', '1.2.0'),
      component('crypto', '0.9.0', 'codec=1.2.0'),
      component('cli', '1.0.0', 'gateway=1.0.0')
    );

    const order = getBuildOrder(manifest);

    expect([...order].sort()).toEqual([...manifest.keys()].sort());
    for (const entry of manifest.values()) {
      for (const requirement of entry.requires) {
        expect(order.indexOf(requirement.name)).toBeLessThan(order.indexOf(entry.name));
      }
    }
  });
});

describe('getBuildOrder', () => {
  it('throws the resolution error', () => {
    const manifest = manifestOf(
      component('A', '0.1.0', 'B=0.1.0'),
      component('B', '0.1.0', 'A=0.1.0')
    );

    expect(() => getBuildOrder(manifest)).toThrow(/Circular dependency/);
  });
});

describe('planWaves', () => {
  it('groups components that become ready together', () => {
    const graph = buildGraph(
      manifestOf(
        component('app', '1.0.0', 'lib-a=1.0.0', 'lib-b=2.0.0'),
        component('lib-a', '1.0.0', 'core=3.0.0'),
        component('lib-b', '2.0.0', 'core=3.0.0'),
        component('core', '3.0.0'),
        component('tools', '0.0.1')
      )
    );

    expect(planWaves(graph)).toEqual([['core', 'tools'], ['lib-a', 'lib-b'], ['app']]);
  });

  it('sorts by code unit rather than locale', () => {
    const graph = buildGraph(
      manifestOf(component('beta', '1'), component('Zeta', '1'), component('alpha', '1'))
    );

    expect(planWaves(graph)).toEqual([['Zeta', 'alpha', 'beta']]);
  });

  it('lists components stuck behind a cycle as unresolved', () => {
    const graph = buildGraph(
      manifestOf(
        component('A', '0.1.0', 'B=0.1.0'),
        component('B', '0.1.0', 'A=0.1.0'),
        component('C', '0.1.0', 'A=0.1.0'),
        component('D', '0.1.0')
      )
    );

    let caught: unknown;
    try {
      planWaves(graph);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CircularDependencyError);
    expect(caught).toMatchObject({ members: ['A', 'B', 'C'] });
  });

  it('treats a component requiring itself as a cycle', () => {
    const graph = buildGraph(manifestOf(component('solo', '1.0.0', 'solo=1.0.0')));

    expect(() => planWaves(graph)).toThrow('Circular dependency detected among: solo');
  });
});

describe('isResolutionError', () => {
  it('accepts only resolution failures', () => {
    expect(isResolutionError(new CircularDependencyError(['a']))).toBe(true);
    expect(isResolutionError(new UnknownDependencyError('a', 'b'))).toBe(true);
    expect(isResolutionError(new ManifestError('broken'))).toBe(false);
    expect(isResolutionError(new Error('other'))).toBe(false);
  });
});
