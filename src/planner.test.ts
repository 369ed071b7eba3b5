import { describe, expect, it } from 'vitest';
import { CircularDependencyError, VersionMismatchError } from './errors';
import { createBuildPlan, formatBuildPlan } from './planner';
import { component, manifestOf } from './test-helpers';

const parallelRoots = () =>
  manifestOf(
    component('consensus', '0.1.0'),
    component('sdk', '0.1.0'),
    component('protocol', '0.1.0', 'consensus=0.1.0')
  );

describe('createBuildPlan', () => {
  it('returns the order together with its waves', () => {
    expect(createBuildPlan(parallelRoots())).toEqual({
      order: ['consensus', 'sdk', 'protocol'],
      waves: [['consensus', 'sdk'], ['protocol']],
    });
  });

  it('throws resolution errors', () => {
    expect(() =>
      createBuildPlan(manifestOf(component('A', '1', 'B=1'), component('B', '1', 'A=1')))
    ).toThrow(CircularDependencyError);
    expect(() =>
      createBuildPlan(manifestOf(component('A', '1'), component('B', '1', 'A=2')))
    ).toThrow(VersionMismatchError);
  });
});

describe('formatBuildPlan', () => {
  it('marks waves that can build in parallel', () => {
    expect(formatBuildPlan(createBuildPlan(parallelRoots()))).toBe(
      [
        'Build order: consensus, sdk, protocol',
        '',
        'Build Plan:',
        '  Wave 1 (parallel): consensus, sdk',
        '  Wave 2: protocol',
        '',
        'Total: 3 components in 2 waves',
      ].join('\n')
    );
  });

  it('renders an empty plan', () => {
    expect(formatBuildPlan({ order: [], waves: [] })).toBe(
      ['Build order: ', '', 'Build Plan:', '', 'Total: 0 components in 0 waves'].join('\n')
    );
  });
});
