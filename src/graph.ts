import { UnknownDependencyError, VersionMismatchError } from './errors';
import { DependencyGraph, Manifest } from './types';

// Code-unit order, so the same names sort identically on every platform and locale
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function buildGraph(manifest: Manifest): DependencyGraph {
  const deps = new Map<string, Set<string>>();
  const rdeps = new Map<string, Set<string>>();

  // Initialize empty sets for all components
  for (const name of manifest.keys()) {
    deps.set(name, new Set());
    rdeps.set(name, new Set());
  }

  const names = [...manifest.keys()].sort(compareNames);

  // Build dependency edges, failing on the first invalid requirement
  for (const name of names) {
    const component = manifest.get(name);
    const componentDeps = deps.get(name);
    if (!component || !componentDeps) continue;

    for (const requirement of component.requires) {
      const dependency = manifest.get(requirement.name);
      const dependents = rdeps.get(requirement.name);

      if (!dependency || !dependents) {
        throw new UnknownDependencyError(name, requirement.name);
      }
      if (dependency.version !== requirement.version) {
        throw new VersionMismatchError(name, requirement.name, requirement.version, dependency.version);
      }

      // A requires B: A -> B
      componentDeps.add(requirement.name);
      // Reverse: B has dependent A
      dependents.add(name);
    }
  }

  return { components: manifest, deps, rdeps };
}

/**
 * Find every back edge reachable by depth-first search.
 *
 * Each cycle is returned as a closed path, e.g. `['a', 'b', 'a']`.
 * Used for reporting; ordering relies on {@link topologicalOrder} instead.
 */
export function detectCycles(graph: DependencyGraph): string[][] | null {
  const WHITE = 0;
  const GRAY = 1;
  const BLACK = 2;

  const color = new Map<string, number>();
  const cycles: string[][] = [];
  const names = [...graph.components.keys()].sort(compareNames);

  for (const name of names) {
    color.set(name, WHITE);
  }

  function dfs(node: string, path: string[]): void {
    color.set(node, GRAY);
    path.push(node);

    const nodeDeps = [...(graph.deps.get(node) || [])].sort(compareNames);
    for (const dep of nodeDeps) {
      const depColor = color.get(dep);

      if (depColor === GRAY) {
        // Back edge found - cycle detected
        const cycleStart = path.indexOf(dep);
        cycles.push([...path.slice(cycleStart), dep]);
      } else if (depColor === WHITE) {
        dfs(dep, path);
      }
    }

    path.pop();
    color.set(node, BLACK);
  }

  for (const name of names) {
    if (color.get(name) === WHITE) {
      dfs(name, []);
    }
  }

  return cycles.length > 0 ? cycles : null;
}

export function formatGraph(graph: DependencyGraph): string {
  const lines: string[] = [];

  const sortedComponents = [...graph.components.values()].sort((a, b) =>
    compareNames(a.name, b.name)
  );

  for (const component of sortedComponents) {
    const tag = component.gitTag ? `, ${component.gitTag}` : '';
    lines.push(`  ${component.name} (${component.version}${tag})`);

    const componentDeps = graph.deps.get(component.name) || new Set();
    if (componentDeps.size === 0) {
      lines.push('    (no dependencies)');
    } else {
      for (const dep of [...componentDeps].sort(compareNames)) {
        lines.push(`    -> ${dep}`);
      }
    }
  }

  return lines.join('\n');
}
