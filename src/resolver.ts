import { CircularDependencyError, isResolutionError } from './errors';
import { buildGraph, compareNames } from './graph';
import { DependencyGraph, Manifest, ResolutionResult } from './types';

/**
 * Group components into build waves using Kahn's algorithm.
 *
 * Wave k holds every component whose requirements all sit in waves before k.
 * Components in the same wave can be built in parallel; waves run in sequence.
 *
 * @returns Array of waves, each sorted by name
 * @throws CircularDependencyError listing every component left unresolved
 */
export function planWaves(graph: DependencyGraph): string[][] {
  // Unbuilt dependency count per component
  const pending = new Map<string, number>();
  let ready: string[] = [];

  for (const name of graph.components.keys()) {
    const count = graph.deps.get(name)?.size ?? 0;
    pending.set(name, count);
    if (count === 0) {
      ready.push(name);
    }
  }

  const waves: string[][] = [];
  let resolved = 0;

  while (ready.length > 0) {
    const wave = ready.sort(compareNames);
    waves.push(wave);
    resolved += wave.length;
    ready = [];

    // Remove wave from graph and release the dependents it unblocks
    for (const node of wave) {
      for (const dependent of graph.rdeps.get(node) || []) {
        const remaining = (pending.get(dependent) ?? 0) - 1;
        pending.set(dependent, remaining);
        if (remaining === 0) {
          ready.push(dependent);
        }
      }
    }
  }

  if (resolved < graph.components.size) {
    const unresolved = [...pending]
      .filter(([, count]) => count > 0)
      .map(([name]) => name)
      .sort(compareNames);
    throw new CircularDependencyError(unresolved);
  }

  return waves;
}

/**
 * Linear build order: the waves of {@link planWaves} one after another.
 *
 * Ties are broken first by wave, then by name, so a component never waits
 * behind one that only became ready after it.
 */
export function topologicalOrder(graph: DependencyGraph): string[] {
  return planWaves(graph).flat();
}

/**
 * Resolve a manifest into its build order, dependencies before dependents.
 *
 * Resolution errors come back as values; anything else still propagates.
 */
export function resolveBuildOrder(manifest: Manifest): ResolutionResult {
  try {
    return { ok: true, order: topologicalOrder(buildGraph(manifest)) };
  } catch (error) {
    if (isResolutionError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function getBuildOrder(manifest: Manifest): string[] {
  const result = resolveBuildOrder(manifest);
  if (!result.ok) {
    throw result.error;
  }
  return result.order;
}
