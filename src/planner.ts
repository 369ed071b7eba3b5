import { buildGraph } from './graph';
import { planWaves } from './resolver';
import { BuildPlan, Manifest } from './types';

/**
 * Create a complete build plan (linear order plus parallel waves) for a manifest.
 */
export function createBuildPlan(manifest: Manifest): BuildPlan {
  const waves = planWaves(buildGraph(manifest));

  return {
    order: waves.flat(),
    waves,
  };
}

/**
 * Format a build plan as a human-readable string.
 */
export function formatBuildPlan(plan: BuildPlan): string {
  const lines: string[] = [];

  lines.push(`Build order: ${plan.order.join(', ')}`);
  lines.push('');
  lines.push('Build Plan:');

  plan.waves.forEach((wave, i) => {
    const parallelNote = wave.length > 1 ? ' (parallel)' : '';
    lines.push(`  Wave ${i + 1}${parallelNote}: ${wave.join(', ')}`);
  });

  lines.push('');
  lines.push(`Total: ${plan.order.length} components in ${plan.waves.length} waves`);

  return lines.join('\n');
}
