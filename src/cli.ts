import { Command } from 'commander';
import * as path from 'path';
import { loadBuildchainConfig, resolveManifestPath } from './config';
import { ManifestError } from './errors';
import { buildGraph, compareNames, detectCycles, formatGraph } from './graph';
import { createProgressLog } from './log';
import { loadManifest } from './manifest';
import { createBuildPlan, formatBuildPlan } from './planner';
import { getBuildOrder } from './resolver';
import { CommandOptions, Manifest, OutputOptions } from './types';

interface LoadedManifest {
  file: string;
  manifest: Manifest;
}

function load(options: CommandOptions): LoadedManifest {
  const log = createProgressLog(options.verbose ?? false);
  const root = path.resolve(options.root);
  const config = loadBuildchainConfig(root);
  const file = resolveManifestPath(root, config, options.manifest);
  const table = options.table ?? config.table;

  log(`Reading [${table}] from ${file}`);
  const manifest = loadManifest(file, table);
  log(`Loaded ${manifest.size} components`);

  return { file, manifest };
}

// Failures are reported, never thrown past the command
function run(action: () => void): void {
  try {
    action();
  } catch (error) {
    console.error('Error:', (error as Error).message);
    process.exitCode = 1;
  }
}

function withManifestOptions(command: Command): Command {
  return command
    .option('-r, --root <path>', 'Project root directory', process.cwd())
    .option('-m, --manifest <file>', 'Manifest file (default: buildchain.manifest in package.json, or versions.toml)')
    .option('--table <name>', 'Manifest table that lists the components')
    .option('--verbose', 'Show progress output');
}

function describeList(items: string[]): string {
  return items.length > 0 ? items.join(', ') : '(none)';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('buildchain')
    .description('Resolve a pinned multi-component version manifest into a deterministic build order')
    .version('0.1.0');

  withManifestOptions(
    program
      .command('order')
      .description('Print the build order, dependencies first')
      .option('--json', 'Print the order as a JSON array')
  ).action((options: OutputOptions) => {
    run(() => {
      const { manifest } = load(options);
      const order = getBuildOrder(manifest);

      if (options.json) {
        console.log(JSON.stringify(order));
        return;
      }
      for (const name of order) {
        console.log(name);
      }
    });
  });

  withManifestOptions(
    program
      .command('plan')
      .description('Show the build order and the waves that could build in parallel')
      .option('--json', 'Print the plan as JSON')
  ).action((options: OutputOptions) => {
    run(() => {
      const { manifest } = load(options);
      const plan = createBuildPlan(manifest);

      console.log(options.json ? JSON.stringify(plan, null, 2) : formatBuildPlan(plan));
    });
  });

  withManifestOptions(
    program
      .command('analyze')
      .description('Show the dependency graph and any cycles')
  ).action((options: CommandOptions) => {
    run(() => {
      const { file, manifest } = load(options);
      console.log(`Analyzing manifest: ${file}\n`);

      const graph = buildGraph(manifest);

      console.log('Dependency Graph:');
      console.log(formatGraph(graph));
      console.log();

      const cycles = detectCycles(graph);
      if (cycles) {
        console.log('Cycles detected:');
        for (const cycle of cycles) {
          console.log(`  ${cycle.join(' -> ')}`);
        }
        process.exitCode = 1;
      } else {
        console.log('No cycles detected');
      }
    });
  });

  withManifestOptions(
    program
      .command('check')
      .description('Validate requirements and ordering without printing the order')
  ).action((options: CommandOptions) => {
    run(() => {
      const { manifest } = load(options);
      const plan = createBuildPlan(manifest);

      console.log(`Manifest OK: ${plan.order.length} components in ${plan.waves.length} waves`);
    });
  });

  withManifestOptions(
    program
      .command('show')
      .description('Show one component with its requirements and dependents')
      .argument('<component>', 'Component name')
  ).action((name: string, options: CommandOptions) => {
    run(() => {
      const { manifest } = load(options);
      const component = manifest.get(name);
      if (!component) {
        throw new ManifestError(`Unknown component "${name}"`);
      }

      const graph = buildGraph(manifest);
      const dependents = [...(graph.rdeps.get(name) || [])].sort(compareNames);

      console.log(`${component.name}@${component.version}`);
      console.log(`  git tag: ${component.gitTag ?? '(none)'}`);
      console.log(`  requires: ${describeList(component.requires.map((r) => `${r.name}=${r.version}`))}`);
      console.log(`  required by: ${describeList(dependents)}`);
    });
  });

  return program;
}
