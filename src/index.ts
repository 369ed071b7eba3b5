export * from './errors';
export * from './types';
export { createManifest, loadManifest, parseManifest, parseRequirement, DEFAULT_TABLE } from './manifest';
export { buildGraph, detectCycles, formatGraph } from './graph';
export { getBuildOrder, planWaves, resolveBuildOrder, topologicalOrder } from './resolver';
export { createBuildPlan, formatBuildPlan } from './planner';
export { loadBuildchainConfig, resolveManifestPath, DEFAULT_MANIFEST } from './config';
