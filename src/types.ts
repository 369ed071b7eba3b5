import type { ResolutionFailure } from './errors';

// A requirement pins another component at an exact version ("name=version")
export interface Requirement {
  name: string;
  version: string;
}

export interface Component {
  name: string;
  /** Opaque; compared only for equality against requirements */
  version: string;
  /** Passed through unchanged */
  gitTag?: string;
  requires: readonly Requirement[];
}

export type Manifest = ReadonlyMap<string, Component>;

export interface DependencyGraph {
  components: Manifest;
  deps: Map<string, Set<string>>;
  rdeps: Map<string, Set<string>>;
}

export type ResolutionResult =
  | { ok: true; order: string[] }
  | { ok: false; error: ResolutionFailure };

export interface BuildPlan {
  order: string[];
  waves: string[][];
}

export interface BuildchainConfig {
  manifest: string;
  table: string;
}

export interface CommandOptions {
  root: string;
  manifest?: string;
  table?: string;
  verbose?: boolean;
}

export interface OutputOptions extends CommandOptions {
  json?: boolean;
}
