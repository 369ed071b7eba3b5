import * as fs from 'fs';
import * as path from 'path';
import { ManifestError } from './errors';
import { DEFAULT_TABLE } from './manifest';
import { BuildchainConfig } from './types';

export const DEFAULT_MANIFEST = 'versions.toml';

interface RawBuildchainConfig {
  manifest: unknown;
  table: unknown;
}

function readField(raw: Partial<RawBuildchainConfig>, field: keyof RawBuildchainConfig, fallback: string): string {
  const value = raw[field];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new ManifestError(`"buildchain.${field}" must be a string`, 'package.json');
  }
  return value;
}

/**
 * Read the `buildchain` key of the root package.json.
 * Everything is optional; missing values fall back to defaults.
 */
export function loadBuildchainConfig(root: string): BuildchainConfig {
  const pkgJsonPath = path.join(root, 'package.json');
  const defaults: BuildchainConfig = { manifest: DEFAULT_MANIFEST, table: DEFAULT_TABLE };

  if (!fs.existsSync(pkgJsonPath)) {
    return defaults;
  }

  const pkg = JSON.parse(fs.readFileSync(pkgJsonPath, 'utf-8')) as {
    buildchain?: Partial<RawBuildchainConfig>;
  };
  const raw = pkg.buildchain;
  if (!raw) {
    return defaults;
  }

  return {
    manifest: readField(raw, 'manifest', defaults.manifest),
    table: readField(raw, 'table', defaults.table),
  };
}

export function resolveManifestPath(
  root: string,
  config: BuildchainConfig,
  override?: string
): string {
  return path.resolve(root, override ?? config.manifest);
}
