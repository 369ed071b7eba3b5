import * as fs from 'fs';
import * as TOML from 'smol-toml';
import { ManifestError } from './errors';
import { Component, Manifest, Requirement } from './types';

export const DEFAULT_TABLE = 'versions';

// Raw entry as it appears in versions.toml:
//   bllvm-node = { version = "0.1.0", git_tag = "v0.1.0", requires = ["a=0.1.0"] }
interface RawComponent {
  version: unknown;
  git_tag: unknown;
  requires: unknown;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

export function createManifest(components: Iterable<Component>): Manifest {
  const entries = new Map<string, Component>();

  for (const component of components) {
    if (entries.has(component.name)) {
      throw new ManifestError(`Duplicate component "${component.name}"`);
    }
    entries.set(
      component.name,
      Object.freeze({
        ...component,
        requires: Object.freeze(component.requires.map((r) => Object.freeze({ ...r }))),
      })
    );
  }

  return entries;
}

export function parseRequirement(spec: string): Requirement {
  const separator = spec.indexOf('=');
  if (separator === -1) {
    throw new ManifestError(`Invalid requirement "${spec}": expected "name=version"`);
  }

  const name = spec.slice(0, separator).trim();
  const version = spec.slice(separator + 1).trim();

  if (!name || !version) {
    throw new ManifestError(`Invalid requirement "${spec}": expected "name=version"`);
  }

  return { name, version };
}

function normalizeComponent(name: string, raw: Partial<RawComponent>): Component {
  if (typeof raw.version !== 'string') {
    throw new ManifestError(`Component "${name}" is missing a string "version"`);
  }

  const requires: Requirement[] = [];
  const component: Component = { name, version: raw.version, requires };

  if (raw.git_tag !== undefined) {
    if (typeof raw.git_tag !== 'string') {
      throw new ManifestError(`Component "${name}" has a non-string "git_tag"`);
    }
    component.gitTag = raw.git_tag;
  }

  if (raw.requires !== undefined) {
    if (!Array.isArray(raw.requires)) {
      throw new ManifestError(`Component "${name}" has a non-array "requires"`);
    }
    for (const spec of raw.requires) {
      if (typeof spec !== 'string') {
        throw new ManifestError(`Component "${name}" has a non-string requirement`);
      }
      requires.push(parseRequirement(spec));
    }
  }

  return component;
}

export function parseManifest(
  document: Record<string, unknown>,
  table: string = DEFAULT_TABLE
): Manifest {
  const entries = document[table];

  if (entries === undefined) {
    throw new ManifestError(`No [${table}] table found`);
  }
  if (!isTable(entries)) {
    throw new ManifestError(`[${table}] must be a table of components`);
  }

  const components: Component[] = [];
  for (const [name, raw] of Object.entries(entries)) {
    if (!isTable(raw)) {
      throw new ManifestError(`Component "${name}" must be a table`);
    }
    components.push(normalizeComponent(name, raw));
  }

  return createManifest(components);
}

export function loadManifest(file: string, table: string = DEFAULT_TABLE): Manifest {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ManifestError(`Cannot read manifest: ${(error as Error).message}`, file);
  }

  let document: Record<string, unknown>;
  try {
    document = TOML.parse(content);
  } catch (error) {
    throw new ManifestError(`Invalid TOML: ${(error as Error).message}`, file);
  }

  try {
    return parseManifest(document, table);
  } catch (error) {
    if (error instanceof ManifestError && error.file === undefined) {
      throw new ManifestError(error.message, file);
    }
    throw error;
  }
}
