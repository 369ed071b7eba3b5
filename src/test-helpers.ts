import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createManifest, parseRequirement } from './manifest';
import { Component, Manifest } from './types';

export function component(name: string, version: string, ...requires: string[]): Component {
  return { name, version, gitTag: `v${version}`, requires: requires.map(parseRequirement) };
}

export function manifestOf(...components: Component[]): Manifest {
  return createManifest(components);
}

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'buildchain-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
