export type ResolutionErrorKind =
  | 'unknown-dependency'
  | 'version-mismatch'
  | 'circular-dependency';

/**
 * Base class for failures of a build-order resolution.
 * Always terminal: no partial order is produced alongside one.
 */
export abstract class ResolutionError extends Error {
  abstract readonly kind: ResolutionErrorKind;
}

export class UnknownDependencyError extends ResolutionError {
  readonly kind = 'unknown-dependency' as const;

  constructor(
    readonly requirer: string,
    readonly missing: string
  ) {
    super(`Unknown dependency: ${requirer} requires "${missing}", which is not declared in the manifest`);
    this.name = 'UnknownDependencyError';
  }
}

export class VersionMismatchError extends ResolutionError {
  readonly kind = 'version-mismatch' as const;

  constructor(
    readonly requirer: string,
    readonly dependency: string,
    /** Version pinned by the requirement */
    readonly expected: string,
    /** Version declared by the dependency itself */
    readonly actual: string
  ) {
    super(
      `Version mismatch: ${requirer} requires ${dependency}=${expected}, ` +
      `but the manifest declares ${dependency} at version ${actual}`
    );
    this.name = 'VersionMismatchError';
  }
}

export class CircularDependencyError extends ResolutionError {
  readonly kind = 'circular-dependency' as const;

  constructor(readonly members: string[]) {
    super(`Circular dependency detected among: ${members.join(', ')}`);
    this.name = 'CircularDependencyError';
  }
}

export type ResolutionFailure =
  | UnknownDependencyError
  | VersionMismatchError
  | CircularDependencyError;

export function isResolutionError(value: unknown): value is ResolutionFailure {
  return (
    value instanceof UnknownDependencyError ||
    value instanceof VersionMismatchError ||
    value instanceof CircularDependencyError
  );
}

// Malformed input or an unreadable file; raised before any resolution starts
export class ManifestError extends Error {
  constructor(
    message: string,
    readonly file?: string
  ) {
    super(file ? `${file}: ${message}` : message);
    this.name = 'ManifestError';
  }
}
