/**
 * Slipway Kernel — Build Result and Error Types
 *
 * Every step is fail-fast and non-recoverable. A step either produces a
 * layer or a BuildError; the runner stops at the first error, discards the
 * layers created during the run, and never tags a partial image.
 */

import type { PipelineState } from './plan.js';
import type { LayerKey, LayerRef } from './layer.js';

// ---------------------------------------------------------------------------
// Error Taxonomy
// ---------------------------------------------------------------------------

export enum BuildErrorKind {
  /** The recipe or its manifest failed validation before any step ran. */
  InvalidRecipe = 'InvalidRecipe',
  /** The base image reference could not be resolved or pulled. */
  UnresolvableBase = 'UnresolvableBase',
  /** Creating the system group or user failed (e.g. name collision). */
  IdentityConflict = 'IdentityConflict',
  /** Package resolution or installation failed. */
  DependencyInstall = 'DependencyInstall',
  /** Copying files or committing a layer failed. */
  FilesystemCopy = 'FilesystemCopy',
  /** A privileged operation was ordered after privileges were dropped. */
  PrivilegeViolation = 'PrivilegeViolation',
  /** The container's entrypoint process could not be started. */
  EntrypointStart = 'EntrypointStart',
  /** The container engine binary is missing or not responding. */
  EngineUnavailable = 'EngineUnavailable',
}

/**
 * A classified pipeline failure.
 *
 * `detail` carries the failing operation's native diagnostic (typically the
 * engine command's stderr) so the operator sees it unmodified.
 */
export class BuildError extends Error {
  constructor(
    readonly kind: BuildErrorKind,
    message: string,
    readonly detail: string = '',
    readonly state: PipelineState | null = null,
  ) {
    super(message);
    this.name = 'BuildError';
  }

  /** Return a copy attributed to the given pipeline state. */
  atState(state: PipelineState): BuildError {
    return new BuildError(this.kind, this.message, this.detail, state);
  }
}

// ---------------------------------------------------------------------------
// Step and Build Results
// ---------------------------------------------------------------------------

export type StepResult =
  | { readonly ok: true; readonly layer: LayerRef }
  | { readonly ok: false; readonly error: BuildError };

export interface StepReport {
  readonly state: PipelineState;
  readonly key: LayerKey;
  readonly cached: boolean;
  readonly durationMs: number;
}

export type BuildOutcome =
  | {
      readonly ok: true;
      readonly buildId: string;
      readonly tag: string;
      readonly layer: LayerRef;
      readonly steps: ReadonlyArray<StepReport>;
    }
  | {
      readonly ok: false;
      readonly buildId: string;
      /** Last state reached before the failure, or null if none was. */
      readonly state: PipelineState | null;
      readonly error: BuildError;
      readonly steps: ReadonlyArray<StepReport>;
    };

/**
 * Normalize anything thrown by a backend into a BuildError.
 *
 * BuildErrors pass through unchanged; other errors take the fallback kind,
 * except a spawn ENOENT, which means the engine binary is missing.
 */
export function toBuildError(err: unknown, fallback: BuildErrorKind): BuildError {
  if (err instanceof BuildError) return err;
  if (err instanceof Error) {
    const code = 'code' in err ? err.code : undefined;
    const kind = code === 'ENOENT' ? BuildErrorKind.EngineUnavailable : fallback;
    return new BuildError(kind, err.message);
  }
  return new BuildError(fallback, String(err));
}
