/**
 * Slipway Kernel — Adapter Interfaces
 *
 * All engine and process side effects flow through these interfaces. The
 * kernel defines them; @slipway/runtime-host implements them against the
 * docker CLI and node:child_process. Tests inject in-process fakes.
 */

import type { StepResult } from '../types/build.js';
import type { LayerKey, LayerRef } from '../types/layer.js';
import type { PlanStep } from '../types/plan.js';

// ---------------------------------------------------------------------------
// Subprocess Execution
// ---------------------------------------------------------------------------

export interface ExecOptions {
  readonly cwd?: string | undefined;
  /**
   * Complete environment for the child. When omitted the child inherits the
   * parent environment; callers that need fixed flags pass them explicitly.
   */
  readonly env?: Readonly<Record<string, string>> | undefined;
  readonly timeoutMs?: number | undefined;
  /** Stream output to the parent's stdio instead of collecting it. */
  readonly inheritStdio?: boolean | undefined;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface ExecAdapter {
  /**
   * Spawn a process and wait for it to exit.
   *
   * Resolves with the exit code for any process that started. Rejects only
   * when the process could not be spawned (e.g. ENOENT).
   */
  run(
    command: string,
    args: ReadonlyArray<string>,
    options: ExecOptions,
  ): Promise<ExecResult>;
}

// ---------------------------------------------------------------------------
// Build Backend
// ---------------------------------------------------------------------------

export interface StepContext {
  readonly key: LayerKey;
  /**
   * Id of the build applying the step. Layers are named per build so that
   * discarding a failed run never touches a layer another build recorded.
   */
  readonly buildId: string;
  /** Absolute path of the build context on the host. */
  readonly contextDir: string;
  readonly ignore: ReadonlyArray<string>;
  /** Working directory inside the image. */
  readonly workdir: string;
}

/**
 * Executes plan steps against a container engine, one layer per step.
 */
export interface BuildBackend {
  /**
   * Apply one step on top of `parent` (null for the base step) and commit
   * the result as a new layer.
   */
  apply(step: PlanStep, parent: LayerRef | null, context: StepContext): Promise<StepResult>;
  /** Whether a previously committed layer still exists on the engine. */
  exists(layer: LayerRef): Promise<boolean>;
  tag(layer: LayerRef, tag: string): Promise<void>;
  /** Remove layers created by a failed run. */
  discard(layers: ReadonlyArray<LayerRef>): Promise<void>;
}

// ---------------------------------------------------------------------------
// Image Introspection
// ---------------------------------------------------------------------------

/** Installed package as reported by the interpreter's package lister. */
export interface InstalledPackage {
  readonly name: string;
  readonly version: string;
}

/** Facts collected from a built image for verification. */
export interface ImageFacts {
  readonly configUser: string;
  readonly configEnv: Readonly<Record<string, string>>;
  readonly configCmd: ReadonlyArray<string>;
  /** Configured ENTRYPOINT; empty when the image declares none. */
  readonly configEntrypoint: ReadonlyArray<string>;
  readonly configWorkdir: string;
  /** Effective uid of a process started from the image. */
  readonly effectiveUid: number;
  readonly packages: ReadonlyArray<InstalledPackage>;
  /** Paths of bytecode cache files or directories under the workdir. */
  readonly bytecodeArtifacts: ReadonlyArray<string>;
}

export interface ProbeTarget {
  /** Working directory inside the image to scan for bytecode caches. */
  readonly workdir: string;
  /** Interpreter used to list installed packages, e.g. `python`. */
  readonly interpreter: string;
}

export interface ContainerProbe {
  inspect(tag: string, target: ProbeTarget): Promise<ImageFacts>;
}
