/**
 * Slipway Kernel — Build Plan Types
 *
 * A BuildPlan is the ordered list of pipeline steps derived from a recipe.
 * Each step advances the pipeline to exactly one PipelineState and carries
 * the typed instructions that produce its layer.
 *
 * The pipeline is strictly linear: no branching, no cycles, no rollback.
 */

import type { BuildErrorKind } from './build.js';

// ---------------------------------------------------------------------------
// Pipeline States
// ---------------------------------------------------------------------------

/**
 * States reached by the bootstrap pipeline, in order.
 */
export enum PipelineState {
  BaseSelected = 'BaseSelected',
  EnvConfigured = 'EnvConfigured',
  WorkdirSet = 'WorkdirSet',
  IdentityProvisioned = 'IdentityProvisioned',
  DependenciesInstalled = 'DependenciesInstalled',
  SourceCopied = 'SourceCopied',
  PrivilegeDropped = 'PrivilegeDropped',
  EntrypointDeclared = 'EntrypointDeclared',
}

export const PIPELINE_ORDER: ReadonlyArray<PipelineState> = [
  PipelineState.BaseSelected,
  PipelineState.EnvConfigured,
  PipelineState.WorkdirSet,
  PipelineState.IdentityProvisioned,
  PipelineState.DependenciesInstalled,
  PipelineState.SourceCopied,
  PipelineState.PrivilegeDropped,
  PipelineState.EntrypointDeclared,
];

// ---------------------------------------------------------------------------
// Privilege Lifecycle
// ---------------------------------------------------------------------------

/**
 * One-way privilege lifecycle. A plan starts privileged and may transition
 * to restricted exactly once; there is no transition back.
 */
export type PrivilegeStage = 'privileged' | 'restricted';

// ---------------------------------------------------------------------------
// Instructions
// ---------------------------------------------------------------------------

/** Which build input a copy instruction's cache key depends on. */
export type CopyInput = 'manifest' | 'context';

export type Instruction =
  | { readonly kind: 'from'; readonly image: string }
  | { readonly kind: 'env'; readonly vars: Readonly<Record<string, string>> }
  | { readonly kind: 'workdir'; readonly path: string }
  | {
      readonly kind: 'run';
      readonly argv: ReadonlyArray<string>;
      readonly requires: 'privileged';
    }
  | {
      readonly kind: 'copy';
      readonly sources: ReadonlyArray<string>;
      readonly dest: string;
      readonly input: CopyInput;
    }
  | { readonly kind: 'user'; readonly name: string }
  | { readonly kind: 'cmd'; readonly argv: ReadonlyArray<string> };

export type InstructionKind = Instruction['kind'];

/** Instructions permitted once privileges have been dropped. */
export type RestrictedInstruction = Exclude<
  Instruction,
  { readonly kind: 'run' } | { readonly kind: 'from' } | { readonly kind: 'user' }
>;

// ---------------------------------------------------------------------------
// Plan
// ---------------------------------------------------------------------------

export interface PlanStep {
  readonly state: PipelineState;
  readonly instructions: ReadonlyArray<Instruction>;
  /** Error kind reported when this step fails without a more specific kind. */
  readonly failure: BuildErrorKind;
}

export interface BuildPlan {
  readonly steps: ReadonlyArray<PlanStep>;
  /** Ignore patterns applied to context copies. */
  readonly ignore: ReadonlyArray<string>;
  /** Manifest path relative to the build context. */
  readonly manifest: string;
  /** Working directory inside the image; relative copy targets resolve here. */
  readonly workdir: string;
}
