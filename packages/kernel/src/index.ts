/**
 * @slipway/kernel
 *
 * Slipway pipeline kernel: recipe model and validation, requirements
 * parsing, the eight-step bootstrap plan, layer cache keys, the fail-fast
 * pipeline runner, Dockerfile rendering, and image verification rules.
 *
 * This package is side-effect free. It imports no node:fs, node:child_process
 * or network API; node:crypto is used for hashing only. Engine, filesystem
 * and state implementations live in @slipway/runtime-host.
 */

// Types
export type {
  DependencySpec,
  IdentitySpec,
  ImageRecipe,
  RuntimeFlags,
  SourceSpec,
  ValidationError,
  ValidationResult,
} from './types/recipe.js';
export { DEFAULT_IGNORE, DEFAULT_RECIPE } from './types/recipe.js';

export type {
  BuildPlan,
  CopyInput,
  Instruction,
  InstructionKind,
  PlanStep,
  PrivilegeStage,
  RestrictedInstruction,
} from './types/plan.js';
export { PIPELINE_ORDER, PipelineState } from './types/plan.js';

export type { BuildOutcome, StepReport, StepResult } from './types/build.js';
export { BuildError, BuildErrorKind, toBuildError } from './types/build.js';

export type { LayerCache, LayerCacheEntry, LayerKey, LayerRef } from './types/layer.js';

export type { BuildEvent } from './types/event.js';
export { BuildEventType } from './types/event.js';

// Adapter interfaces (implementations live in runtime-host)
export type {
  BuildBackend,
  ContainerProbe,
  ExecAdapter,
  ExecOptions,
  ExecResult,
  ImageFacts,
  InstalledPackage,
  ProbeTarget,
  StepContext,
} from './adapters/index.js';

// Log sink interface (implementation lives in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export { BuildLogger } from './logging/build-log.js';

// Recipe
export type { ImageReference, ImageReferenceResult } from './recipe/image-ref.js';
export { formatImageReference, isPinned, parseImageReference } from './recipe/image-ref.js';
export { validateRecipe } from './recipe/validator.js';
export {
  NO_BYTECODE_VAR,
  UNBUFFERED_VAR,
  environmentArgs,
  runtimeEnvironment,
} from './recipe/runtime-flags.js';

// Requirements manifest
export type {
  ManifestError,
  ManifestOption,
  Requirement,
  RequirementsManifest,
  RequirementsParseResult,
  SpecifierOperator,
  VersionSpecifier,
} from './requirements/parser.js';
export { normalizeName, parseRequirements, pinnedVersions } from './requirements/parser.js';
export type { PackageVersion } from './requirements/version.js';
export { parseVersion, versionsMatch } from './requirements/version.js';

// Plan
export { PlanBuilder, assertPrivilegeOrder, identityCommand, planBuild } from './plan/builder.js';
export type { BuildInputs, StepKey } from './plan/cache-key.js';
export {
  canonicalJson,
  computeLayerKey,
  computeStepKeys,
  parseLayerKey,
  stepInput,
} from './plan/cache-key.js';

// Pipeline
export type { BuildRequest, PipelineOptions } from './pipeline/runner.js';
export { BuildPipeline } from './pipeline/runner.js';

// Outputs
export { renderDockerfile, renderDockerignore, renderInstruction } from './render/dockerfile.js';
export { createIgnoreMatcher, globToRegExp, isIgnored } from './ignore/patterns.js';
export type {
  VerificationCheck,
  VerificationCheckId,
  VerificationExpectations,
  VerificationReport,
} from './verify/checks.js';
export { expectationsFor, verifyImage } from './verify/checks.js';
