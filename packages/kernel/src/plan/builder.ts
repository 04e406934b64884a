/**
 * Slipway Kernel — Plan Builder
 *
 * Derives the eight-step bootstrap plan from a recipe.
 *
 * Privilege de-escalation is a one-way transition enforced by the type of the
 * builder: PlanBuilder<'privileged'> offers step() and dropPrivileges();
 * PlanBuilder<'restricted'> only offers declare(), which accepts no `run`,
 * `from` or `user` instruction. A plan that would re-escalate does not
 * compile. Plans assembled by hand are checked at run time by
 * assertPrivilegeOrder().
 */

import { BuildError, BuildErrorKind } from '../types/build.js';
import {
  PipelineState,
  type BuildPlan,
  type Instruction,
  type PlanStep,
  type PrivilegeStage,
  type RestrictedInstruction,
} from '../types/plan.js';
import type { IdentitySpec, ImageRecipe } from '../types/recipe.js';
import { runtimeEnvironment } from '../recipe/runtime-flags.js';

export class PlanBuilder<S extends PrivilegeStage> {
  private constructor(
    private readonly steps: ReadonlyArray<PlanStep>,
    readonly stage: S,
  ) {}

  /** Start a plan at BaseSelected. */
  static from(image: string): PlanBuilder<'privileged'> {
    return new PlanBuilder<'privileged'>(
      [
        {
          state: PipelineState.BaseSelected,
          instructions: [{ kind: 'from', image }],
          failure: BuildErrorKind.UnresolvableBase,
        },
      ],
      'privileged',
    );
  }

  step(
    this: PlanBuilder<'privileged'>,
    state: PipelineState,
    failure: BuildErrorKind,
    instructions: ReadonlyArray<Instruction>,
  ): PlanBuilder<'privileged'> {
    return new PlanBuilder<'privileged'>([...this.steps, { state, instructions, failure }], 'privileged');
  }

  /** Switch the effective identity. There is no way back. */
  dropPrivileges(this: PlanBuilder<'privileged'>, user: string): PlanBuilder<'restricted'> {
    const step: PlanStep = {
      state: PipelineState.PrivilegeDropped,
      instructions: [{ kind: 'user', name: user }],
      failure: BuildErrorKind.FilesystemCopy,
    };
    return new PlanBuilder<'restricted'>([...this.steps, step], 'restricted');
  }

  declare(
    this: PlanBuilder<'restricted'>,
    state: PipelineState,
    failure: BuildErrorKind,
    instructions: ReadonlyArray<RestrictedInstruction>,
  ): PlanBuilder<'restricted'> {
    return new PlanBuilder<'restricted'>([...this.steps, { state, instructions, failure }], 'restricted');
  }

  build(
    this: PlanBuilder<'restricted'>,
    settings: { readonly ignore: ReadonlyArray<string>; readonly manifest: string; readonly workdir: string },
  ): BuildPlan {
    return { steps: this.steps, ...settings };
  }
}

// ---------------------------------------------------------------------------
// Bootstrap plan
// ---------------------------------------------------------------------------

/**
 * The identity provisioning command: a system group, then a system user in
 * that group with no home directory and no login shell.
 *
 * Account names are validated against a strict pattern before they reach
 * this point, so interpolating them into the shell string is safe.
 */
export function identityCommand(identity: IdentitySpec): ReadonlyArray<string> {
  const { group, user } = identity;
  return [
    'sh',
    '-c',
    `groupadd --system ${group} && ` +
      `useradd --system --gid ${group} --no-create-home --shell /usr/sbin/nologin ${user}`,
  ];
}

function basename(path: string): string {
  const parts = path.split('/').filter((p) => p !== '');
  return parts[parts.length - 1] ?? path;
}

/**
 * Build the bootstrap plan for a validated recipe.
 *
 * Order is fixed: the manifest is copied and installed before the source
 * tree, so the dependency layer's key depends on the manifest only.
 */
export function planBuild(recipe: ImageRecipe): BuildPlan {
  const manifestName = basename(recipe.dependencies.manifest);

  return PlanBuilder.from(recipe.base)
    .step(PipelineState.EnvConfigured, BuildErrorKind.FilesystemCopy, [
      { kind: 'env', vars: runtimeEnvironment(recipe.runtime) },
    ])
    .step(PipelineState.WorkdirSet, BuildErrorKind.FilesystemCopy, [
      { kind: 'workdir', path: recipe.workdir },
    ])
    .step(PipelineState.IdentityProvisioned, BuildErrorKind.IdentityConflict, [
      { kind: 'run', argv: identityCommand(recipe.identity), requires: 'privileged' },
    ])
    .step(PipelineState.DependenciesInstalled, BuildErrorKind.DependencyInstall, [
      { kind: 'copy', sources: [recipe.dependencies.manifest], dest: './', input: 'manifest' },
      { kind: 'run', argv: [...recipe.dependencies.installer, manifestName], requires: 'privileged' },
    ])
    .step(PipelineState.SourceCopied, BuildErrorKind.FilesystemCopy, [
      { kind: 'copy', sources: ['.'], dest: '.', input: 'context' },
    ])
    .dropPrivileges(recipe.identity.user)
    .declare(PipelineState.EntrypointDeclared, BuildErrorKind.FilesystemCopy, [
      { kind: 'cmd', argv: recipe.entrypoint },
    ])
    .build({
      ignore: recipe.source.ignore,
      manifest: recipe.dependencies.manifest,
      workdir: recipe.workdir,
    });
}

// ---------------------------------------------------------------------------
// Runtime check
// ---------------------------------------------------------------------------

/**
 * Reject a plan that runs a privileged instruction after a `user`
 * instruction, or whose final identity is the superuser.
 *
 * @throws {BuildError} PrivilegeViolation
 */
export function assertPrivilegeOrder(plan: BuildPlan): void {
  let dropped: PipelineState | null = null;
  let finalUser: string | null = null;

  for (const step of plan.steps) {
    for (const instruction of step.instructions) {
      if (instruction.kind === 'user') {
        dropped = step.state;
        finalUser = instruction.name;
      } else if (instruction.kind === 'run' && dropped !== null) {
        throw new BuildError(
          BuildErrorKind.PrivilegeViolation,
          `${step.state} runs "${instruction.argv.join(' ')}" after privileges were dropped at ${dropped}`,
          '',
          step.state,
        );
      }
    }
  }

  if (finalUser === null) {
    throw new BuildError(BuildErrorKind.PrivilegeViolation, 'plan never drops privileges');
  }
  const account = finalUser.split(':')[0] ?? finalUser;
  if (account === 'root' || account === '0') {
    throw new BuildError(
      BuildErrorKind.PrivilegeViolation,
      `plan drops privileges to the superuser identity "${finalUser}"`,
    );
  }
}
