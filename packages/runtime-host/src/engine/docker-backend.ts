/**
 * Slipway Runtime Host — Docker CLI Build Backend
 *
 * Implements the kernel's BuildBackend by driving the docker CLI (or any
 * CLI-compatible engine, e.g. podman) through the ExecAdapter. Each plan
 * step becomes one committed layer image named
 * `slipway-layer:<key12>-<build>`. The tag namespace is shared by every
 * project on the engine; the build suffix keeps a failed run's `rmi` away
 * from layers that another build, or another project's cache, refers to.
 *
 *   from      pull, then tag as the layer
 *   env, workdir, user, cmd
 *             create a container, commit with `--change <directive>`
 *   run       create with `--user 0`, start attached, commit
 *   copy      stage the selected files on the host, create, `cp`, commit
 *
 * Instructions within one step are applied in order; all but the last
 * produce temporary images that are untagged once the step commits.
 * Containers are always removed, whether the instruction succeeded or not.
 */

import { posix } from 'node:path';
import {
  BuildError,
  BuildErrorKind,
  renderInstruction,
  toBuildError,
  type BuildBackend,
  type ExecAdapter,
  type ExecResult,
  type Instruction,
  type LayerRef,
  type PlanStep,
  type StepContext,
  type StepResult,
} from '@slipway/kernel';
import { stageCopy } from '../context/stage.js';
import { inspectImageConfig } from './image-config.js';

export const LAYER_REPOSITORY = 'slipway-layer';

export interface DockerBackendOptions {
  /** Engine binary. Default `docker`. */
  readonly engine?: string | undefined;
  /** Repository used for layer images. */
  readonly repository?: string | undefined;
}

type MetadataInstruction = Extract<Instruction, { readonly kind: 'env' | 'workdir' | 'user' | 'cmd' }>;

/** Resolve a copy destination against the image working directory. */
export function resolveDestination(workdir: string, dest: string): string {
  const joined = dest.startsWith('/') ? posix.normalize(dest) : posix.join(workdir, dest);
  return joined.length > 1 ? joined.replace(/\/+$/, '') : joined;
}

/** Tag for the layer a build commits for a step key. */
export function layerTag(key: string, buildId: string): string {
  const build = buildId.replace(/[^A-Za-z0-9_.-]/g, '-').slice(0, 64);
  return `${key.slice(0, 12)}-${build}`;
}

/** One `--change` directive per variable; commit takes no line continuations. */
export function commitChanges(instruction: MetadataInstruction): string[] {
  if (instruction.kind !== 'env') return [renderInstruction(instruction)];
  return Object.entries(instruction.vars).map(([name, value]) =>
    renderInstruction({ kind: 'env', vars: { [name]: value } }),
  );
}

export class DockerCliBackend implements BuildBackend {
  private readonly engine: string;
  private readonly repository: string;

  constructor(
    private readonly exec: ExecAdapter,
    options: DockerBackendOptions = {},
  ) {
    this.engine = options.engine ?? 'docker';
    this.repository = options.repository ?? LAYER_REPOSITORY;
  }

  layerName(ctx: StepContext): string {
    return `${this.repository}:${layerTag(ctx.key, ctx.buildId)}`;
  }

  async apply(step: PlanStep, parent: LayerRef | null, ctx: StepContext): Promise<StepResult> {
    const layer = this.layerName(ctx);
    const temporary: string[] = [];
    let current = parent?.id ?? null;

    try {
      for (const [index, instruction] of step.instructions.entries()) {
        const target = index === step.instructions.length - 1 ? layer : `${layer}-${index}`;
        await this.applyInstruction(step, instruction, current, target, ctx);
        if (target !== layer) temporary.push(target);
        current = target;
      }
    } catch (err: unknown) {
      return { ok: false, error: toBuildError(err, step.failure) };
    } finally {
      if (temporary.length > 0) await this.removeTemporary(temporary);
    }

    if (current !== layer) {
      return {
        ok: false,
        error: new BuildError(step.failure, `${step.state} has no instructions to apply`),
      };
    }
    return { ok: true, layer: { id: layer } };
  }

  async exists(layer: LayerRef): Promise<boolean> {
    const result = await this.engineRun(['image', 'inspect', '--format', '{{.Id}}', layer.id]);
    return result.exitCode === 0;
  }

  async tag(layer: LayerRef, tag: string): Promise<void> {
    const result = await this.engineRun(['tag', layer.id, tag]);
    this.check(result, BuildErrorKind.FilesystemCopy, `failed to tag ${layer.id} as ${tag}`);
  }

  async discard(layers: ReadonlyArray<LayerRef>): Promise<void> {
    if (layers.length === 0) return;
    const result = await this.engineRun(['rmi', ...layers.map((l) => l.id)]);
    if (result.exitCode !== 0) {
      throw new Error(`${this.engine} rmi exited with status ${result.exitCode}: ${result.stderr.trim()}`);
    }
  }

  // -------------------------------------------------------------------------
  // Instructions
  // -------------------------------------------------------------------------

  private async applyInstruction(
    step: PlanStep,
    instruction: Instruction,
    parent: string | null,
    target: string,
    ctx: StepContext,
  ): Promise<void> {
    if (instruction.kind === 'from') {
      const pulled = await this.engineRun(['pull', instruction.image]);
      this.check(pulled, step.failure, `failed to pull base image "${instruction.image}"`);
      const tagged = await this.engineRun(['tag', instruction.image, target]);
      this.check(tagged, step.failure, `failed to tag base image "${instruction.image}"`);
      return;
    }

    if (parent === null) {
      throw new BuildError(step.failure, `${step.state} has no parent layer`);
    }

    switch (instruction.kind) {
      case 'env':
      case 'workdir':
      case 'user':
      case 'cmd': {
        const changes = commitChanges(instruction);
        await this.withContainer(step, [parent], async (cid) => {
          await this.commit(step, cid, changes, target);
        });
        return;
      }
      case 'run':
        await this.runPrivileged(step, instruction.argv, parent, target);
        return;
      case 'copy':
        await this.copyInto(step, instruction.sources, instruction.dest, parent, target, ctx);
        return;
    }
  }

  private async runPrivileged(
    step: PlanStep,
    argv: ReadonlyArray<string>,
    parent: string,
    target: string,
  ): Promise<void> {
    // create --user 0 is recorded in the committed config; restore the
    // parent's user and command so only the filesystem change carries over.
    const config = await inspectImageConfig(this.exec, this.engine, parent);
    const restore = [`USER ${config.user === '' ? 'root' : config.user}`];
    if (config.cmd.length > 0) restore.push(renderInstruction({ kind: 'cmd', argv: config.cmd }));

    await this.withContainer(step, ['--user', '0', parent, ...argv], async (cid) => {
      const started = await this.engineRun(['start', '--attach', cid]);
      if (started.exitCode !== 0) {
        const output = started.stderr.trim() !== '' ? started.stderr : started.stdout;
        throw new BuildError(
          step.failure,
          `"${argv.join(' ')}" exited with status ${started.exitCode}`,
          output.trim(),
        );
      }
      await this.commit(step, cid, restore, target);
    });
  }

  private async copyInto(
    step: PlanStep,
    sources: ReadonlyArray<string>,
    dest: string,
    parent: string,
    target: string,
    ctx: StepContext,
  ): Promise<void> {
    const staged = await stageCopy(ctx.contextDir, sources, ctx.ignore);
    try {
      await this.withContainer(step, [parent], async (cid) => {
        const destination = resolveDestination(ctx.workdir, dest);
        const copied = await this.engineRun(['cp', `${staged.dir}/.`, `${cid}:${destination}`]);
        this.check(copied, BuildErrorKind.FilesystemCopy, `failed to copy ${sources.join(', ')} to ${destination}`);
        await this.commit(step, cid, [], target);
      });
    } finally {
      await staged.cleanup();
    }
  }

  // -------------------------------------------------------------------------
  // Engine helpers
  // -------------------------------------------------------------------------

  private async withContainer(
    step: PlanStep,
    createArgs: ReadonlyArray<string>,
    body: (cid: string) => Promise<void>,
  ): Promise<void> {
    const created = await this.engineRun(['create', ...createArgs]);
    this.check(created, step.failure, `failed to create a container for ${step.state}`);
    const cid = created.stdout.trim();
    try {
      await body(cid);
    } finally {
      await this.engineRun(['rm', '--force', cid]);
    }
  }

  private async commit(step: PlanStep, cid: string, changes: ReadonlyArray<string>, target: string): Promise<void> {
    const args = ['commit', ...changes.flatMap((c) => ['--change', c]), cid, target];
    const committed = await this.engineRun(args);
    this.check(committed, step.failure, `failed to commit ${step.state}`);
  }

  /** Untag temporary images. The final layer still references their content. */
  private async removeTemporary(images: ReadonlyArray<string>): Promise<void> {
    const result = await this.engineRun(['rmi', ...images]);
    if (result.exitCode !== 0) {
      // eslint-disable-next-line no-console
      console.error(`[slipway] warning: could not remove ${images.join(', ')}: ${result.stderr.trim()}`);
    }
  }

  private engineRun(args: ReadonlyArray<string>): Promise<ExecResult> {
    return this.exec.run(this.engine, args, {});
  }

  private check(result: ExecResult, kind: BuildErrorKind, message: string): void {
    if (result.exitCode !== 0) {
      throw new BuildError(kind, message, result.stderr.trim());
    }
  }
}
