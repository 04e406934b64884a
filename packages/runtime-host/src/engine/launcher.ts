/**
 * Slipway Runtime Host — Container Launcher
 *
 * Starts the image's entrypoint as the container's first process. The
 * runtime flags are passed explicitly with `-e`, never picked up from the
 * caller's environment; secrets arrive through an optional `--env-file`.
 *
 * The engine reserves exit statuses 125 (the engine failed), 126 (the
 * command could not be invoked) and 127 (the command was not found); these
 * are reported as EntrypointStart. Any other status is the application's
 * and is returned to the caller.
 */

import {
  BuildError,
  BuildErrorKind,
  environmentArgs,
  toBuildError,
  type ExecAdapter,
  type ExecResult,
} from '@slipway/kernel';

const ENGINE_RESERVED_EXITS: ReadonlySet<number> = new Set([125, 126, 127]);

export interface LaunchOptions {
  /** Fixed environment, normally runtimeEnvironment(recipe.runtime). */
  readonly env: Readonly<Record<string, string>>;
  readonly envFile?: string | undefined;
  /** Replaces the image's default command. */
  readonly command?: ReadonlyArray<string> | undefined;
}

export class ContainerLauncher {
  constructor(
    private readonly exec: ExecAdapter,
    private readonly engine: string = 'docker',
  ) {}

  launchArgs(tag: string, options: LaunchOptions): string[] {
    return [
      'run',
      '--rm',
      '--init=false',
      ...environmentArgs(options.env),
      ...(options.envFile !== undefined ? ['--env-file', options.envFile] : []),
      tag,
      ...(options.command ?? []),
    ];
  }

  /**
   * Run the container in the foreground and resolve with its exit status.
   *
   * @throws {BuildError} EntrypointStart, or EngineUnavailable when the
   *   engine binary is missing
   */
  async start(tag: string, options: LaunchOptions): Promise<number> {
    let result: ExecResult;
    try {
      result = await this.exec.run(this.engine, this.launchArgs(tag, options), { inheritStdio: true });
    } catch (err: unknown) {
      throw toBuildError(err, BuildErrorKind.EntrypointStart);
    }
    if (ENGINE_RESERVED_EXITS.has(result.exitCode)) {
      throw new BuildError(
        BuildErrorKind.EntrypointStart,
        `${tag} could not start its entrypoint (status ${result.exitCode})`,
        result.stderr.trim(),
      );
    }
    return result.exitCode;
  }
}
