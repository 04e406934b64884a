/**
 * Slipway Runtime Host — Container Probe
 *
 * Collects the facts the kernel's verifyImage() judges, using short-lived
 * containers started from the image under test. Each probe overrides the
 * entrypoint but keeps the image's configured user, so `id -u` reports the
 * uid the real entrypoint would run as.
 */

import {
  BuildError,
  BuildErrorKind,
  type ContainerProbe,
  type ExecAdapter,
  type ImageFacts,
  type InstalledPackage,
  type ProbeTarget,
} from '@slipway/kernel';
import { inspectImageConfig, parseEngineJson } from './image-config.js';

const BYTECODE_PATTERNS = ['__pycache__', '*.pyc', '*.pyo'];

/** Parse `pip list --format=json` output. */
export function parsePackageList(json: string): InstalledPackage[] {
  const parsed = parseEngineJson(json, BuildErrorKind.EntrypointStart, 'the package list is not valid JSON');
  if (!Array.isArray(parsed)) return [];
  const packages: InstalledPackage[] = [];
  for (const item of parsed) {
    if (typeof item !== 'object' || item === null) continue;
    const r: Partial<Record<string, unknown>> = { ...item };
    const { name, version } = r;
    if (typeof name === 'string' && typeof version === 'string') packages.push({ name, version });
  }
  return packages;
}

/** `find` arguments matching bytecode caches under a directory. */
export function bytecodeFindArgs(workdir: string): string[] {
  const tests = BYTECODE_PATTERNS.flatMap((p, i) => (i === 0 ? ['-name', p] : ['-o', '-name', p]));
  return [workdir, '(', ...tests, ')', '-print'];
}

export class DockerProbe implements ContainerProbe {
  constructor(
    private readonly exec: ExecAdapter,
    private readonly engine: string = 'docker',
  ) {}

  async inspect(tag: string, target: ProbeTarget): Promise<ImageFacts> {
    const config = await inspectImageConfig(this.exec, this.engine, tag);

    const uidText = (await this.probe(tag, 'id', ['-u'])).trim();
    if (!/^\d+$/.test(uidText)) {
      throw new BuildError(BuildErrorKind.EntrypointStart, `could not read the effective uid of ${tag}`, uidText);
    }
    const effectiveUid = Number.parseInt(uidText, 10);

    const packages = parsePackageList(
      await this.probe(tag, target.interpreter, ['-m', 'pip', 'list', '--format=json']),
    );

    const bytecodeArtifacts = (await this.probe(tag, 'find', bytecodeFindArgs(target.workdir)))
      .split('\n')
      .map((l) => l.trim())
      .filter((l) => l !== '');

    return {
      configUser: config.user,
      configEnv: config.env,
      configCmd: config.cmd,
      configEntrypoint: config.entrypoint,
      configWorkdir: config.workdir === '' ? target.workdir : config.workdir,
      effectiveUid,
      packages,
      bytecodeArtifacts,
    };
  }

  private async probe(tag: string, entrypoint: string, args: ReadonlyArray<string>): Promise<string> {
    const result = await this.exec.run(this.engine, ['run', '--rm', '--entrypoint', entrypoint, tag, ...args], {});
    if (result.exitCode !== 0) {
      throw new BuildError(
        BuildErrorKind.EntrypointStart,
        `${entrypoint} ${args.join(' ')} exited with status ${result.exitCode} in ${tag}`,
        result.stderr.trim(),
      );
    }
    return result.stdout;
  }
}
