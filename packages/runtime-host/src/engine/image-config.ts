/**
 * Slipway Runtime Host — Image Config Inspection
 *
 * Reads an image's runtime config (`.Config` of `image inspect`), shared by
 * the build backend and the verification probe.
 */

import { BuildError, BuildErrorKind, type ExecAdapter } from '@slipway/kernel';

export interface ImageConfig {
  readonly user: string;
  readonly env: Readonly<Record<string, string>>;
  readonly cmd: ReadonlyArray<string>;
  readonly entrypoint: ReadonlyArray<string>;
  readonly workdir: string;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** Split `NAME=value` entries at the first `=`. */
export function parseEnvList(entries: ReadonlyArray<string>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq > 0) env[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return env;
}

/**
 * Parse JSON printed by the engine or by a probe command.
 *
 * @throws {BuildError} of `kind`, carrying the output as detail, when the
 *   output is not JSON
 */
export function parseEngineJson(text: string, kind: BuildErrorKind, message: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) throw new BuildError(kind, message, text.trim());
    throw err;
  }
}

export function parseImageConfig(json: string): ImageConfig {
  const parsed = parseEngineJson(json, BuildErrorKind.EngineUnavailable, 'image inspect printed no readable config');
  if (typeof parsed !== 'object' || parsed === null) {
    return { user: '', env: {}, cmd: [], entrypoint: [], workdir: '' };
  }
  const r: Partial<Record<string, unknown>> = { ...parsed };
  return {
    user: typeof r['User'] === 'string' ? r['User'] : '',
    env: parseEnvList(stringList(r['Env'])),
    cmd: stringList(r['Cmd']),
    entrypoint: stringList(r['Entrypoint']),
    workdir: typeof r['WorkingDir'] === 'string' ? r['WorkingDir'] : '',
  };
}

/**
 * @throws {BuildError} EngineUnavailable when the image cannot be inspected
 */
export async function inspectImageConfig(exec: ExecAdapter, engine: string, image: string): Promise<ImageConfig> {
  const result = await exec.run(engine, ['image', 'inspect', '--format', '{{json .Config}}', image], {});
  if (result.exitCode !== 0) {
    throw new BuildError(BuildErrorKind.EngineUnavailable, `cannot inspect image "${image}"`, result.stderr.trim());
  }
  return parseImageConfig(result.stdout);
}
