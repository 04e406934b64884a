/**
 * Slipway Kernel — Runtime Environment
 *
 * Maps RuntimeFlags to the concrete environment entries fixed into the
 * image and passed to every process launch.
 */

import type { RuntimeFlags } from '../types/recipe.js';

export const UNBUFFERED_VAR = 'PYTHONUNBUFFERED';
export const NO_BYTECODE_VAR = 'PYTHONDONTWRITEBYTECODE';

/**
 * Build the environment record for a set of runtime flags.
 *
 * Keys are returned in sorted order so the record renders and hashes
 * identically regardless of how extraEnv was authored. Named flags win over
 * an extraEnv entry of the same name.
 */
export function runtimeEnvironment(flags: RuntimeFlags): Readonly<Record<string, string>> {
  const merged: Record<string, string> = { ...flags.extraEnv };
  if (flags.noBytecodeCache) merged[NO_BYTECODE_VAR] = '1';
  if (flags.unbuffered) merged[UNBUFFERED_VAR] = '1';

  const sorted: Record<string, string> = {};
  for (const name of Object.keys(merged).sort()) {
    const value = merged[name];
    if (value !== undefined) sorted[name] = value;
  }
  return Object.freeze(sorted);
}

/** Render an environment record as `-e NAME=value` argv pairs. */
export function environmentArgs(env: Readonly<Record<string, string>>): string[] {
  const args: string[] = [];
  for (const [name, value] of Object.entries(env)) {
    args.push('-e', `${name}=${value}`);
  }
  return args;
}
