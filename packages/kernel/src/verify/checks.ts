/**
 * Slipway Kernel — Image Verification
 *
 * Turns introspection facts collected from a built image into pass/fail
 * checks. Pure: the facts are gathered by a ContainerProbe in the runtime
 * host.
 */

import type { ImageFacts } from '../adapters/index.js';
import { runtimeEnvironment } from '../recipe/runtime-flags.js';
import {
  normalizeName,
  pinnedVersions,
  type RequirementsManifest,
  type VersionSpecifier,
} from '../requirements/parser.js';
import { versionsMatch } from '../requirements/version.js';
import type { ImageRecipe } from '../types/recipe.js';

export type VerificationCheckId =
  | 'non-root-user'
  | 'no-bytecode-cache'
  | 'runtime-flags'
  | 'pinned-dependencies'
  | 'entrypoint-declared'
  | 'entrypoint-pid1';

export interface VerificationCheck {
  readonly id: VerificationCheckId;
  readonly passed: boolean;
  readonly detail: string;
}

export interface VerificationReport {
  readonly passed: boolean;
  readonly checks: ReadonlyArray<VerificationCheck>;
}

export interface VerificationExpectations {
  readonly env: Readonly<Record<string, string>>;
  /** Exact pins keyed by normalized package name. */
  readonly pins: ReadonlyMap<string, VersionSpecifier>;
  readonly entrypoint: ReadonlyArray<string>;
}

const MAX_LISTED = 5;

const SHELLS: ReadonlySet<string> = new Set(['sh', '/bin/sh', 'bash', '/bin/bash']);

export function expectationsFor(
  recipe: ImageRecipe,
  manifest: RequirementsManifest | null,
): VerificationExpectations {
  return {
    env: runtimeEnvironment(recipe.runtime),
    pins: manifest === null ? new Map<string, VersionSpecifier>() : pinnedVersions(manifest),
    entrypoint: recipe.entrypoint,
  };
}

export function verifyImage(facts: ImageFacts, expected: VerificationExpectations): VerificationReport {
  const checks: VerificationCheck[] = [
    checkNonRoot(facts),
    checkBytecode(facts),
    checkRuntimeFlags(facts, expected.env),
    checkPins(facts, expected.pins),
    checkEntrypoint(facts, expected.entrypoint),
    checkPidOne(facts),
  ];
  return { passed: checks.every((c) => c.passed), checks };
}

function checkNonRoot(facts: ImageFacts): VerificationCheck {
  const account = facts.configUser.split(':')[0] ?? '';
  const passed = facts.effectiveUid !== 0 && account !== '' && account !== 'root' && account !== '0';
  return {
    id: 'non-root-user',
    passed,
    detail: `uid=${facts.effectiveUid} user=${facts.configUser === '' ? '(unset)' : facts.configUser}`,
  };
}

function checkBytecode(facts: ImageFacts): VerificationCheck {
  const found = facts.bytecodeArtifacts;
  if (found.length === 0) {
    return { id: 'no-bytecode-cache', passed: true, detail: `none under ${facts.configWorkdir}` };
  }
  const listed = found.slice(0, MAX_LISTED).join(', ');
  const more = found.length > MAX_LISTED ? ` (+${found.length - MAX_LISTED} more)` : '';
  return { id: 'no-bytecode-cache', passed: false, detail: `found ${listed}${more}` };
}

function checkRuntimeFlags(
  facts: ImageFacts,
  env: Readonly<Record<string, string>>,
): VerificationCheck {
  const missing: string[] = [];
  for (const [name, value] of Object.entries(env)) {
    if (facts.configEnv[name] !== value) missing.push(`${name}=${value}`);
  }
  if (missing.length > 0) {
    return { id: 'runtime-flags', passed: false, detail: `missing ${missing.join(', ')}` };
  }
  const present = Object.entries(env).map(([n, v]) => `${n}=${v}`);
  return {
    id: 'runtime-flags',
    passed: true,
    detail: present.length === 0 ? 'no flags required' : present.join(', '),
  };
}

/** `===` compares the strings; `==` compares normalized versions. */
function satisfies(pin: VersionSpecifier, installed: string): boolean {
  return pin.operator === '===' ? pin.version === installed : versionsMatch(pin.version, installed);
}

function checkPins(facts: ImageFacts, pins: ReadonlyMap<string, VersionSpecifier>): VerificationCheck {
  if (pins.size === 0) {
    return { id: 'pinned-dependencies', passed: true, detail: 'no pinned requirements' };
  }
  const installed = new Map<string, string>();
  for (const pkg of facts.packages) installed.set(normalizeName(pkg.name), pkg.version);

  const mismatches: string[] = [];
  for (const [name, pin] of pins) {
    const found = installed.get(name);
    if (found === undefined || !satisfies(pin, found)) {
      mismatches.push(`${name}: expected ${pin.version}, found ${found ?? 'nothing'}`);
    }
  }
  if (mismatches.length > 0) {
    return { id: 'pinned-dependencies', passed: false, detail: mismatches.join('; ') };
  }
  return { id: 'pinned-dependencies', passed: true, detail: `${pins.size} pinned package(s) match` };
}

function checkEntrypoint(facts: ImageFacts, entrypoint: ReadonlyArray<string>): VerificationCheck {
  const passed =
    facts.configCmd.length === entrypoint.length &&
    facts.configCmd.every((arg, i) => arg === entrypoint[i]);
  return {
    id: 'entrypoint-declared',
    passed,
    detail: passed
      ? JSON.stringify(facts.configCmd)
      : `expected ${JSON.stringify(entrypoint)}, found ${JSON.stringify(facts.configCmd)}`,
  };
}

/**
 * The default command is PID 1 when no ENTRYPOINT wraps it and it is not a
 * shell-form command run under `sh -c`. Judged from the image config; the
 * application itself is never started.
 */
function checkPidOne(facts: ImageFacts): VerificationCheck {
  const fail = (detail: string): VerificationCheck => ({ id: 'entrypoint-pid1', passed: false, detail });
  if (facts.configEntrypoint.length > 0) {
    return fail(`ENTRYPOINT ${JSON.stringify(facts.configEntrypoint)} runs as PID 1 instead of the command`);
  }
  const [program, flag] = facts.configCmd;
  if (program === undefined) return fail('no default command');
  if (SHELLS.has(program) && flag === '-c') return fail(`shell-form command runs under ${program}`);
  return { id: 'entrypoint-pid1', passed: true, detail: `${program} runs as PID 1` };
}
