/**
 * Slipway Kernel — Layer Cache Keys
 *
 *   key(step) = SHA-256(canonical({ parent: key(step - 1), instructions, input }))
 *
 * `input` is the content digest of what the step copies in: the manifest
 * digest for DependenciesInstalled, the ignore-filtered context digest for
 * SourceCopied, null otherwise. Because keys chain through `parent`, a
 * change to the source tree leaves every key up to and including
 * DependenciesInstalled untouched, while a change to the manifest
 * invalidates the dependency layer and everything after it.
 */

import { createHash } from 'node:crypto';
import type { LayerKey } from '../types/layer.js';
import type { BuildPlan, Instruction, PipelineState, PlanStep } from '../types/plan.js';

/** Content digests of the build inputs, computed by the runtime host. */
export interface BuildInputs {
  /** SHA-256 hex of the manifest file's bytes. */
  readonly manifestDigest: string;
  /** SHA-256 hex over the ignore-filtered context tree. */
  readonly contextDigest: string;
}

export interface StepKey {
  readonly state: PipelineState;
  readonly key: LayerKey;
}

/**
 * Deterministic JSON with sorted keys at every level.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalJson).join(',') + ']';
  }
  const obj = value as Record<string, unknown>;
  const pairs = Object.keys(obj)
    .sort()
    .map((k) => `${JSON.stringify(k)}:${canonicalJson(obj[k])}`);
  return '{' + pairs.join(',') + '}';
}

export function computeLayerKey(
  parent: LayerKey | null,
  instructions: ReadonlyArray<Instruction>,
  input: string | null,
): LayerKey {
  const canonical = canonicalJson({ parent: parent ?? '', instructions, input });
  // Brand assertion: this is the only producer of LayerKey values.
  return createHash('sha256').update(canonical).digest('hex') as LayerKey;
}

/** Re-brand a persisted key. Returns null unless it is a SHA-256 hex digest. */
export function parseLayerKey(value: string): LayerKey | null {
  // Brand assertion: the shape is exactly what computeLayerKey produces.
  return /^[0-9a-f]{64}$/.test(value) ? (value as LayerKey) : null;
}

/** The input digest a step's key depends on, if any. */
export function stepInput(step: PlanStep, inputs: BuildInputs): string | null {
  let input: string | null = null;
  for (const instruction of step.instructions) {
    if (instruction.kind !== 'copy') continue;
    if (instruction.input === 'context') return inputs.contextDigest;
    input = inputs.manifestDigest;
  }
  return input;
}

/** Compute the chained key of every step in plan order. */
export function computeStepKeys(plan: BuildPlan, inputs: BuildInputs): ReadonlyArray<StepKey> {
  const keys: StepKey[] = [];
  let parent: LayerKey | null = null;
  for (const step of plan.steps) {
    const key = computeLayerKey(parent, step.instructions, stepInput(step, inputs));
    keys.push({ state: step.state, key });
    parent = key;
  }
  return keys;
}
