/**
 * Slipway Kernel — Layer Cache Key Tests
 *
 *   KEY-1: identical inputs yield identical keys
 *   KEY-2: a source-only change keeps the dependency layer's key
 *   KEY-3: a manifest change invalidates the dependency layer and after
 */

import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import {
  DEFAULT_RECIPE,
  canonicalJson,
  computeLayerKey,
  computeStepKeys,
  planBuild,
  stepInput,
} from '../src/index.js';
import type { BuildInputs } from '../src/index.js';

const plan = planBuild(DEFAULT_RECIPE);
const BASE_INPUTS: BuildInputs = { manifestDigest: 'm1', contextDigest: 'c1' };

function keys(inputs: BuildInputs, recipePlan = plan): string[] {
  return computeStepKeys(recipePlan, inputs).map((k) => k.key);
}

/** Indices of the steps whose keys differ between two runs. */
function changed(a: string[], b: string[]): number[] {
  return a.flatMap((key, i) => (key === b[i] ? [] : [i]));
}

describe('canonicalJson', () => {
  it('sorts keys at every level', () => {
    expect(canonicalJson({ b: 1, a: [true, null, 'x'], c: { z: 0, y: undefined } })).toBe(
      '{"a":[true,null,"x"],"b":1,"c":{"y":null,"z":0}}',
    );
  });
});

describe('computeLayerKey', () => {
  it('hashes parent, instructions and input', () => {
    const expected = createHash('sha256').update('{"input":null,"instructions":[],"parent":""}').digest('hex');
    expect(computeLayerKey(null, [], null)).toBe(expected);
  });
});

describe('computeStepKeys', () => {
  it('KEY-1: is deterministic and yields hex keys', () => {
    const first = keys(BASE_INPUTS);
    expect(keys({ ...BASE_INPUTS })).toEqual(first);
    expect(first).toHaveLength(8);
    for (const key of first) expect(key).toMatch(/^[0-9a-f]{64}$/);
  });

  it('KEY-2: a source change only invalidates SourceCopied and later', () => {
    expect(changed(keys(BASE_INPUTS), keys({ ...BASE_INPUTS, contextDigest: 'c2' }))).toEqual([5, 6, 7]);
  });

  it('KEY-3: a manifest change invalidates DependenciesInstalled and later', () => {
    expect(changed(keys(BASE_INPUTS), keys({ ...BASE_INPUTS, manifestDigest: 'm2' }))).toEqual([4, 5, 6, 7]);
  });

  it('a different base invalidates every step', () => {
    const other = planBuild({ ...DEFAULT_RECIPE, base: 'python:3.12-slim' });
    expect(changed(keys(BASE_INPUTS), keys(BASE_INPUTS, other))).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it('a different entrypoint only invalidates the last step', () => {
    const other = planBuild({ ...DEFAULT_RECIPE, entrypoint: ['python', 'app.py'] });
    expect(changed(keys(BASE_INPUTS), keys(BASE_INPUTS, other))).toEqual([7]);
  });
});

describe('stepInput', () => {
  it('maps copy steps to their input digest', () => {
    expect(plan.steps.map((s) => stepInput(s, BASE_INPUTS))).toEqual([
      null,
      null,
      null,
      null,
      'm1',
      'c1',
      null,
      null,
    ]);
  });
});
