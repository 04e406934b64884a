/**
 * Slipway Kernel — Recipe Validator Tests
 *
 *   RV-1: omitted fields take their defaults
 *   RV-2: every problem is reported, none partially applied
 *   RV-3: the restricted identity can never be the superuser
 *   RV-4: the base image must be pinned
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_RECIPE, validateRecipe } from '../src/index.js';
import type { ValidationError } from '../src/index.js';

function errorsOf(input: unknown): ReadonlyArray<ValidationError> {
  const result = validateRecipe(input);
  return result.ok ? [] : result.errors;
}

describe('validateRecipe — defaults', () => {
  it('RV-1: undefined yields the default recipe', () => {
    expect(validateRecipe(undefined)).toEqual({ ok: true, value: DEFAULT_RECIPE });
  });

  it('RV-1: an empty object yields the default recipe', () => {
    expect(validateRecipe({})).toEqual({ ok: true, value: DEFAULT_RECIPE });
  });

  it('RV-1: partial sections keep their remaining defaults', () => {
    const result = validateRecipe({
      identity: { user: 'worker' },
      runtime: { unbuffered: false, extraEnv: { TZ: 'UTC' } },
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.identity).toEqual({ group: 'app', user: 'worker' });
    expect(result.value.runtime).toEqual({
      unbuffered: false,
      noBytecodeCache: true,
      extraEnv: { TZ: 'UTC' },
    });
  });

  it('source.ignore replaces the default list, trimmed', () => {
    const result = validateRecipe({ source: { ignore: [' .git ', '', 'tmp/'] } });
    expect(result.ok && result.value.source.ignore).toEqual(['.git', 'tmp/']);
  });
});

describe('validateRecipe — rejections', () => {
  it('rejects a non-object recipe', () => {
    expect(errorsOf([])).toEqual([{ field: '', message: 'recipe must be a JSON object' }]);
  });

  it('rejects unknown fields', () => {
    expect(errorsOf({ colour: 'blue' })).toEqual([
      { field: 'colour', message: 'unknown recipe field "colour"' },
    ]);
  });

  it('RV-4: rejects an unpinned base image', () => {
    expect(errorsOf({ base: 'python:latest' })).toEqual([
      {
        field: 'base',
        message: '"python:latest" is not pinned; use a version tag other than "latest" or a digest',
      },
    ]);
  });

  it('RV-3: rejects root as the restricted user', () => {
    expect(errorsOf({ identity: { user: 'root' } })).toEqual([
      { field: 'identity.user', message: '"root" is the superuser identity' },
    ]);
  });

  it('rejects account names that are not system account names', () => {
    expect(errorsOf({ identity: { group: 'App Group' } })).toEqual([
      {
        field: 'identity.group',
        message: 'must be a lowercase system account name (letters, digits, "_" or "-")',
      },
    ]);
  });

  it('rejects a relative workdir', () => {
    expect(errorsOf({ workdir: 'app' })).toEqual([
      { field: 'workdir', message: 'must be an absolute path without whitespace' },
    ]);
  });

  it('rejects a workdir that climbs out with ..', () => {
    expect(errorsOf({ workdir: '/app/../etc' })).toEqual([
      { field: 'workdir', message: 'must not contain ".." segments' },
    ]);
  });

  it('rejects a manifest outside the build context', () => {
    expect(errorsOf({ dependencies: { manifest: '../requirements.txt' } })).toEqual([
      { field: 'dependencies.manifest', message: 'must be a relative path inside the build context' },
    ]);
  });

  it('rejects an empty entrypoint', () => {
    expect(errorsOf({ entrypoint: [] })).toEqual([
      { field: 'entrypoint', message: 'must be a non-empty array of non-empty strings' },
    ]);
  });

  it('rejects non-boolean runtime flags and invalid env names', () => {
    expect(errorsOf({ runtime: { unbuffered: 'yes', extraEnv: { '1BAD': 'x' } } })).toEqual([
      { field: 'runtime.extraEnv.1BAD', message: 'invalid environment variable name' },
      { field: 'runtime.unbuffered', message: 'must be a boolean' },
    ]);
  });

  it('RV-2: reports every problem at once', () => {
    const errors = errorsOf({ base: 'python', workdir: 'relative', entrypoint: [''] });
    expect(errors.map((e) => e.field)).toEqual(['base', 'workdir', 'entrypoint']);
  });
});
