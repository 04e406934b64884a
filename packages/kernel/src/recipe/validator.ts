/**
 * Slipway Kernel — Recipe Validator
 *
 * Validates an untrusted value (typically parsed `slipway.json`) and fills
 * omitted fields from DEFAULT_RECIPE. Validation is all-or-nothing: every
 * problem is reported, and no partially valid recipe is ever returned.
 */

import {
  DEFAULT_RECIPE,
  type DependencySpec,
  type IdentitySpec,
  type ImageRecipe,
  type RuntimeFlags,
  type SourceSpec,
  type ValidationError,
  type ValidationResult,
} from '../types/recipe.js';
import { isPinned, parseImageReference } from './image-ref.js';

const ACCOUNT_NAME = /^[a-z_][a-z0-9_-]{0,31}$/;
const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED_ACCOUNTS = new Set(['root', '0']);
const RECIPE_KEYS = new Set([
  'base',
  'runtime',
  'workdir',
  'identity',
  'dependencies',
  'source',
  'entrypoint',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function hasParentSegment(path: string): boolean {
  return path.split('/').includes('..');
}

/**
 * Validate a recipe, applying defaults for omitted sections and fields.
 *
 * @param input - Untrusted value; `undefined` yields the default recipe
 */
export function validateRecipe(input: unknown): ValidationResult<ImageRecipe> {
  if (input !== undefined && !isRecord(input)) {
    return { ok: false, errors: [{ field: '', message: 'recipe must be a JSON object' }] };
  }
  const raw: Record<string, unknown> = isRecord(input) ? input : {};
  const errors: ValidationError[] = [];

  for (const key of Object.keys(raw)) {
    if (!RECIPE_KEYS.has(key)) {
      errors.push({ field: key, message: `unknown recipe field "${key}"` });
    }
  }

  const base = validateBase(raw['base'], errors);
  const runtime = validateRuntime(raw['runtime'], errors);
  const workdir = validateWorkdir(raw['workdir'], errors);
  const identity = validateIdentity(raw['identity'], errors);
  const dependencies = validateDependencies(raw['dependencies'], errors);
  const source = validateSource(raw['source'], errors);
  const entrypoint = validateArgv('entrypoint', raw['entrypoint'], DEFAULT_RECIPE.entrypoint, errors);

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return {
    ok: true,
    value: { base, runtime, workdir, identity, dependencies, source, entrypoint },
  };
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function validateBase(value: unknown, errors: ValidationError[]): string {
  if (value === undefined) return DEFAULT_RECIPE.base;
  if (typeof value !== 'string') {
    errors.push({ field: 'base', message: 'must be a string' });
    return DEFAULT_RECIPE.base;
  }
  const parsed = parseImageReference(value);
  if (!parsed.ok) {
    errors.push({ field: 'base', message: parsed.message });
  } else if (!isPinned(parsed.ref)) {
    errors.push({
      field: 'base',
      message: `"${value}" is not pinned; use a version tag other than "latest" or a digest`,
    });
  }
  return value.trim();
}

function validateRuntime(value: unknown, errors: ValidationError[]): RuntimeFlags {
  const defaults = DEFAULT_RECIPE.runtime;
  if (value === undefined) return defaults;
  if (!isRecord(value)) {
    errors.push({ field: 'runtime', message: 'must be an object' });
    return defaults;
  }

  const flag = (name: 'unbuffered' | 'noBytecodeCache'): boolean => {
    const v = value[name];
    if (v === undefined) return defaults[name];
    if (typeof v !== 'boolean') {
      errors.push({ field: `runtime.${name}`, message: 'must be a boolean' });
      return defaults[name];
    }
    return v;
  };

  const extraEnv: Record<string, string> = {};
  const rawExtra = value['extraEnv'];
  if (rawExtra !== undefined) {
    if (!isRecord(rawExtra)) {
      errors.push({ field: 'runtime.extraEnv', message: 'must be an object of strings' });
    } else {
      for (const [name, v] of Object.entries(rawExtra)) {
        if (!ENV_NAME.test(name)) {
          errors.push({ field: `runtime.extraEnv.${name}`, message: 'invalid environment variable name' });
        } else if (typeof v !== 'string') {
          errors.push({ field: `runtime.extraEnv.${name}`, message: 'must be a string' });
        } else {
          extraEnv[name] = v;
        }
      }
    }
  }

  return { unbuffered: flag('unbuffered'), noBytecodeCache: flag('noBytecodeCache'), extraEnv };
}

function validateWorkdir(value: unknown, errors: ValidationError[]): string {
  if (value === undefined) return DEFAULT_RECIPE.workdir;
  if (typeof value !== 'string' || !value.startsWith('/') || /\s/.test(value)) {
    errors.push({ field: 'workdir', message: 'must be an absolute path without whitespace' });
    return DEFAULT_RECIPE.workdir;
  }
  if (hasParentSegment(value)) {
    errors.push({ field: 'workdir', message: 'must not contain ".." segments' });
  }
  return value;
}

function validateIdentity(value: unknown, errors: ValidationError[]): IdentitySpec {
  const defaults = DEFAULT_RECIPE.identity;
  if (value === undefined) return defaults;
  if (!isRecord(value)) {
    errors.push({ field: 'identity', message: 'must be an object' });
    return defaults;
  }

  const account = (name: 'group' | 'user'): string => {
    const v = value[name];
    if (v === undefined) return defaults[name];
    if (typeof v !== 'string' || !ACCOUNT_NAME.test(v)) {
      errors.push({
        field: `identity.${name}`,
        message: 'must be a lowercase system account name (letters, digits, "_" or "-")',
      });
      return defaults[name];
    }
    if (RESERVED_ACCOUNTS.has(v)) {
      errors.push({ field: `identity.${name}`, message: `"${v}" is the superuser identity` });
    }
    return v;
  };

  return { group: account('group'), user: account('user') };
}

function validateDependencies(value: unknown, errors: ValidationError[]): DependencySpec {
  const defaults = DEFAULT_RECIPE.dependencies;
  if (value === undefined) return defaults;
  if (!isRecord(value)) {
    errors.push({ field: 'dependencies', message: 'must be an object' });
    return defaults;
  }

  let manifest = defaults.manifest;
  const rawManifest = value['manifest'];
  if (rawManifest !== undefined) {
    if (
      typeof rawManifest !== 'string' ||
      rawManifest.trim() === '' ||
      rawManifest.startsWith('/') ||
      hasParentSegment(rawManifest)
    ) {
      errors.push({
        field: 'dependencies.manifest',
        message: 'must be a relative path inside the build context',
      });
    } else {
      manifest = rawManifest;
    }
  }

  const installer = validateArgv('dependencies.installer', value['installer'], defaults.installer, errors);
  return { manifest, installer };
}

function validateSource(value: unknown, errors: ValidationError[]): SourceSpec {
  const defaults = DEFAULT_RECIPE.source;
  if (value === undefined) return defaults;
  if (!isRecord(value)) {
    errors.push({ field: 'source', message: 'must be an object' });
    return defaults;
  }
  const ignore = value['ignore'];
  if (ignore === undefined) return defaults;
  if (!isStringArray(ignore)) {
    errors.push({ field: 'source.ignore', message: 'must be an array of strings' });
    return defaults;
  }
  return { ignore: ignore.map((p) => p.trim()).filter((p) => p !== '') };
}

function validateArgv(
  field: string,
  value: unknown,
  fallback: ReadonlyArray<string>,
  errors: ValidationError[],
): ReadonlyArray<string> {
  if (value === undefined) return fallback;
  if (!isStringArray(value) || value.length === 0 || value.some((a) => a === '')) {
    errors.push({ field, message: 'must be a non-empty array of non-empty strings' });
    return fallback;
  }
  return value;
}
