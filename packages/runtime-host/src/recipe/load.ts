/**
 * Slipway Runtime Host — Recipe and Manifest Loading
 *
 * Reads `slipway.json` and the dependency manifest from a build context and
 * hands them to the kernel validators. Failures surface as BuildErrors so
 * the CLI reports them like any other build failure, before a single engine
 * command runs.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  BuildError,
  BuildErrorKind,
  DEFAULT_RECIPE,
  PipelineState,
  parseRequirements,
  planBuild,
  renderDockerignore,
  validateRecipe,
  type ImageRecipe,
  type RequirementsManifest,
} from '@slipway/kernel';
import { isNodeError } from '../state/state-io.js';

export const RECIPE_FILE = 'slipway.json';

/**
 * Load and validate the context's recipe. A missing file yields the
 * default recipe.
 *
 * @throws {BuildError} InvalidRecipe with one detail line per problem
 */
export async function loadRecipe(contextDir: string): Promise<ImageRecipe> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(join(contextDir, RECIPE_FILE), 'utf-8'));
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      throw new BuildError(BuildErrorKind.InvalidRecipe, `${RECIPE_FILE} is not valid JSON`, err.message);
    }
    if (!isNodeError(err, 'ENOENT')) throw err;
    parsed = undefined;
  }

  const result = validateRecipe(parsed);
  if (!result.ok) {
    const lines = result.errors.map((e) => (e.field === '' ? e.message : `${e.field}: ${e.message}`));
    throw new BuildError(BuildErrorKind.InvalidRecipe, `${RECIPE_FILE} is invalid`, lines.join('\n'));
  }
  return result.value;
}

/**
 * Load and parse the dependency manifest named by the recipe.
 *
 * @throws {BuildError} FilesystemCopy when the manifest is missing,
 *   DependencyInstall when an entry is malformed
 */
export async function loadManifest(contextDir: string, recipe: ImageRecipe): Promise<RequirementsManifest> {
  const manifest = recipe.dependencies.manifest;
  let source: string;
  try {
    source = await readFile(join(contextDir, manifest), 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw new BuildError(
        BuildErrorKind.FilesystemCopy,
        `dependency manifest "${manifest}" not found in the build context`,
        '',
        PipelineState.DependenciesInstalled,
      );
    }
    throw err;
  }

  const result = parseRequirements(source);
  if (!result.ok) {
    const count = result.errors.length;
    throw new BuildError(
      BuildErrorKind.DependencyInstall,
      `${manifest} has ${count} malformed ${count === 1 ? 'entry' : 'entries'}`,
      result.errors.map((e) => `line ${e.line}: ${e.message}`).join('\n'),
      PipelineState.DependenciesInstalled,
    );
  }
  return result.manifest;
}

export interface InitResult {
  readonly written: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<string>;
}

/** Write a default `slipway.json` and `.dockerignore`, keeping existing files. */
export async function initProject(contextDir: string): Promise<InitResult> {
  const files: ReadonlyArray<readonly [string, string]> = [
    [RECIPE_FILE, JSON.stringify(DEFAULT_RECIPE, null, 2) + '\n'],
    ['.dockerignore', renderDockerignore(planBuild(DEFAULT_RECIPE))],
  ];
  const written: string[] = [];
  const skipped: string[] = [];
  for (const [name, content] of files) {
    try {
      await writeFile(join(contextDir, name), content, { encoding: 'utf-8', flag: 'wx' });
      written.push(name);
    } catch (err: unknown) {
      if (!isNodeError(err, 'EEXIST')) throw err;
      skipped.push(name);
    }
  }
  return { written, skipped };
}
