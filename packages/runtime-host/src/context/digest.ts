/**
 * Slipway Runtime Host — Build Context Digests
 *
 * Lists the build context through the plan's ignore rules and digests it.
 * The same listing feeds the source copy (context/stage.ts), so a file
 * that is never copied can never invalidate the source layer.
 *
 * Context digest = SHA-256 over one record per entry, in path order:
 *
 *   <path> NUL <type> NUL <mode> NUL <sha256 of content or link target> LF
 */

import { createHash } from 'node:crypto';
import { lstat, readFile, readdir, readlink } from 'node:fs/promises';
import { join } from 'node:path';
import {
  BuildError,
  BuildErrorKind,
  PipelineState,
  createIgnoreMatcher,
  type BuildInputs,
  type BuildPlan,
} from '@slipway/kernel';
import { isNodeError } from '../state/state-io.js';

export interface ContextEntry {
  /** POSIX path relative to the context root. */
  readonly path: string;
  readonly type: 'file' | 'symlink';
  /** Permission bits. */
  readonly mode: number;
}

function byPath(a: ContextEntry, b: ContextEntry): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * List every non-ignored regular file and symlink under the context.
 *
 * Ignored directories are pruned unless a negation pattern could
 * re-include something beneath them.
 */
export async function listContext(
  contextDir: string,
  ignore: ReadonlyArray<string>,
): Promise<ContextEntry[]> {
  const ignored = createIgnoreMatcher(ignore);
  const hasNegation = ignore.some((p) => p.trim().startsWith('!'));
  const entries: ContextEntry[] = [];

  const walk = async (rel: string): Promise<void> => {
    const children = await readdir(rel === '' ? contextDir : join(contextDir, rel), { withFileTypes: true });
    for (const child of children) {
      const path = rel === '' ? child.name : `${rel}/${child.name}`;
      if (child.isDirectory()) {
        if (!ignored(path) || hasNegation) await walk(path);
      } else if ((child.isFile() || child.isSymbolicLink()) && !ignored(path)) {
        const stats = await lstat(join(contextDir, path));
        entries.push({ path, type: child.isFile() ? 'file' : 'symlink', mode: stats.mode & 0o777 });
      }
    }
  };

  try {
    await walk('');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) {
      throw new BuildError(BuildErrorKind.FilesystemCopy, `build context "${contextDir}" is not a directory`);
    }
    throw err;
  }
  return entries.sort(byPath);
}

function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export async function digestFile(path: string): Promise<string> {
  return sha256(await readFile(path));
}

export async function digestContext(contextDir: string, ignore: ReadonlyArray<string>): Promise<string> {
  const hash = createHash('sha256');
  for (const entry of await listContext(contextDir, ignore)) {
    const full = join(contextDir, entry.path);
    const content = entry.type === 'file' ? await digestFile(full) : sha256(await readlink(full));
    hash.update(`${entry.path}\0${entry.type}\0${entry.mode.toString(8)}\0${content}\n`);
  }
  return hash.digest('hex');
}

/**
 * Digest the manifest and the context for a plan's cache keys.
 *
 * @throws {BuildError} FilesystemCopy when the manifest or context is missing
 */
export async function computeBuildInputs(contextDir: string, plan: BuildPlan): Promise<BuildInputs> {
  let manifestDigest: string;
  try {
    manifestDigest = await digestFile(join(contextDir, plan.manifest));
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT') || isNodeError(err, 'EISDIR')) {
      throw new BuildError(
        BuildErrorKind.FilesystemCopy,
        `dependency manifest "${plan.manifest}" not found in the build context`,
        '',
        PipelineState.DependenciesInstalled,
      );
    }
    throw err;
  }
  return { manifestDigest, contextDigest: await digestContext(contextDir, plan.ignore) };
}
