/**
 * Slipway Runtime Host — Copy Staging
 *
 * Materializes the files a copy instruction selects into a temporary
 * directory, which the backend then copies into the container in one go.
 * Selection follows COPY semantics:
 *
 *   `.`         every non-ignored file, paths preserved
 *   a file      the file, under its base name
 *   a directory the directory's contents, paths relative to it
 */

import { copyFile, mkdir, mkdtemp, readlink, rm, symlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { BuildError, BuildErrorKind } from '@slipway/kernel';
import { listContext, type ContextEntry } from './digest.js';

export interface StagedCopy {
  readonly dir: string;
  cleanup(): Promise<void>;
}

interface Selected {
  readonly entry: ContextEntry;
  readonly target: string;
}

function normalizeSource(source: string): string {
  let s = source.replace(/\\/g, '/');
  while (s.startsWith('./')) s = s.slice(2);
  s = s.replace(/\/+$/, '');
  return s === '.' ? '' : s;
}

export function selectSource(entries: ReadonlyArray<ContextEntry>, source: string): Selected[] {
  const s = normalizeSource(source);
  if (s === '') return entries.map((entry) => ({ entry, target: entry.path }));

  const exact = entries.find((e) => e.path === s);
  if (exact !== undefined) return [{ entry: exact, target: basename(s) }];

  const prefix = `${s}/`;
  return entries
    .filter((e) => e.path.startsWith(prefix))
    .map((entry) => ({ entry, target: entry.path.slice(prefix.length) }));
}

/**
 * Stage the given sources. The caller must call cleanup().
 *
 * @throws {BuildError} FilesystemCopy when a source selects nothing
 */
export async function stageCopy(
  contextDir: string,
  sources: ReadonlyArray<string>,
  ignore: ReadonlyArray<string>,
): Promise<StagedCopy> {
  const entries = await listContext(contextDir, ignore);
  const dir = await mkdtemp(join(tmpdir(), 'slipway-stage-'));
  const cleanup = (): Promise<void> => rm(dir, { recursive: true, force: true });

  try {
    for (const source of sources) {
      const selected = selectSource(entries, source);
      if (selected.length === 0) {
        throw new BuildError(
          BuildErrorKind.FilesystemCopy,
          `"${source}" matches no files in the build context (missing or ignored)`,
        );
      }
      for (const { entry, target } of selected) {
        const from = join(contextDir, entry.path);
        const to = join(dir, target);
        await mkdir(dirname(to), { recursive: true });
        if (entry.type === 'file') {
          await copyFile(from, to);
        } else {
          await symlink(await readlink(from), to);
        }
      }
    }
  } catch (err: unknown) {
    await cleanup();
    throw err;
  }
  return { dir, cleanup };
}
