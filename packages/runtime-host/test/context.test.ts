/**
 * Slipway Runtime Host — Build Context Tests
 *
 *   CTX-1: listing applies the ignore rules and sorts by path
 *   CTX-2: an ignored file never changes the context digest
 *   CTX-3: a source change changes the context digest only
 *   CTX-4: a missing manifest or context is a FilesystemCopy error
 *   STG-1: staging follows COPY selection for `.`, files and directories
 *   STG-2: a source that selects nothing fails
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
  BuildErrorKind,
  DEFAULT_IGNORE,
  DEFAULT_RECIPE,
  PipelineState,
  planBuild,
} from '@slipway/kernel';
import { computeBuildInputs, digestContext, listContext } from '../src/context/digest.js';
import { selectSource, stageCopy } from '../src/context/stage.js';

let ctx: string;

function write(rel: string, content: string): void {
  const full = join(ctx, rel);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content, 'utf-8');
}

beforeEach(() => {
  ctx = mkdtempSync(join(tmpdir(), 'slipway-ctx-'));
  write('main.py', 'print("hello")\n');
  write('requirements.txt', 'flask==3.0.0\n');
  write('app/util.py', 'X = 1\n');
  write('app/__pycache__/util.cpython-311.pyc', 'bytecode');
  write('.env', 'API_TOKEN=test-secret\n');
  write('.git/HEAD', 'ref: refs/heads/main\n');
});

describe('listContext', () => {
  it('CTX-1: lists non-ignored files in path order', async () => {
    const entries = await listContext(ctx, DEFAULT_IGNORE);
    expect(entries.map((e) => e.path)).toEqual(['app/util.py', 'main.py', 'requirements.txt']);
    expect(entries.every((e) => e.type === 'file')).toBe(true);
  });

  it('CTX-1: honors negation beneath an ignored directory', async () => {
    write('build/keep.txt', 'keep');
    write('build/drop.txt', 'drop');
    const entries = await listContext(ctx, ['build', '!build/keep.txt']);
    expect(entries.map((e) => e.path).filter((p) => p.startsWith('build/'))).toEqual(['build/keep.txt']);
  });

  it('CTX-4: rejects a missing context', async () => {
    await expect(listContext(join(ctx, 'nope'), DEFAULT_IGNORE)).rejects.toMatchObject({
      kind: BuildErrorKind.FilesystemCopy,
      message: `build context "${join(ctx, 'nope')}" is not a directory`,
    });
  });
});

describe('digests', () => {
  const plan = planBuild(DEFAULT_RECIPE);

  it('CTX-2: ignored files do not affect the digest', async () => {
    const before = await digestContext(ctx, DEFAULT_IGNORE);
    write('.env', 'API_TOKEN=rotated\n');
    write('app/__pycache__/other.pyc', 'bytecode');
    expect(await digestContext(ctx, DEFAULT_IGNORE)).toBe(before);
  });

  it('CTX-3: a source edit changes the context digest but not the manifest digest', async () => {
    const before = await computeBuildInputs(ctx, plan);
    write('main.py', 'print("changed")\n');
    const after = await computeBuildInputs(ctx, plan);

    expect(after.manifestDigest).toBe(before.manifestDigest);
    expect(after.contextDigest).not.toBe(before.contextDigest);
  });

  it('digests the manifest bytes', async () => {
    const inputs = await computeBuildInputs(ctx, plan);
    expect(inputs.manifestDigest).toBe(createHash('sha256').update('flask==3.0.0\n').digest('hex'));
  });

  it('CTX-4: a missing manifest fails at DependenciesInstalled', async () => {
    const empty = mkdtempSync(join(tmpdir(), 'slipway-ctx-'));
    await expect(computeBuildInputs(empty, plan)).rejects.toMatchObject({
      kind: BuildErrorKind.FilesystemCopy,
      message: 'dependency manifest "requirements.txt" not found in the build context',
      state: PipelineState.DependenciesInstalled,
    });
  });
});

describe('selectSource', () => {
  const entries = [
    { path: 'app/util.py', type: 'file' as const, mode: 0o644 },
    { path: 'main.py', type: 'file' as const, mode: 0o644 },
  ];

  it('STG-1: `.` selects everything with paths preserved', () => {
    expect(selectSource(entries, '.').map((s) => s.target)).toEqual(['app/util.py', 'main.py']);
  });

  it('STG-1: a file lands under its base name', () => {
    expect(selectSource(entries, 'app/util.py').map((s) => s.target)).toEqual(['util.py']);
  });

  it('STG-1: a directory contributes its contents', () => {
    expect(selectSource(entries, './app/').map((s) => s.target)).toEqual(['util.py']);
  });

  it('selects nothing for a missing source', () => {
    expect(selectSource(entries, 'lib')).toEqual([]);
  });
});

describe('stageCopy', () => {
  it('STG-1: stages the manifest alone', async () => {
    const staged = await stageCopy(ctx, ['requirements.txt'], DEFAULT_IGNORE);
    try {
      expect(readdirSync(staged.dir)).toEqual(['requirements.txt']);
      expect(readFileSync(join(staged.dir, 'requirements.txt'), 'utf-8')).toBe('flask==3.0.0\n');
    } finally {
      await staged.cleanup();
    }
    expect(existsSync(staged.dir)).toBe(false);
  });

  it('STG-1: stages the whole context without ignored files', async () => {
    const staged = await stageCopy(ctx, ['.'], DEFAULT_IGNORE);
    try {
      expect(readdirSync(staged.dir).sort()).toEqual(['app', 'main.py', 'requirements.txt']);
      expect(readdirSync(join(staged.dir, 'app'))).toEqual(['util.py']);
    } finally {
      await staged.cleanup();
    }
  });

  it('STG-2: an ignored source matches nothing', async () => {
    await expect(stageCopy(ctx, ['.env'], DEFAULT_IGNORE)).rejects.toMatchObject({
      kind: BuildErrorKind.FilesystemCopy,
      message: '".env" matches no files in the build context (missing or ignored)',
    });
  });
});
