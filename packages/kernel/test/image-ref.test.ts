/**
 * Slipway Kernel — Image Reference Tests
 *
 *   REF-1: tag, registry and digest are split correctly
 *   REF-2: pinning requires a digest or a non-latest tag
 *   REF-3: malformed references are rejected with a reason
 */

import { describe, it, expect } from 'vitest';
import { formatImageReference, isPinned, parseImageReference } from '../src/index.js';
import type { ImageReference } from '../src/index.js';

const DIGEST = `sha256:${'ab'.repeat(32)}`;

function parsed(input: string): ImageReference {
  const result = parseImageReference(input);
  if (!result.ok) throw new Error(`expected "${input}" to parse: ${result.message}`);
  return result.ref;
}

describe('parseImageReference', () => {
  it('REF-1: splits repository and tag', () => {
    expect(parsed('python:3.11-slim')).toEqual({
      registry: null,
      repository: 'python',
      tag: '3.11-slim',
      digest: null,
    });
  });

  it('REF-1: a registry port is not mistaken for a tag', () => {
    expect(parsed('localhost:5000/team/app:1.0')).toEqual({
      registry: 'localhost:5000',
      repository: 'team/app',
      tag: '1.0',
      digest: null,
    });
  });

  it('REF-1: a leading component without a dot is part of the repository', () => {
    expect(parsed('library/python:3.12')).toEqual({
      registry: null,
      repository: 'library/python',
      tag: '3.12',
      digest: null,
    });
  });

  it('REF-1: digests are kept alongside tags', () => {
    const ref = parsed(`ghcr.io/org/app:2.1@${DIGEST}`);
    expect(ref.registry).toBe('ghcr.io');
    expect(ref.tag).toBe('2.1');
    expect(ref.digest).toBe(DIGEST);
    expect(formatImageReference(ref)).toBe(`ghcr.io/org/app:2.1@${DIGEST}`);
  });

  it('REF-3: rejects an empty reference', () => {
    expect(parseImageReference('   ')).toEqual({ ok: false, message: 'image reference is empty' });
  });

  it('REF-3: rejects an empty tag', () => {
    expect(parseImageReference('python:')).toEqual({ ok: false, message: 'invalid tag ""' });
  });

  it('REF-3: rejects uppercase repository names', () => {
    expect(parseImageReference('Python:3.11')).toEqual({
      ok: false,
      message: 'invalid repository name "Python"',
    });
  });

  it('REF-3: rejects a short digest', () => {
    expect(parseImageReference('python@sha256:abc')).toEqual({
      ok: false,
      message: 'invalid digest "sha256:abc"',
    });
  });
});

describe('isPinned', () => {
  it.each([
    ['python:3.11-slim', true],
    [`python@${DIGEST}`, true],
    [`python:latest@${DIGEST}`, true],
    ['python', false],
    ['python:latest', false],
  ])('REF-2: %s pinned=%s', (input, expected) => {
    expect(isPinned(parsed(input))).toBe(expected);
  });
});
