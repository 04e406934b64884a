/**
 * Slipway Kernel — Dockerfile Renderer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_IGNORE,
  DEFAULT_RECIPE,
  planBuild,
  renderDockerfile,
  renderDockerignore,
  renderInstruction,
} from '../src/index.js';

const EXPECTED_DEFAULT = `FROM python:3.11-slim

ENV PYTHONDONTWRITEBYTECODE=1 \\
    PYTHONUNBUFFERED=1

WORKDIR /app

RUN groupadd --system app && useradd --system --gid app --no-create-home --shell /usr/sbin/nologin app

COPY requirements.txt ./
RUN ["pip", "install", "--no-cache-dir", "-r", "requirements.txt"]

COPY . .

USER app

CMD ["python", "main.py"]
`;

describe('renderDockerfile', () => {
  it('renders the default recipe', () => {
    expect(renderDockerfile(planBuild(DEFAULT_RECIPE))).toBe(EXPECTED_DEFAULT);
  });

  it('quotes environment values that need it', () => {
    const plan = planBuild({
      ...DEFAULT_RECIPE,
      runtime: { ...DEFAULT_RECIPE.runtime, extraEnv: { GREETING: 'hello world' } },
    });
    const env = plan.steps[1]?.instructions[0];
    if (env === undefined) throw new Error('missing env instruction');
    expect(renderInstruction(env)).toBe(
      'ENV GREETING="hello world" \\\n    PYTHONDONTWRITEBYTECODE=1 \\\n    PYTHONUNBUFFERED=1',
    );
  });

  it('omits the ENV block when no variables are set', () => {
    const plan = planBuild({
      ...DEFAULT_RECIPE,
      runtime: { unbuffered: false, noBytecodeCache: false, extraEnv: {} },
    });
    expect(renderDockerfile(plan).startsWith('FROM python:3.11-slim\n\nWORKDIR /app\n\n')).toBe(true);
  });

  it('renders non-shell RUN instructions in exec form', () => {
    expect(renderInstruction({ kind: 'run', argv: ['echo', 'a "b"'], requires: 'privileged' })).toBe(
      'RUN ["echo", "a \\"b\\""]',
    );
  });
});

describe('renderDockerignore', () => {
  it('writes one pattern per line', () => {
    expect(renderDockerignore(planBuild(DEFAULT_RECIPE))).toBe(DEFAULT_IGNORE.join('\n') + '\n');
  });
});
