/**
 * Slipway Kernel — Dockerfile Renderer
 *
 * Renders a BuildPlan as a declarative build manifest. One directive per
 * instruction; steps are separated by a blank line. The rendered file runs
 * the same eight steps, in the same order, as the step-by-step engine build.
 */

import type { BuildPlan, Instruction } from '../types/plan.js';

const BARE_VALUE = /^[A-Za-z0-9_./:@+,-]*$/;

function quoteEnvValue(value: string): string {
  return BARE_VALUE.test(value) ? value : JSON.stringify(value);
}

function execForm(argv: ReadonlyArray<string>): string {
  return '[' + argv.map((a) => JSON.stringify(a)).join(', ') + ']';
}

/** True for `sh -c "<script>"`, which renders in shell form. */
function isShellScript(argv: ReadonlyArray<string>): argv is readonly [string, string, string] {
  return argv.length === 3 && argv[0] === 'sh' && argv[1] === '-c';
}

export function renderInstruction(instruction: Instruction): string {
  switch (instruction.kind) {
    case 'from':
      return `FROM ${instruction.image}`;
    case 'env': {
      const entries = Object.entries(instruction.vars).map(
        ([name, value]) => `${name}=${quoteEnvValue(value)}`,
      );
      return 'ENV ' + entries.join(' \\\n    ');
    }
    case 'workdir':
      return `WORKDIR ${instruction.path}`;
    case 'run':
      return isShellScript(instruction.argv)
        ? `RUN ${instruction.argv[2]}`
        : `RUN ${execForm(instruction.argv)}`;
    case 'copy':
      return `COPY ${[...instruction.sources, instruction.dest].join(' ')}`;
    case 'user':
      return `USER ${instruction.name}`;
    case 'cmd':
      return `CMD ${execForm(instruction.argv)}`;
  }
}

export function renderDockerfile(plan: BuildPlan): string {
  const blocks = plan.steps
    .map((step) =>
      step.instructions
        .filter((i) => i.kind !== 'env' || Object.keys(i.vars).length > 0)
        .map(renderInstruction)
        .join('\n'),
    )
    .filter((block) => block !== '');
  return blocks.join('\n\n') + '\n';
}

export function renderDockerignore(plan: BuildPlan): string {
  return plan.ignore.map((p) => `${p}\n`).join('');
}
