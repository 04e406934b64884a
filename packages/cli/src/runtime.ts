/**
 * Shared wiring for command actions: global option resolution and the
 * BuildError reporting convention.
 */

import type { Command } from 'commander';
import { BuildError, type ExecAdapter } from '@slipway/kernel';
import { NodeExecAdapter, resolveEngine, resolveSlipwayHome } from '@slipway/runtime-host';
import { formatBuildError } from './output/report.js';

type GlobalOptions = {
  readonly home?: string | undefined;
  readonly engine?: string | undefined;
};

export interface CliContext {
  readonly home: string;
  readonly engine: string;
  readonly exec: ExecAdapter;
}

/** Resolve --home and --engine through their precedence chains. */
export function cliContext(command: Command): CliContext {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return {
    home: resolveSlipwayHome({ home: opts.home }),
    engine: resolveEngine({ engine: opts.engine }),
    exec: new NodeExecAdapter(),
  };
}

/**
 * Run a command body. A BuildError is printed as
 * `[slipway <cmd>] <kind>: <message>` with its detail and sets exit code 1;
 * anything else propagates.
 */
export async function runAction(name: string, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err: unknown) {
    if (!(err instanceof BuildError)) throw err;
    // eslint-disable-next-line no-console
    console.error(formatBuildError(name, err));
    process.exitCode = 1;
  }
}
