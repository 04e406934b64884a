/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/slipway.ts.
 */

import { program } from 'commander';
import { buildCommand } from './build.js';
import { initCommand } from './init.js';
import { logCommand } from './log.js';
import { planCommand } from './plan.js';
import { renderCommand } from './render.js';
import { runCommand } from './run.js';
import { statusCommand } from './status.js';
import { verifyCommand } from './verify.js';

program
  .name('slipway')
  .description(
    'Reproducible, layer-cached container images for interpreted applications.\n' +
    'Builds run as root only until the application user exists; the entrypoint never does.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'State directory (default: $SLIPWAY_HOME, config file, ~/.slipway)')
  .option('--engine <bin>', 'Container engine binary (default: $SLIPWAY_ENGINE, config file, docker)');

program.addCommand(initCommand);
program.addCommand(planCommand);
program.addCommand(renderCommand);
program.addCommand(buildCommand);
program.addCommand(verifyCommand);
program.addCommand(runCommand);
program.addCommand(logCommand);
program.addCommand(statusCommand);

export { program };
