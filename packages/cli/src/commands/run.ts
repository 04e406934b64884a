/**
 * slipway run — Start a built image's entrypoint
 *
 * The runtime flags from the context's recipe are passed explicitly; the
 * caller's environment is not forwarded. Secrets go in through --env-file.
 * The container's exit status becomes slipway's.
 *
 *   slipway run demo:1
 *   slipway run demo:1 --env-file .env -- python -m app.migrate
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { runtimeEnvironment } from '@slipway/kernel';
import { ContainerLauncher, loadRecipe } from '@slipway/runtime-host';
import { cliContext, runAction } from '../runtime.js';

export const runCommand = new Command('run')
  .description('Run a built image with the recipe runtime flags')
  .argument('<tag>', 'Image tag to run')
  .argument('[command...]', 'Command replacing the image default (after --)')
  .option('--env-file <file>', 'Read additional environment variables from a file')
  .option('-C, --context <dir>', 'Build context holding slipway.json', '.')
  .action(async (
    tag: string,
    args: string[],
    options: { envFile?: string; context: string },
    command: Command,
  ) => {
    await runAction('run', async () => {
      const { engine, exec } = cliContext(command);
      const recipe = await loadRecipe(resolve(options.context));
      const status = await new ContainerLauncher(exec, engine).start(tag, {
        env: runtimeEnvironment(recipe.runtime),
        envFile: options.envFile,
        command: args.length > 0 ? args : undefined,
      });
      process.exitCode = status;
    });
  });
