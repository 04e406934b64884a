/**
 * slipway verify — Check a built image against its recipe
 *
 * Probes the image with short-lived containers and checks:
 *   non-root-user        the entrypoint does not run as uid 0
 *   no-bytecode-cache    no __pycache__ or *.pyc under the workdir
 *   runtime-flags        the image env carries every runtime flag
 *   pinned-dependencies  every pin is installed at a matching version
 *   entrypoint-declared  the default command is the recipe entrypoint
 *   entrypoint-pid1      nothing wraps the default command, so it is PID 1
 *
 * Exits 1 when any check fails.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { expectationsFor, verifyImage } from '@slipway/kernel';
import { DockerProbe, loadManifest, loadRecipe } from '@slipway/runtime-host';
import { formatVerification } from '../output/report.js';
import { cliContext, runAction } from '../runtime.js';

export const verifyCommand = new Command('verify')
  .description('Run the image property checks against a built tag')
  .argument('<tag>', 'Image tag to verify')
  .argument('[dir]', 'Build context the image was built from', '.')
  .option('--json', 'Output as JSON')
  .addHelpText(
    'after',
    '\nChecks are judged from the image config and short-lived containers; the\n' +
      'application is never started. Unbuffered output is checked as PYTHONUNBUFFERED=1\n' +
      'in the image env, and PID 1 from the ENTRYPOINT and CMD the image declares.',
  )
  .action(async (tag: string, dir: string, options: { json?: boolean }, command: Command) => {
    await runAction('verify', async () => {
      const { engine, exec } = cliContext(command);
      const contextDir = resolve(dir);
      const recipe = await loadRecipe(contextDir);
      const manifest = await loadManifest(contextDir, recipe);

      const facts = await new DockerProbe(exec, engine).inspect(tag, {
        workdir: recipe.workdir,
        interpreter: recipe.entrypoint[0] ?? 'python',
      });
      const report = verifyImage(facts, expectationsFor(recipe, manifest));

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ tag, ...report }, null, 2));
      } else {
        process.stdout.write(formatVerification(tag, report));
      }
      if (!report.passed) process.exitCode = 1;
    });
  });
