/**
 * slipway render — Write the declarative build manifest
 *
 * Renders the plan as a Dockerfile plus the .dockerignore that goes with
 * it, so the same eight steps can be built by any Dockerfile-driven tool.
 * `-o -` prints the Dockerfile instead of writing files.
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { planBuild, renderDockerfile, renderDockerignore } from '@slipway/kernel';
import { loadRecipe } from '@slipway/runtime-host';
import { t } from '../output/theme.js';
import { runAction } from '../runtime.js';

export const renderCommand = new Command('render')
  .description('Write a Dockerfile and .dockerignore for the build context')
  .argument('[dir]', 'Build context directory', '.')
  .option('-o, --output <file>', 'Dockerfile path, or - for stdout (default: <dir>/Dockerfile)')
  .action(async (dir: string, options: { output?: string }) => {
    await runAction('render', async () => {
      const contextDir = resolve(dir);
      const plan = planBuild(await loadRecipe(contextDir));
      const dockerfile = renderDockerfile(plan);

      if (options.output === '-') {
        process.stdout.write(dockerfile);
        return;
      }

      const dockerfilePath = options.output !== undefined ? resolve(options.output) : resolve(contextDir, 'Dockerfile');
      const ignorePath = resolve(contextDir, '.dockerignore');
      await writeFile(dockerfilePath, dockerfile, 'utf-8');
      await writeFile(ignorePath, renderDockerignore(plan), 'utf-8');
      // eslint-disable-next-line no-console
      console.log(`  ${t.green('wrote')}  ${dockerfilePath}`);
      // eslint-disable-next-line no-console
      console.log(`  ${t.green('wrote')}  ${ignorePath}`);
    });
  });
