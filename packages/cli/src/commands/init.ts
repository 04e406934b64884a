/**
 * slipway init — Write a default recipe into a build context
 *
 * Creates slipway.json (the default recipe) and a matching .dockerignore.
 * Existing files are left untouched.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { initProject } from '@slipway/runtime-host';
import { t } from '../output/theme.js';
import { runAction } from '../runtime.js';

export const initCommand = new Command('init')
  .description('Write a default slipway.json and .dockerignore')
  .argument('[dir]', 'Build context directory', '.')
  .action(async (dir: string) => {
    await runAction('init', async () => {
      const result = await initProject(resolve(dir));
      for (const name of result.written) {
        // eslint-disable-next-line no-console
        console.log(`  ${t.green('wrote')}  ${name}`);
      }
      for (const name of result.skipped) {
        // eslint-disable-next-line no-console
        console.log(`  ${t.muted('kept ')}  ${name} ${t.dim('(already exists)')}`);
      }
    });
  });
