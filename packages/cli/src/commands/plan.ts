/**
 * slipway plan — Show the bootstrap plan for a build context
 *
 * Lists the eight steps with their instructions and layer keys, marking the
 * steps whose key is recorded in the project's layer cache. Nothing is
 * built and the engine is not contacted, so a cached layer that has since
 * been removed from the engine still shows as cached here.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { computeStepKeys, planBuild, renderInstruction } from '@slipway/kernel';
import { computeBuildInputs, loadManifest, loadRecipe, openProject } from '@slipway/runtime-host';
import { formatPlan, type PlanRow } from '../output/report.js';
import { cliContext, runAction } from '../runtime.js';

export const planCommand = new Command('plan')
  .description('Show the eight build steps with cache keys and hit/miss')
  .argument('[dir]', 'Build context directory', '.')
  .option('--json', 'Output as JSON')
  .action(async (dir: string, options: { json?: boolean }, command: Command) => {
    await runAction('plan', async () => {
      const { home } = cliContext(command);
      const contextDir = resolve(dir);
      const recipe = await loadRecipe(contextDir);
      await loadManifest(contextDir, recipe);

      const plan = planBuild(recipe);
      const keys = computeStepKeys(plan, await computeBuildInputs(contextDir, plan));
      const cache = openProject(home, contextDir).cache;

      const rows: PlanRow[] = plan.steps.flatMap((step, i) => {
        const entry = keys[i];
        return entry === undefined ? [] : [{ step, key: entry.key, cached: cache.get(entry.key) !== undefined }];
      });

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({
          context: contextDir,
          steps: rows.map((r) => ({
            state: r.step.state,
            key: r.key,
            cached: r.cached,
            instructions: r.step.instructions.map(renderInstruction),
          })),
        }, null, 2));
        return;
      }
      process.stdout.write(formatPlan(rows));
    });
  });
