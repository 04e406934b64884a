/**
 * slipway build — Build and tag an image from a build context
 *
 * Loads and validates the recipe and manifest, digests the context, then
 * runs the eight-step pipeline against the container engine. Steps whose
 * layer is cached and still present on the engine are reused.
 *
 * On any failure the layers created by this run are removed, nothing is
 * cached, the tag is not applied and the exit code is 1.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { BuildPipeline, planBuild } from '@slipway/kernel';
import {
  DockerCliBackend,
  computeBuildInputs,
  loadManifest,
  loadRecipe,
  openProject,
  recordProject,
} from '@slipway/runtime-host';
import { ProgressSink } from '../output/progress.js';
import { formatOutcome } from '../output/report.js';
import { t } from '../output/theme.js';
import { cliContext, runAction } from '../runtime.js';

export const buildCommand = new Command('build')
  .description('Build the image for a build context and tag it')
  .argument('[dir]', 'Build context directory', '.')
  .requiredOption('-t, --tag <tag>', 'Image tag to apply on success')
  .option('--no-cache', 'Execute every step even when a cached layer exists')
  .action(async (dir: string, options: { tag: string; cache: boolean }, command: Command) => {
    await runAction('build', async () => {
      const { home, engine, exec } = cliContext(command);
      const contextDir = resolve(dir);

      const recipe = await loadRecipe(contextDir);
      await loadManifest(contextDir, recipe);
      const plan = planBuild(recipe);
      const inputs = await computeBuildInputs(contextDir, plan);

      const project = openProject(home, contextDir);
      recordProject(project);

      // eslint-disable-next-line no-console
      console.log(t.accent(`building ${options.tag}`) + t.muted(` from ${contextDir} with ${engine}`));
      // eslint-disable-next-line no-console
      const sink = new ProgressSink(project.sink, (line) => console.log(line));
      const pipeline = new BuildPipeline(new DockerCliBackend(exec, { engine }), project.cache, { sink });
      const outcome = await pipeline.run(plan, {
        tag: options.tag,
        contextDir,
        inputs,
        noCache: !options.cache,
      });

      process.stdout.write(formatOutcome(outcome));
      if (!outcome.ok) throw outcome.error;
    });
  });
