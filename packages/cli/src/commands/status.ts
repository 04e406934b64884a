/**
 * slipway status — Show resolved configuration and project state
 *
 * Displays the home directory and engine after precedence resolution, the
 * project state directory for the build context, the number of cached
 * layers and the outcome of the last build.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { BUILD_LOG, openProject, readLog, summarizeBuilds } from '@slipway/runtime-host';
import { formatStatus, type StatusInfo } from '../output/report.js';
import { cliContext, runAction } from '../runtime.js';

export const statusCommand = new Command('status')
  .description('Show home, engine, cached layer count and last build')
  .argument('[dir]', 'Build context directory', '.')
  .option('--json', 'Output as JSON')
  .action(async (dir: string, options: { json?: boolean }, command: Command) => {
    await runAction('status', async () => {
      const { home, engine } = cliContext(command);
      const project = openProject(home, resolve(dir));
      const builds = summarizeBuilds(readLog(project.stateIO.readLogRaw(BUILD_LOG)).events);

      const info: StatusInfo = {
        home,
        engine,
        contextDir: project.contextDir,
        projectDir: project.dir,
        cachedLayers: project.cache.list().length,
        lastBuild: builds[builds.length - 1] ?? null,
      };

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(info, null, 2));
        return;
      }
      process.stdout.write(formatStatus(info));
    });
  });
