/**
 * slipway log — Query the build log
 *
 * Reads the project's builds.jsonl. Malformed or duplicate lines are
 * skipped and counted; the count is shown when nonzero.
 */

import { resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import {
  BUILD_LOG,
  openProject,
  readLog,
  selectEvents,
  summarizeBuilds,
} from '@slipway/runtime-host';
import { formatEvent, formatSummary } from '../output/report.js';
import { t } from '../output/theme.js';
import { cliContext, runAction } from '../runtime.js';

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

export const logCommand = new Command('log')
  .description('Show recent build events for a build context')
  .argument('[dir]', 'Build context directory', '.')
  .option('--build <id>', 'Only events of this build')
  .option('--limit <n>', 'Maximum number of events to show', parseLimit, 50)
  .option('--summary', 'One line per build instead of per event')
  .option('--json', 'Output as JSON')
  .action(async (
    dir: string,
    options: { build?: string; limit: number; summary?: boolean; json?: boolean },
    command: Command,
  ) => {
    await runAction('log', async () => {
      const { home } = cliContext(command);
      const project = openProject(home, resolve(dir));
      const { events, stats } = readLog(project.stateIO.readLogRaw(BUILD_LOG));

      if (options.summary === true) {
        const summaries = summarizeBuilds(selectEvents(events, { buildId: options.build }));
        const recent = summaries.slice(Math.max(0, summaries.length - options.limit));
        // eslint-disable-next-line no-console
        console.log(options.json === true ? JSON.stringify(recent, null, 2) : recent.map((s) => formatSummary(s)).join('\n'));
        return;
      }

      const selected = selectEvents(events, { buildId: options.build, limit: options.limit });
      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ events: selected, stats }, null, 2));
        return;
      }
      if (selected.length === 0) {
        // eslint-disable-next-line no-console
        console.log(t.dim('no build events recorded'));
      }
      for (const event of selected) {
        // eslint-disable-next-line no-console
        console.log(formatEvent(event));
      }
      const skipped = stats.parseErrors + stats.duplicates + (stats.partialTrailingLine ? 1 : 0);
      if (skipped > 0) {
        // eslint-disable-next-line no-console
        console.error(t.amber(`[slipway log] skipped ${skipped} unreadable or duplicate line(s) in ${BUILD_LOG}`));
      }
    });
  });
