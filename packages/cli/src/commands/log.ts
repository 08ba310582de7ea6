/**
 * sysindex log — Show recent install attempts
 */

import { Command, InvalidArgumentError } from 'commander';
import { readInstallLog } from '@sysindex/runtime-host';
import { renderLogEvents } from '../output/render.js';
import { t } from '../output/theme.js';
import type { GlobalOptions } from './runtime.js';
import { buildRuntime } from './runtime.js';

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return n;
}

export const logCommand = new Command('log')
  .description('Show recent install events')
  .option('--limit <n>', 'Maximum number of events to show', parseLimit, 20)
  .option('--json', 'Output as JSON')
  .action((options: { limit: number; json?: boolean }, command: Command) => {
    const { stateIO } = buildRuntime(command.optsWithGlobals<GlobalOptions>());
    const { events, malformed, duplicates } = readInstallLog(stateIO);
    const recent = events.slice(-options.limit);

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(recent, null, 2));
      return;
    }
    // eslint-disable-next-line no-console
    console.log(renderLogEvents(recent));
    if (malformed > 0 || duplicates > 0) {
      // eslint-disable-next-line no-console
      console.log(t.amber(`  skipped ${malformed} malformed and ${duplicates} duplicate line(s)`));
    }
  });
