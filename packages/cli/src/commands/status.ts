/**
 * sysindex status — Show what is installed
 *
 * Displays:
 * - cluster state version and snapshot hash
 * - whether the current primary index exists
 * - whether the notifications template is current
 * - primary indices left over from older schema versions
 */

import { Command } from 'commander';
import { hashClusterSnapshot, inspectInstallation } from '@sysindex/kernel';
import { renderStatus } from '../output/render.js';
import type { GlobalOptions } from './runtime.js';
import { buildRuntime } from './runtime.js';

export const statusCommand = new Command('status')
  .description('Show whether the system index and notifications template are installed')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    const { view, config, home } = buildRuntime(command.optsWithGlobals<GlobalOptions>());
    const snapshot = view.state();
    const report = inspectInstallation(snapshot, config);
    const hash = hashClusterSnapshot(snapshot);

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ home, snapshot_hash: hash, ...report }, null, 2));
      return;
    }
    // eslint-disable-next-line no-console
    console.log(renderStatus(report, hash));
  });
