/**
 * sysindex install — Ensure the system resources exist
 *
 * Usage:
 *   sysindex install                  primary index, then notifications template
 *   sysindex install --primary-only
 *   sysindex install --template-only
 *
 * Every attempt is recorded in logs/install-events.jsonl. A failure sets
 * exit code 1.
 */

import { Command } from 'commander';
import type { CompletionListener, SystemIndexInstaller } from '@sysindex/kernel';
import { asPromise, inspectInstallation, toError } from '@sysindex/kernel';
import type { InstallOperation } from '@sysindex/runtime-host';
import { renderInstallResult } from '../output/render.js';
import type { GlobalOptions } from './runtime.js';
import { buildRuntime } from './runtime.js';

function entryPoint(
  installer: SystemIndexInstaller,
  operation: InstallOperation,
): (done: CompletionListener) => void {
  switch (operation) {
    case 'primary':
      return (done) => installer.ensurePrimaryInstalled(done);
    case 'template':
      return (done) => installer.ensureTemplateInstalled(done);
    case 'both':
      return (done) => installer.ensureBothInstalled(done);
  }
}

export const installCommand = new Command('install')
  .description('Create the current system index and install the notifications template if missing')
  .option('--primary-only', 'Only ensure the primary index')
  .option('--template-only', 'Only ensure the notifications template')
  .action(async (options: { primaryOnly?: boolean; templateOnly?: boolean }, command: Command) => {
    if (options.primaryOnly === true && options.templateOnly === true) {
      command.error('--primary-only and --template-only cannot be combined');
    }
    const operation: InstallOperation =
      options.primaryOnly === true ? 'primary' : options.templateOnly === true ? 'template' : 'both';

    const { installer, view, sink, config } = buildRuntime(command.optsWithGlobals<GlobalOptions>());

    let failure: Error | null = null;
    try {
      await asPromise(entryPoint(installer, operation));
    } catch (err: unknown) {
      failure = toError(err);
    }

    const after = view.refresh();
    sink.append({
      timestamp: new Date().toISOString(),
      operation,
      result: failure === null ? 'ok' : 'failed',
      error: failure === null ? null : failure.message,
      state_version: after.state_version,
    });

    // eslint-disable-next-line no-console
    console.log(renderInstallResult(operation, failure, inspectInstallation(after, config)));
    if (failure !== null) {
      process.exitCode = 1;
    }
  });
