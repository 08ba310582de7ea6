/**
 * Runtime wiring shared by every command: resolve the home directory, load
 * the installer config and connect the installer to the local store.
 */

import { InvalidArgumentError } from 'commander';
import type { InstallerConfig } from '@sysindex/kernel';
import { SystemIndexInstaller } from '@sysindex/kernel';
import {
  CachedClusterState,
  ClusterMetadataStore,
  FileInstallLogSink,
  FileStateIO,
  loadInstallerConfig,
  resolveHome,
  withStoreTimeout,
} from '@sysindex/runtime-host';

/** Options defined on the root program, visible to every subcommand. */
export type GlobalOptions = {
  home?: string;
  timeout: number;
};

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Commander argument parser for --timeout. */
export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('must be a positive integer number of milliseconds');
  }
  return ms;
}

export interface CliRuntime {
  readonly home: string;
  readonly stateIO: FileStateIO;
  readonly config: InstallerConfig;
  readonly store: ClusterMetadataStore;
  readonly view: CachedClusterState;
  readonly installer: SystemIndexInstaller;
  readonly sink: FileInstallLogSink;
}

export function buildRuntime(globals: GlobalOptions): CliRuntime {
  const home = resolveHome({ home: globals.home });
  const stateIO = new FileStateIO(home);
  const config = loadInstallerConfig(stateIO);
  const store = new ClusterMetadataStore(stateIO);
  const view = new CachedClusterState(store);
  const installer = new SystemIndexInstaller(view, withStoreTimeout(store, globals.timeout), config);
  return { home, stateIO, config, store, view, installer, sink: new FileInstallLogSink(stateIO) };
}
