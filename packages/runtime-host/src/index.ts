/**
 * @sysindex/runtime-host
 *
 * Side-effectful collaborators for the installer kernel: state persistence,
 * the local authoritative cluster metadata store, the cached (lagging)
 * cluster state view, store timeouts, configuration loading and the
 * install event log.
 *
 * Depends on @sysindex/kernel for interfaces. No kernel code imports this
 * package.
 */

// StateIO — JSON state and JSONL logs under one home directory
export type { FileStateIOOptions, StateIO } from './state/state-io.js';
export {
  FileStateIO,
  MemoryStateIO,
  StateFileError,
  StateLockTimeoutError,
} from './state/state-io.js';

// Home directory resolution
export type { ResolveHomeOptions } from './home.js';
export { HOME_ENV_VAR, resolveHome } from './home.js';

// Cluster metadata
export type { SnapshotProvider } from './cluster/metadata-store.js';
export {
  CLUSTER_METADATA_FILE,
  ClusterMetadataStore,
  INVALID_NAME_ERROR_TYPE,
  InvalidResourceNameError,
} from './cluster/metadata-store.js';
export { CachedClusterState } from './cluster/cached-state.js';
export { StoreTimeoutError, withStoreTimeout } from './cluster/timeout.js';

// Configuration
export {
  ConfigValidationError,
  INSTALLER_CONFIG_FILE,
  loadInstallerConfig,
  validateInstallerConfig,
} from './config/installer-config.js';

// Install event log
export type {
  InstallEvent,
  InstallLogReadResult,
  InstallLogSink,
  InstallOperation,
  InstallResult,
} from './logging/install-log.js';
export { FileInstallLogSink, INSTALL_LOG_FILE, readInstallLog } from './logging/install-log.js';
