/**
 * @sysindex/kernel
 *
 * Installer core: cluster snapshot model, state inspection, race-tolerant
 * provisioning and the system index installer.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net or any other I/O API. node:crypto is used
 * only to hash snapshots.
 *
 * Store access, persistence and logging live in @sysindex/runtime-host.
 */

// Types
export type {
  ClusterSnapshot,
  ClusterSnapshotHash,
  ResourceDescriptor,
  TemplateDescriptor,
} from './types/snapshot.js';
export { EMPTY_CLUSTER_SNAPSHOT } from './types/snapshot.js';

export type { InstallOutcome } from './types/outcome.js';
export { InstallOutcomeKind, isSuccessfulOutcome } from './types/outcome.js';

export type {
  AcknowledgedResponse,
  ClusterStateSource,
  CreateIndexRequest,
  CreateIndexResponse,
  IndexMappings,
  IndexSettings,
  IndicesClient,
  PutTemplateRequest,
} from './types/store.js';

export type { InstallerConfig } from './types/config.js';
export {
  DEFAULT_INSTALLER_CONFIG,
  latestPrimaryIndexName,
  notificationsIndexPattern,
  notificationsReadAlias,
  notificationsTemplateName,
} from './types/config.js';

// Errors
export {
  ALREADY_EXISTS_ERROR_TYPE,
  ResourceAlreadyExistsError,
  StoreFailureError,
  isAlreadyExistsError,
  toError,
} from './errors.js';

// Snapshots
export { buildClusterSnapshot, hashClusterSnapshot } from './snapshot/builder.js';

// State inspection
export type { InstallationReport } from './inspection/state-inspector.js';
export {
  findOutdatedPrimaryResources,
  inspectInstallation,
  isLatestPrimaryPresent,
  isLatestTemplatePresent,
} from './inspection/state-inspector.js';

// Definitions
export {
  createPrimaryIndexRequest,
  notificationsMappings,
  notificationsTemplateRequest,
  primaryIndexMappings,
  systemIndexSettings,
} from './definitions/system-indices.js';

// Provisioning
export { ResourceProvisioner, classifyCreateFailure } from './provisioning/provisioner.js';

// Installer
export type { CompletionListener } from './installer/completion.js';
export { asPromise, notifyOnSettle, onceListener } from './installer/completion.js';
export { SystemIndexInstaller } from './installer/installer.js';

// Shared validation result shape (used by runtime-host config loading)
export type { ValidationError, ValidationResult } from './types/validation.js';
