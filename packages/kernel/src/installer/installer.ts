/**
 * sysindex Kernel — System Index Installer
 *
 * Makes sure the current primary index and the current notifications
 * template exist. Every ensure operation follows the same steps:
 *
 *   CHECK      read the cached snapshot and ask the State Inspector
 *   SKIP       already current: succeed with no store interaction
 *   PROVISION  one provisioner call; Created and AlreadyExists succeed
 *   FAILED     any other outcome: the cause goes to the caller unchanged
 *
 * Several installers on different nodes may run at once against the same
 * store. Nothing here locks; the provisioner's already-exists rule is what
 * makes concurrent runs converge.
 *
 * The installer does not log and does not retry. Retry policy belongs to
 * whoever calls it.
 */

import type { InstallerConfig } from '../types/config.js';
import { DEFAULT_INSTALLER_CONFIG } from '../types/config.js';
import type { ClusterSnapshot } from '../types/snapshot.js';
import type { ClusterStateSource, IndicesClient } from '../types/store.js';
import type { InstallOutcome } from '../types/outcome.js';
import { InstallOutcomeKind } from '../types/outcome.js';
import {
  isLatestPrimaryPresent,
  isLatestTemplatePresent,
} from '../inspection/state-inspector.js';
import { ResourceProvisioner } from '../provisioning/provisioner.js';
import type { CompletionListener } from './completion.js';
import { notifyOnSettle } from './completion.js';

export class SystemIndexInstaller {
  private readonly provisioner: ResourceProvisioner;

  constructor(
    private readonly clusterState: ClusterStateSource,
    client: IndicesClient,
    private readonly config: InstallerConfig = DEFAULT_INSTALLER_CONFIG,
  ) {
    this.provisioner = new ResourceProvisioner(client, config);
  }

  /** Create the current primary index unless the snapshot already has it. */
  ensurePrimaryInstalled(onDone: CompletionListener): void {
    notifyOnSettle(this.ensurePrimary(), onDone);
  }

  /** Install the notifications template unless a current one is present. */
  ensureTemplateInstalled(onDone: CompletionListener): void {
    notifyOnSettle(this.ensureTemplate(), onDone);
  }

  /**
   * Primary first, then template. The template step always runs after a
   * successful primary step, whether that step skipped or provisioned, and
   * reads a fresh snapshot. A primary failure ends the operation.
   */
  ensureBothInstalled(onDone: CompletionListener): void {
    notifyOnSettle(this.ensureBoth(), onDone);
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private async ensureBoth(): Promise<void> {
    await this.ensurePrimary();
    await this.ensureTemplate();
  }

  private ensurePrimary(): Promise<void> {
    return this.ensure(
      (snapshot) => isLatestPrimaryPresent(snapshot, this.config),
      () => this.provisioner.createPrimaryIfAbsent(),
    );
  }

  private ensureTemplate(): Promise<void> {
    return this.ensure(
      (snapshot) => isLatestTemplatePresent(snapshot, this.config),
      () => this.provisioner.installTemplateIfAbsent(),
    );
  }

  private async ensure(
    isCurrent: (snapshot: ClusterSnapshot) => boolean,
    provision: () => Promise<InstallOutcome>,
  ): Promise<void> {
    if (isCurrent(this.clusterState.state())) {
      return;
    }
    const outcome = await provision();
    if (outcome.kind === InstallOutcomeKind.Failed) {
      throw outcome.cause;
    }
  }
}
