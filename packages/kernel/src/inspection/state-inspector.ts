/**
 * sysindex Kernel — State Inspector
 *
 * Pure questions over a ClusterSnapshot. No I/O, no throwing on missing
 * entries: an empty or partial snapshot simply answers false.
 */

import type { ClusterSnapshot } from '../types/snapshot.js';
import type { InstallerConfig } from '../types/config.js';
import {
  DEFAULT_INSTALLER_CONFIG,
  latestPrimaryIndexName,
  notificationsTemplateName,
} from '../types/config.js';

/**
 * Whether the snapshot contains the current primary index.
 *
 * The check is an exact name match: the name carries the schema version.
 */
export function isLatestPrimaryPresent(
  snapshot: ClusterSnapshot,
  config: InstallerConfig = DEFAULT_INSTALLER_CONFIG,
): boolean {
  return Object.prototype.hasOwnProperty.call(snapshot.resources, latestPrimaryIndexName(config));
}

/**
 * Whether the snapshot contains the notifications template at the current
 * release or newer. A template installed by a newer release counts.
 */
export function isLatestTemplatePresent(
  snapshot: ClusterSnapshot,
  config: InstallerConfig = DEFAULT_INSTALLER_CONFIG,
): boolean {
  const name = notificationsTemplateName(config);
  if (!Object.prototype.hasOwnProperty.call(snapshot.templates, name)) {
    return false;
  }
  const version = snapshot.templates[name]?.version ?? null;
  return version !== null && version >= config.release_id;
}

/**
 * Names of existing primary indices from older schema versions, sorted.
 *
 * A name qualifies when it starts with the primary prefix and its suffix is
 * a number lower than the current version. Report only: the installer does
 * not migrate or delete them.
 */
export function findOutdatedPrimaryResources(
  snapshot: ClusterSnapshot,
  config: InstallerConfig = DEFAULT_INSTALLER_CONFIG,
): ReadonlyArray<string> {
  const current = Number(config.primary_version);
  const outdated: string[] = [];
  for (const name of Object.keys(snapshot.resources)) {
    if (!name.startsWith(config.primary_prefix)) continue;
    const suffix = name.slice(config.primary_prefix.length);
    if (!/^\d+$/.test(suffix)) continue;
    if (Number(suffix) < current) {
      outdated.push(name);
    }
  }
  return outdated.sort();
}

export interface InstallationReport {
  readonly state_version: number;
  readonly primary_index: string;
  readonly primary_present: boolean;
  readonly template: string;
  readonly template_present: boolean;
  /** Embedded version of the installed template, or null when absent. */
  readonly installed_template_version: number | null;
  readonly outdated_primary_indices: ReadonlyArray<string>;
}

/** All inspector answers for one snapshot, for status display. */
export function inspectInstallation(
  snapshot: ClusterSnapshot,
  config: InstallerConfig = DEFAULT_INSTALLER_CONFIG,
): InstallationReport {
  const template = notificationsTemplateName(config);
  return {
    state_version: snapshot.state_version,
    primary_index: latestPrimaryIndexName(config),
    primary_present: isLatestPrimaryPresent(snapshot, config),
    template,
    template_present: isLatestTemplatePresent(snapshot, config),
    installed_template_version: snapshot.templates[template]?.version ?? null,
    outdated_primary_indices: findOutdatedPrimaryResources(snapshot, config),
  };
}
