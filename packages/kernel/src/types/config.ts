/**
 * sysindex Kernel — Installer Configuration
 *
 * Naming and version constants for the two system resources. The installer
 * takes a config so tests and operators can run side-by-side installations
 * under different prefixes.
 */

export interface InstallerConfig {
  /** Name prefix shared by every version of the primary index. */
  readonly primary_prefix: string;
  /** Schema version suffix of the current primary index (e.g. '005'). */
  readonly primary_version: string;
  /** Name prefix shared by the notifications template and its indices. */
  readonly template_prefix: string;
  /** Format suffix of the current notifications template name. */
  readonly template_format: string;
  /**
   * Numeric release id (major * 10000 + minor * 100 + patch). Embedded in the
   * template body and in index `_meta`. An installed template is current when
   * its embedded version is at least this value.
   */
  readonly release_id: number;
}

export const DEFAULT_INSTALLER_CONFIG: InstallerConfig = Object.freeze({
  primary_prefix: '.sysindex-internal-',
  primary_version: '005',
  template_prefix: '.sysindex-notifications-',
  template_format: '000002',
  release_id: 10400,
});

/** Exact name of the current primary index, e.g. `.sysindex-internal-005`. */
export function latestPrimaryIndexName(config: InstallerConfig): string {
  return config.primary_prefix + config.primary_version;
}

/** Name of the current notifications template. */
export function notificationsTemplateName(config: InstallerConfig): string {
  return config.template_prefix + config.template_format;
}

/** Index pattern the notifications template applies to. */
export function notificationsIndexPattern(config: InstallerConfig): string {
  return config.template_prefix + '*';
}

/** Read alias attached to every notifications index. */
export function notificationsReadAlias(config: InstallerConfig): string {
  return config.template_prefix + 'read';
}
