/**
 * sysindex Runtime Host — Installer Configuration Loading
 *
 * Operators may override any InstallerConfig field in
 * `state/installer-config.json`. Fields left out keep their defaults.
 *
 * The file is validated field by field; every problem is reported at once.
 * A missing file means "use the defaults". A file that is not valid JSON
 * fails with StateFileError.
 */

import type { InstallerConfig, ValidationError, ValidationResult } from '@sysindex/kernel';
import { DEFAULT_INSTALLER_CONFIG } from '@sysindex/kernel';
import type { StateIO } from '../state/state-io.js';

export const INSTALLER_CONFIG_FILE = 'installer-config.json';

export class ConfigValidationError extends Error {
  constructor(readonly errors: ReadonlyArray<ValidationError>) {
    super(
      `invalid ${INSTALLER_CONFIG_FILE}:\n` +
        errors.map((e) => `  - ${e.message}${e.context !== undefined ? ` (${e.context})` : ''}`).join('\n'),
    );
    this.name = 'ConfigValidationError';
  }
}

const NAME_FIELDS = ['primary_prefix', 'template_prefix'] as const;
const SUFFIX_FIELDS = ['primary_version', 'template_format'] as const;
const KNOWN_FIELDS = new Set<string>([...NAME_FIELDS, ...SUFFIX_FIELDS, 'release_id']);

/**
 * Validate an override object and merge it over the defaults.
 *
 * Rules:
 *   - the value is a JSON object with no unknown keys
 *   - prefixes are non-empty lowercase strings without whitespace, '*' or ','
 *   - primary_version and template_format are digit strings
 *   - release_id is a positive integer
 */
export function validateInstallerConfig(value: unknown): ValidationResult<InstallerConfig> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { ok: false, errors: [{ message: 'installer config must be a JSON object' }] };
  }

  const errors: ValidationError[] = [];
  const fields = new Map<string, unknown>(Object.entries(value));

  for (const key of fields.keys()) {
    if (!KNOWN_FIELDS.has(key)) {
      errors.push({ message: `unknown field "${key}"` });
    }
  }

  const merged: { -readonly [K in keyof InstallerConfig]: InstallerConfig[K] } = {
    ...DEFAULT_INSTALLER_CONFIG,
  };

  for (const field of NAME_FIELDS) {
    const v = fields.get(field);
    if (v === undefined) continue;
    if (typeof v !== 'string' || v === '' || v !== v.toLowerCase() || /[\s*,]/.test(v)) {
      errors.push({
        message: `${field} must be a non-empty lowercase string without whitespace, '*' or ','`,
        context: `got ${JSON.stringify(v)}`,
      });
      continue;
    }
    merged[field] = v;
  }

  for (const field of SUFFIX_FIELDS) {
    const v = fields.get(field);
    if (v === undefined) continue;
    if (typeof v !== 'string' || !/^\d+$/.test(v)) {
      errors.push({ message: `${field} must be a string of digits`, context: `got ${JSON.stringify(v)}` });
      continue;
    }
    merged[field] = v;
  }

  const releaseId = fields.get('release_id');
  if (releaseId !== undefined) {
    if (typeof releaseId !== 'number' || !Number.isInteger(releaseId) || releaseId <= 0) {
      errors.push({
        message: 'release_id must be a positive integer',
        context: `got ${JSON.stringify(releaseId)}`,
      });
    } else {
      merged.release_id = releaseId;
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: merged };
}

/**
 * Load the installer config for a home directory.
 *
 * @throws {ConfigValidationError} when the overrides file is present but invalid
 * @throws {StateFileError} when the overrides file is not JSON
 */
export function loadInstallerConfig(stateIO: StateIO): InstallerConfig {
  const raw = stateIO.readJson(INSTALLER_CONFIG_FILE);
  if (raw === undefined) {
    return DEFAULT_INSTALLER_CONFIG;
  }
  const result = validateInstallerConfig(raw);
  if (!result.ok) {
    throw new ConfigValidationError(result.errors);
  }
  return result.value;
}
