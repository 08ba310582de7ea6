/**
 * sysindex Runtime Host — Cluster Metadata Store
 *
 * The authoritative record of which system indices and templates exist,
 * persisted as `state/cluster-metadata.json` through a StateIO.
 *
 * Implements IndicesClient, so the installer can provision against it, and
 * exposes snapshot() for CachedClusterState to read from.
 *
 * Every request yields to the event loop before touching state, like a
 * network round trip would. The read, the existence check and the write run
 * as one synchronous block under the StateIO lock for the metadata file, so
 * concurrent installers, in one process or in several, see one winner and
 * one ResourceAlreadyExistsError, never two creations or a lost update.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type {
  AcknowledgedResponse,
  ClusterSnapshot,
  CreateIndexRequest,
  CreateIndexResponse,
  IndexMappings,
  IndexSettings,
  IndicesClient,
  PutTemplateRequest,
  ResourceDescriptor,
  TemplateDescriptor,
} from '@sysindex/kernel';
import { ResourceAlreadyExistsError, buildClusterSnapshot } from '@sysindex/kernel';
import type { StateIO } from '../state/state-io.js';
import { StateFileError } from '../state/state-io.js';

/** Filename of the persisted metadata within the state directory. */
export const CLUSTER_METADATA_FILE = 'cluster-metadata.json';

interface PersistedClusterMetadata {
  readonly state_version: number;
  readonly resources: ReadonlyArray<ResourceDescriptor>;
  readonly templates: ReadonlyArray<TemplateDescriptor>;
}

const EMPTY_METADATA: PersistedClusterMetadata = {
  state_version: 0,
  resources: [],
  templates: [],
};

/** Wire error type for a rejected index or template name. */
export const INVALID_NAME_ERROR_TYPE = 'invalid_index_name_exception';

/** The store refused a request because of the name it carried. */
export class InvalidResourceNameError extends Error {
  readonly type = INVALID_NAME_ERROR_TYPE;

  constructor(
    readonly resourceName: string,
    reason: string,
  ) {
    super(`invalid name [${resourceName}]: ${reason}`);
    this.name = 'InvalidResourceNameError';
  }
}

/** Something that can produce the current authoritative snapshot. */
export interface SnapshotProvider {
  snapshot(): ClusterSnapshot;
}

export class ClusterMetadataStore implements IndicesClient, SnapshotProvider {
  constructor(private readonly stateIO: StateIO) {}

  /** Current authoritative snapshot. */
  snapshot(): ClusterSnapshot {
    const metadata = this.read();
    return buildClusterSnapshot(metadata.state_version, metadata.resources, metadata.templates);
  }

  /**
   * Create an index.
   *
   * Rejects with ResourceAlreadyExistsError when an index or alias already
   * uses the name, and with InvalidResourceNameError for an unusable name.
   */
  async createIndex(request: CreateIndexRequest): Promise<CreateIndexResponse> {
    await yieldToEventLoop();
    assertValidName(request.index);

    return this.stateIO.withLock(CLUSTER_METADATA_FILE, () => {
      const metadata = this.read();
      const taken = metadata.resources.some(
        (r) => r.name === request.index || r.aliases.includes(request.index),
      );
      if (taken) {
        throw new ResourceAlreadyExistsError(request.index);
      }

      const descriptor: ResourceDescriptor = {
        name: request.index,
        created_version: metaVersion(request.mappings),
        aliases: [...request.aliases],
        settings: { ...request.settings },
      };
      this.write({
        state_version: metadata.state_version + 1,
        resources: [...metadata.resources, descriptor],
        templates: metadata.templates,
      });
      return { acknowledged: true, index: request.index };
    });
  }

  /**
   * Install or replace a template.
   *
   * With `create: true` an existing template of the same name is left alone
   * and the request rejects with ResourceAlreadyExistsError.
   */
  async putTemplate(request: PutTemplateRequest): Promise<AcknowledgedResponse> {
    await yieldToEventLoop();
    assertValidName(request.name);

    return this.stateIO.withLock(CLUSTER_METADATA_FILE, () => {
      const metadata = this.read();
      const exists = metadata.templates.some((t) => t.name === request.name);
      if (exists && request.create) {
        throw new ResourceAlreadyExistsError(request.name);
      }

      const descriptor: TemplateDescriptor = {
        name: request.name,
        version: request.version,
        index_patterns: [...request.index_patterns],
        aliases: [...request.aliases],
      };
      this.write({
        state_version: metadata.state_version + 1,
        resources: metadata.resources,
        templates: [...metadata.templates.filter((t) => t.name !== request.name), descriptor],
      });
      return { acknowledged: true };
    });
  }

  private read(): PersistedClusterMetadata {
    const raw = this.stateIO.readJson(CLUSTER_METADATA_FILE);
    return raw === undefined ? EMPTY_METADATA : parseClusterMetadata(raw);
  }

  private write(metadata: PersistedClusterMetadata): void {
    this.stateIO.writeJson(CLUSTER_METADATA_FILE, metadata);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function assertValidName(name: string): void {
  if (name.length === 0) {
    throw new InvalidResourceNameError(name, 'must not be empty');
  }
  if (name !== name.toLowerCase()) {
    throw new InvalidResourceNameError(name, 'must be lowercase');
  }
  if (/[\s*,"\\/?<>|#]/.test(name)) {
    throw new InvalidResourceNameError(name, 'contains a forbidden character');
  }
}

/** `_meta.version` from a mapping body, or 0 when absent. */
function metaVersion(mappings: IndexMappings): number {
  const meta = mappings['_meta'];
  if (typeof meta === 'object' && meta !== null && 'version' in meta && typeof meta.version === 'number') {
    return meta.version;
  }
  return 0;
}

// ---------------------------------------------------------------------------
// Persisted shape
// ---------------------------------------------------------------------------

function invalid(reason: string): never {
  throw new StateFileError(CLUSTER_METADATA_FILE, reason);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Check a parsed cluster-metadata.json and rebuild it as typed values.
 *
 * @throws StateFileError naming the first field that does not fit
 */
function parseClusterMetadata(value: unknown): PersistedClusterMetadata {
  if (!isRecord(value)) invalid('expected a JSON object');
  const { state_version, resources, templates } = value;
  if (!isNonNegativeInteger(state_version)) invalid('state_version must be a non-negative integer');
  if (!Array.isArray(resources)) invalid('resources must be an array');
  if (!Array.isArray(templates)) invalid('templates must be an array');

  return {
    state_version,
    resources: resources.map((item: unknown, i) => parseResource(item, `resources[${i}]`)),
    templates: templates.map((item: unknown, i) => parseTemplate(item, `templates[${i}]`)),
  };
}

function parseResource(value: unknown, at: string): ResourceDescriptor {
  if (!isRecord(value)) invalid(`${at} must be an object`);
  const { name, created_version, aliases, settings } = value;
  if (typeof name !== 'string') invalid(`${at}.name must be a string`);
  if (!isNonNegativeInteger(created_version)) invalid(`${at}.created_version must be a non-negative integer`);
  if (!isStringArray(aliases)) invalid(`${at}.aliases must be an array of strings`);
  return { name, created_version, aliases, settings: parseSettings(settings, `${at}.settings`) };
}

function parseSettings(value: unknown, at: string): IndexSettings {
  if (!isRecord(value)) invalid(`${at} must be an object`);
  const settings: Record<string, string | number | boolean> = {};
  for (const [key, setting] of Object.entries(value)) {
    if (typeof setting !== 'string' && typeof setting !== 'number' && typeof setting !== 'boolean') {
      invalid(`${at}.${key} must be a string, number or boolean`);
    }
    settings[key] = setting;
  }
  return settings;
}

function parseTemplate(value: unknown, at: string): TemplateDescriptor {
  if (!isRecord(value)) invalid(`${at} must be an object`);
  const { name, version, index_patterns, aliases } = value;
  if (typeof name !== 'string') invalid(`${at}.name must be a string`);
  if (version !== null && !isNonNegativeInteger(version)) {
    invalid(`${at}.version must be a non-negative integer or null`);
  }
  if (!isStringArray(index_patterns)) invalid(`${at}.index_patterns must be an array of strings`);
  if (!isStringArray(aliases)) invalid(`${at}.aliases must be an array of strings`);
  return { name, version, index_patterns, aliases };
}
