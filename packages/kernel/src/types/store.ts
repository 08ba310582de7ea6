/**
 * sysindex Kernel — Store Collaborator Interfaces
 *
 * The kernel reaches the cluster only through these two interfaces.
 * Implementations live in @sysindex/runtime-host (or in test doubles).
 *
 *   ClusterStateSource — cheap, synchronous, possibly stale read of metadata
 *   IndicesClient      — asynchronous requests against the authoritative store
 *
 * Timeouts, transport and retries are the implementation's concern. The
 * kernel only sees a settled promise.
 */

import type { ClusterSnapshot } from './snapshot.js';

/** Settings values accepted in index and template bodies. */
export type IndexSettings = Readonly<Record<string, string | number | boolean>>;

/** A mapping body. Its content is opaque to the kernel. */
export type IndexMappings = Readonly<Record<string, unknown>>;

export interface CreateIndexRequest {
  readonly index: string;
  readonly settings: IndexSettings;
  readonly mappings: IndexMappings;
  readonly aliases: ReadonlyArray<string>;
}

export interface CreateIndexResponse {
  readonly acknowledged: boolean;
  readonly index: string;
}

export interface PutTemplateRequest {
  readonly name: string;
  /**
   * When true the store must refuse to replace an existing template and
   * report already-exists instead.
   */
  readonly create: boolean;
  readonly version: number;
  readonly index_patterns: ReadonlyArray<string>;
  readonly settings: IndexSettings;
  readonly mappings: IndexMappings;
  readonly aliases: ReadonlyArray<string>;
}

export interface AcknowledgedResponse {
  readonly acknowledged: boolean;
}

/**
 * Read access to the locally cached cluster state.
 *
 * state() must be synchronous and must not perform I/O against the
 * authoritative store.
 */
export interface ClusterStateSource {
  state(): ClusterSnapshot;
}

/**
 * Index administration requests against the authoritative store.
 *
 * Each call issues exactly one request. A rejected promise carries the
 * store's error; an already-exists condition must be reported as
 * ResourceAlreadyExistsError or as an error whose `type` is
 * `resource_already_exists_exception`.
 */
export interface IndicesClient {
  createIndex(request: CreateIndexRequest): Promise<CreateIndexResponse>;
  putTemplate(request: PutTemplateRequest): Promise<AcknowledgedResponse>;
}
