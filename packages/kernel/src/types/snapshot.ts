/**
 * sysindex Kernel — Cluster Snapshot Types
 *
 * A ClusterSnapshot is an immutable, point-in-time view of cluster-wide
 * metadata: which indices exist and which templates are installed.
 *
 * Snapshots are owned by the surrounding coordination layer. The kernel reads
 * them and never mutates them. A snapshot may lag the authoritative store, so
 * "absent in the snapshot" never means "absent in the cluster".
 */

// ---------------------------------------------------------------------------
// Branded Types
// ---------------------------------------------------------------------------

declare const __clusterSnapshotHashBrand: unique symbol;

/**
 * A branded string holding the SHA-256 hex digest of a ClusterSnapshot.
 *
 * Only hashClusterSnapshot() produces values of this type.
 */
export type ClusterSnapshotHash = string & {
  readonly [__clusterSnapshotHashBrand]: 'ClusterSnapshotHash';
};

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

/**
 * Metadata for one index known to the cluster.
 *
 * The index name encodes its schema version, so "is this the latest index"
 * is an exact name comparison.
 */
export interface ResourceDescriptor {
  readonly name: string;
  /** Release id of the installer that created the index. */
  readonly created_version: number;
  readonly aliases: ReadonlyArray<string>;
  readonly settings: Readonly<Record<string, string | number | boolean>>;
}

/**
 * Metadata for one installed index template.
 *
 * `version` is the numeric version embedded in the template body. A template
 * without an embedded version is never considered current.
 */
export interface TemplateDescriptor {
  readonly name: string;
  readonly version: number | null;
  readonly index_patterns: ReadonlyArray<string>;
  readonly aliases: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Cluster Snapshot
// ---------------------------------------------------------------------------

/**
 * An immutable view of cluster metadata at one point in time.
 *
 * - `state_version` increases by one with every mutation of the
 *   authoritative store; two snapshots with the same version hold the same
 *   content.
 * - `resources` and `templates` are keyed by name.
 */
export interface ClusterSnapshot {
  readonly state_version: number;
  readonly resources: Readonly<Record<string, ResourceDescriptor>>;
  readonly templates: Readonly<Record<string, TemplateDescriptor>>;
}

/** The snapshot of a cluster with no indices and no templates. */
export const EMPTY_CLUSTER_SNAPSHOT: ClusterSnapshot = Object.freeze({
  state_version: 0,
  resources: Object.freeze({}),
  templates: Object.freeze({}),
});
