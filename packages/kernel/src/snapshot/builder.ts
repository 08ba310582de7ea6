/**
 * sysindex Kernel — Cluster Snapshot Builder
 *
 * Builds frozen ClusterSnapshots from descriptor lists and hashes them.
 *
 * Stores and test fixtures go through buildClusterSnapshot() so every
 * snapshot the installer sees has the same shape: keys in sorted order,
 * all levels frozen, duplicate names rejected.
 */

import { createHash } from 'node:crypto';
import type {
  ClusterSnapshot,
  ClusterSnapshotHash,
  ResourceDescriptor,
  TemplateDescriptor,
} from '../types/snapshot.js';

// ---------------------------------------------------------------------------
// Internal: Canonical JSON for deterministic hashing
// ---------------------------------------------------------------------------

/**
 * JSON with object keys sorted at every level, so the same content always
 * serializes to the same string regardless of insertion order.
 */
function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',') + '}';
  }
  return 'null';
}

function freezeByName<T extends { readonly name: string }>(
  kind: string,
  items: ReadonlyArray<T>,
): Readonly<Record<string, T>> {
  const sorted = [...items].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const byName: Record<string, T> = {};
  for (const item of sorted) {
    if (Object.prototype.hasOwnProperty.call(byName, item.name)) {
      throw new Error(`duplicate ${kind} [${item.name}] in cluster snapshot`);
    }
    byName[item.name] = Object.freeze({ ...item });
  }
  return Object.freeze(byName);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build an immutable ClusterSnapshot.
 *
 * Descriptor arrays may be in any order. A name appearing twice in the same
 * list is a programming error and throws.
 */
export function buildClusterSnapshot(
  stateVersion: number,
  resources: ReadonlyArray<ResourceDescriptor>,
  templates: ReadonlyArray<TemplateDescriptor>,
): ClusterSnapshot {
  return Object.freeze({
    state_version: stateVersion,
    resources: freezeByName('index', resources),
    templates: freezeByName('template', templates),
  });
}

/**
 * SHA-256 over the canonical JSON of a snapshot.
 *
 * Used by the CLI to show whether two reads saw the same cluster state.
 */
export function hashClusterSnapshot(snapshot: ClusterSnapshot): ClusterSnapshotHash {
  const hex = createHash('sha256').update(canonicalize(snapshot)).digest('hex');
  // The only place a ClusterSnapshotHash is minted.
  return hex as ClusterSnapshotHash;
}
