/**
 * sysindex Runtime Host — Cached Cluster State
 *
 * A ClusterStateSource that answers from the last snapshot it fetched.
 * Between refresh() calls it lags the authoritative store, which is exactly
 * the view a node has of cluster state while another node is installing.
 */

import type { ClusterSnapshot, ClusterStateSource } from '@sysindex/kernel';
import type { SnapshotProvider } from './metadata-store.js';

export class CachedClusterState implements ClusterStateSource {
  private current: ClusterSnapshot;

  constructor(private readonly provider: SnapshotProvider) {
    this.current = provider.snapshot();
  }

  state(): ClusterSnapshot {
    return this.current;
  }

  /** Re-read the authoritative snapshot and return it. */
  refresh(): ClusterSnapshot {
    this.current = this.provider.snapshot();
    return this.current;
  }
}
