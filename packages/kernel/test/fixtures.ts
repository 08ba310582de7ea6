/**
 * Shared fixtures for kernel tests: snapshots, a recording IndicesClient
 * double and a completion recorder.
 */

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type {
  AcknowledgedResponse,
  ClusterSnapshot,
  ClusterStateSource,
  CompletionListener,
  CreateIndexRequest,
  CreateIndexResponse,
  IndicesClient,
  PutTemplateRequest,
} from '../src/index.js';
import { buildClusterSnapshot, systemIndexSettings } from '../src/index.js';

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

export const LATEST_PRIMARY = '.sysindex-internal-005';
export const LATEST_TEMPLATE = '.sysindex-notifications-000002';

export const STATE_WITH_LATEST_PRIMARY: ClusterSnapshot = buildClusterSnapshot(
  3,
  [{ name: LATEST_PRIMARY, created_version: 10400, aliases: [], settings: systemIndexSettings() }],
  [],
);

export const STATE_WITH_LATEST_TEMPLATE: ClusterSnapshot = buildClusterSnapshot(
  4,
  [],
  [
    {
      name: LATEST_TEMPLATE,
      version: 10400,
      index_patterns: ['.sysindex-notifications-*'],
      aliases: ['.sysindex-notifications-read'],
    },
  ],
);

/** A fixed ClusterStateSource whose reads are counted. */
export function fixedState(snapshot: ClusterSnapshot): ClusterStateSource & {
  readonly state: Mock<() => ClusterSnapshot>;
} {
  return { state: vi.fn(() => snapshot) };
}

// ---------------------------------------------------------------------------
// IndicesClient double
// ---------------------------------------------------------------------------

export interface RecordingClient extends IndicesClient {
  readonly createIndex: Mock<(request: CreateIndexRequest) => Promise<CreateIndexResponse>>;
  readonly putTemplate: Mock<(request: PutTemplateRequest) => Promise<AcknowledgedResponse>>;
  /** Request names in call order, prefixed with the request kind. */
  readonly calls: string[];
}

/** An IndicesClient whose requests succeed unless a test overrides them. */
export function recordingClient(): RecordingClient {
  const calls: string[] = [];
  const createIndex = vi.fn(async (request: CreateIndexRequest): Promise<CreateIndexResponse> => {
    calls.push(`createIndex:${request.index}`);
    return { acknowledged: true, index: request.index };
  });
  const putTemplate = vi.fn(async (request: PutTemplateRequest): Promise<AcknowledgedResponse> => {
    calls.push(`putTemplate:${request.name}`);
    return { acknowledged: true };
  });
  return { createIndex, putTemplate, calls };
}

// ---------------------------------------------------------------------------
// Completion recorder
// ---------------------------------------------------------------------------

/**
 * Start an operation and resolve with every notification it delivered.
 *
 * Resolution waits one macrotask after the first notification so a second,
 * erroneous notification would also be captured.
 */
export function collectCompletions(
  start: (done: CompletionListener) => void,
): Promise<ReadonlyArray<Error | null>> {
  const notifications: Array<Error | null> = [];
  return new Promise((resolve) => {
    start((error) => {
      notifications.push(error);
      setTimeout(() => resolve(notifications), 0);
    });
  });
}
