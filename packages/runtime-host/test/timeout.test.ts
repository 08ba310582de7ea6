/**
 * sysindex Runtime Host — Store Timeout Tests
 *
 *   TO-1: a request that settles in time passes its result through
 *   TO-2: a request that never settles rejects with StoreTimeoutError
 *   TO-3: a store error passes through unchanged
 *   TO-4: the installer reports a timeout as the failure of the step
 *   TO-5: a non-positive timeout is rejected up front
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import type { IndicesClient } from '@sysindex/kernel';
import {
  DEFAULT_INSTALLER_CONFIG,
  EMPTY_CLUSTER_SNAPSHOT,
  SystemIndexInstaller,
  asPromise,
  createPrimaryIndexRequest,
  notificationsTemplateRequest,
} from '@sysindex/kernel';
import { StoreTimeoutError, withStoreTimeout } from '../src/cluster/timeout.js';

function hangingClient(): IndicesClient {
  return {
    createIndex: () => new Promise(() => undefined),
    putTemplate: () => new Promise(() => undefined),
  };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('withStoreTimeout', () => {
  it('TO-1: passes a timely response through', async () => {
    const client = withStoreTimeout(
      {
        createIndex: async (request) => ({ acknowledged: true, index: request.index }),
        putTemplate: async () => ({ acknowledged: true }),
      },
      1000,
    );

    await expect(client.putTemplate(notificationsTemplateRequest(DEFAULT_INSTALLER_CONFIG))).resolves.toEqual({
      acknowledged: true,
    });
  });

  it('TO-2: rejects a hung request with StoreTimeoutError', async () => {
    vi.useFakeTimers();
    const client = withStoreTimeout(hangingClient(), 500);

    const pending = client.createIndex(createPrimaryIndexRequest(DEFAULT_INSTALLER_CONFIG));
    const assertion = expect(pending).rejects.toThrow(
      'create index [.sysindex-internal-005] did not complete within 500ms',
    );
    await vi.advanceTimersByTimeAsync(500);

    await assertion;
    await expect(pending).rejects.toBeInstanceOf(StoreTimeoutError);
  });

  it('TO-3: a store error passes through unchanged', async () => {
    const failure = new Error('no master');
    const client = withStoreTimeout(
      {
        createIndex: () => Promise.reject(failure),
        putTemplate: () => Promise.reject(failure),
      },
      1000,
    );

    await expect(client.createIndex(createPrimaryIndexRequest(DEFAULT_INSTALLER_CONFIG))).rejects.toBe(failure);
  });

  it('TO-4: the installer surfaces the timeout as its failure', async () => {
    vi.useFakeTimers();
    const installer = new SystemIndexInstaller(
      { state: () => EMPTY_CLUSTER_SNAPSHOT },
      withStoreTimeout(hangingClient(), 250),
    );

    const result = asPromise((done) => installer.ensurePrimaryInstalled(done));
    const assertion = expect(result).rejects.toBeInstanceOf(StoreTimeoutError);
    await vi.advanceTimersByTimeAsync(250);

    await assertion;
  });

  it.each([0, -5, 1.5])('TO-5: rejects timeout %s', (timeoutMs) => {
    expect(() => withStoreTimeout(hangingClient(), timeoutMs)).toThrow(RangeError);
  });
});
