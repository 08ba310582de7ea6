/**
 * sysindex Kernel — Resource Provisioner Tests
 *
 * Coverage:
 *   RP-1: createPrimaryIfAbsent sends one create-index request for the latest index
 *   RP-2: installTemplateIfAbsent sends one put-template request for the current template
 *   RP-3: typed and wire-form already-exists errors become AlreadyExists
 *   RP-4: other failures become Failed with the original error object
 *   RP-5: non-Error rejections are wrapped in StoreFailureError
 *   RP-6: a client that throws synchronously still yields Failed
 */

import { describe, it, expect } from 'vitest';
import {
  InstallOutcomeKind,
  ResourceAlreadyExistsError,
  ResourceProvisioner,
  StoreFailureError,
  classifyCreateFailure,
  isSuccessfulOutcome,
} from '../src/index.js';
import { LATEST_PRIMARY, LATEST_TEMPLATE, recordingClient } from './fixtures.js';

describe('ResourceProvisioner.createPrimaryIfAbsent', () => {
  it('RP-1: sends exactly one create-index request and reports Created', async () => {
    const client = recordingClient();
    const provisioner = new ResourceProvisioner(client);

    const outcome = await provisioner.createPrimaryIfAbsent();

    expect(outcome).toEqual({ kind: InstallOutcomeKind.Created });
    expect(client.createIndex).toHaveBeenCalledTimes(1);
    expect(client.putTemplate).not.toHaveBeenCalled();
    expect(client.createIndex).toHaveBeenCalledWith({
      index: LATEST_PRIMARY,
      settings: {
        'index.number_of_shards': 1,
        'index.auto_expand_replicas': '0-1',
        'index.hidden': true,
      },
      mappings: expect.objectContaining({ dynamic: 'false', _meta: { version: 10400 } }),
      aliases: [],
    });
  });

  it('RP-3: ResourceAlreadyExistsError is reported as AlreadyExists', async () => {
    const client = recordingClient();
    client.createIndex.mockRejectedValueOnce(new ResourceAlreadyExistsError(LATEST_PRIMARY));
    const provisioner = new ResourceProvisioner(client);

    const outcome = await provisioner.createPrimaryIfAbsent();

    expect(outcome.kind).toBe(InstallOutcomeKind.AlreadyExists);
    expect(isSuccessfulOutcome(outcome)).toBe(true);
  });

  it('RP-3: a wire-form already-exists error is reported as AlreadyExists', async () => {
    const client = recordingClient();
    client.createIndex.mockRejectedValueOnce({
      type: 'resource_already_exists_exception',
      reason: `index [${LATEST_PRIMARY}] already exists`,
    });
    const provisioner = new ResourceProvisioner(client);

    const outcome = await provisioner.createPrimaryIfAbsent();

    expect(outcome.kind).toBe(InstallOutcomeKind.AlreadyExists);
  });

  it('RP-4: any other error is reported as Failed carrying the same error object', async () => {
    const client = recordingClient();
    const failure = new Error('cluster_block_exception: index creation blocked');
    client.createIndex.mockRejectedValueOnce(failure);
    const provisioner = new ResourceProvisioner(client);

    const outcome = await provisioner.createPrimaryIfAbsent();

    expect(outcome.kind).toBe(InstallOutcomeKind.Failed);
    if (outcome.kind === InstallOutcomeKind.Failed) {
      expect(outcome.cause).toBe(failure);
    }
    expect(isSuccessfulOutcome(outcome)).toBe(false);
  });

  it('RP-6: a client that throws synchronously yields Failed', async () => {
    const client = recordingClient();
    const failure = new Error('client closed');
    client.createIndex.mockImplementationOnce(() => {
      throw failure;
    });
    const provisioner = new ResourceProvisioner(client);

    const outcome = await provisioner.createPrimaryIfAbsent();

    expect(outcome).toEqual({ kind: InstallOutcomeKind.Failed, cause: failure });
  });
});

describe('ResourceProvisioner.installTemplateIfAbsent', () => {
  it('RP-2: sends exactly one put-template request and reports Created', async () => {
    const client = recordingClient();
    const provisioner = new ResourceProvisioner(client);

    const outcome = await provisioner.installTemplateIfAbsent();

    expect(outcome).toEqual({ kind: InstallOutcomeKind.Created });
    expect(client.putTemplate).toHaveBeenCalledTimes(1);
    expect(client.createIndex).not.toHaveBeenCalled();
    expect(client.putTemplate).toHaveBeenCalledWith(
      expect.objectContaining({
        name: LATEST_TEMPLATE,
        create: false,
        version: 10400,
        index_patterns: ['.sysindex-notifications-*'],
        aliases: ['.sysindex-notifications-read'],
      }),
    );
  });

  it('RP-3: an already-exists template error is reported as AlreadyExists', async () => {
    const client = recordingClient();
    client.putTemplate.mockRejectedValueOnce(new ResourceAlreadyExistsError(LATEST_TEMPLATE));
    const provisioner = new ResourceProvisioner(client);

    expect(await provisioner.installTemplateIfAbsent()).toEqual({
      kind: InstallOutcomeKind.AlreadyExists,
    });
  });

  it('RP-4: a template failure is reported as Failed carrying the same error object', async () => {
    const client = recordingClient();
    const failure = new Error('template body rejected');
    client.putTemplate.mockRejectedValueOnce(failure);
    const provisioner = new ResourceProvisioner(client);

    expect(await provisioner.installTemplateIfAbsent()).toEqual({
      kind: InstallOutcomeKind.Failed,
      cause: failure,
    });
  });
});

describe('classifyCreateFailure', () => {
  it('RP-5: wraps a non-Error rejection in StoreFailureError and keeps it as cause', () => {
    const outcome = classifyCreateFailure('connection reset');

    expect(outcome.kind).toBe(InstallOutcomeKind.Failed);
    if (outcome.kind === InstallOutcomeKind.Failed) {
      expect(outcome.cause).toBeInstanceOf(StoreFailureError);
      expect(outcome.cause.message).toBe('store request failed: connection reset');
      expect(outcome.cause.cause).toBe('connection reset');
    }
  });

  it('RP-5: null is a failure, not an already-exists', () => {
    expect(classifyCreateFailure(null).kind).toBe(InstallOutcomeKind.Failed);
  });

  it('RP-3: an object with a different type is a failure', () => {
    const outcome = classifyCreateFailure({ type: 'index_not_found_exception' });
    expect(outcome.kind).toBe(InstallOutcomeKind.Failed);
  });
});
