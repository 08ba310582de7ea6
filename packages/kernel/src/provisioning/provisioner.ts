/**
 * sysindex Kernel — Resource Provisioner
 *
 * Issues the create-index and put-template requests and turns whatever the
 * store answers into an InstallOutcome.
 *
 * The provisioner does not look at cluster state. Deciding whether a request
 * is needed is the installer's job; the provisioner sends exactly one
 * request per call and never retries.
 *
 * classifyCreateFailure() is the only place that decides a store error means
 * "someone else already created it". Call sites never inspect error messages.
 */

import type { InstallerConfig } from '../types/config.js';
import { DEFAULT_INSTALLER_CONFIG } from '../types/config.js';
import type { InstallOutcome } from '../types/outcome.js';
import { InstallOutcomeKind } from '../types/outcome.js';
import type { IndicesClient } from '../types/store.js';
import {
  createPrimaryIndexRequest,
  notificationsTemplateRequest,
} from '../definitions/system-indices.js';
import { isAlreadyExistsError, toError } from '../errors.js';

const CREATED: InstallOutcome = Object.freeze({ kind: InstallOutcomeKind.Created });
const ALREADY_EXISTS: InstallOutcome = Object.freeze({ kind: InstallOutcomeKind.AlreadyExists });

/**
 * Map a rejected store request to an outcome.
 *
 * Already-exists (typed or wire form) is AlreadyExists. Anything else is
 * Failed with the original error object as the cause.
 */
export function classifyCreateFailure(err: unknown): InstallOutcome {
  if (isAlreadyExistsError(err)) {
    return ALREADY_EXISTS;
  }
  return { kind: InstallOutcomeKind.Failed, cause: toError(err) };
}

export class ResourceProvisioner {
  constructor(
    private readonly client: IndicesClient,
    private readonly config: InstallerConfig = DEFAULT_INSTALLER_CONFIG,
  ) {}

  /**
   * Send one create-index request for the current primary index.
   *
   * Resolves with Created, AlreadyExists or Failed. Never rejects.
   */
  async createPrimaryIfAbsent(): Promise<InstallOutcome> {
    try {
      await this.client.createIndex(createPrimaryIndexRequest(this.config));
      return CREATED;
    } catch (err: unknown) {
      return classifyCreateFailure(err);
    }
  }

  /**
   * Send one put-template request for the notifications template.
   *
   * Resolves with Created, AlreadyExists or Failed. Never rejects.
   */
  async installTemplateIfAbsent(): Promise<InstallOutcome> {
    try {
      await this.client.putTemplate(notificationsTemplateRequest(this.config));
      return CREATED;
    } catch (err: unknown) {
      return classifyCreateFailure(err);
    }
  }
}
