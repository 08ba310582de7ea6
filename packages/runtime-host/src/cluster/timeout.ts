/**
 * sysindex Runtime Host — Store Request Timeouts
 *
 * The installer has no notion of time. A deadline on store requests is added
 * here, around the IndicesClient, and a late request surfaces to the
 * installer as an ordinary failure.
 */

import type {
  AcknowledgedResponse,
  CreateIndexRequest,
  CreateIndexResponse,
  IndicesClient,
  PutTemplateRequest,
} from '@sysindex/kernel';

export class StoreTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} did not complete within ${timeoutMs}ms`);
    this.name = 'StoreTimeoutError';
  }
}

/**
 * Reject with StoreTimeoutError if `request` has not settled after
 * `timeoutMs`. The underlying request is not cancelled.
 */
function withDeadline<T>(operation: string, timeoutMs: number, request: Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new StoreTimeoutError(operation, timeoutMs)), timeoutMs);
    void request.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/** Wrap a client so each request fails after `timeoutMs`. */
export function withStoreTimeout(client: IndicesClient, timeoutMs: number): IndicesClient {
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`store timeout must be a positive integer, got ${timeoutMs}`);
  }
  return {
    createIndex: (request: CreateIndexRequest): Promise<CreateIndexResponse> =>
      withDeadline(`create index [${request.index}]`, timeoutMs, client.createIndex(request)),
    putTemplate: (request: PutTemplateRequest): Promise<AcknowledgedResponse> =>
      withDeadline(`put template [${request.name}]`, timeoutMs, client.putTemplate(request)),
  };
}
