/**
 * sysindex Kernel — Error Types
 *
 *   ResourceAlreadyExistsError — the store refused a create because the
 *     resource is present. The provisioner turns this into success.
 *   StoreFailureError — wraps a non-Error value thrown or rejected by a
 *     store collaborator so every failure reaching a caller is an Error.
 *
 * Any other Error raised by a store is passed to callers as-is.
 */

/** Wire-level error type name used by stores that report errors as JSON. */
export const ALREADY_EXISTS_ERROR_TYPE = 'resource_already_exists_exception';

export class ResourceAlreadyExistsError extends Error {
  readonly type = ALREADY_EXISTS_ERROR_TYPE;

  constructor(readonly resourceName: string) {
    super(`resource [${resourceName}] already exists`);
    this.name = 'ResourceAlreadyExistsError';
  }
}

export class StoreFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreFailureError';
  }
}

/**
 * True when `err` reports an already-exists condition, either as a
 * ResourceAlreadyExistsError or as any object carrying the wire error type
 * (errors deserialized from a remote store lose their prototype).
 */
export function isAlreadyExistsError(err: unknown): boolean {
  if (err instanceof ResourceAlreadyExistsError) {
    return true;
  }
  return (
    err !== null &&
    typeof err === 'object' &&
    'type' in err &&
    err.type === ALREADY_EXISTS_ERROR_TYPE
  );
}

/** Return `err` unchanged if it is an Error, otherwise wrap it. */
export function toError(err: unknown): Error {
  if (err instanceof Error) {
    return err;
  }
  return new StoreFailureError(`store request failed: ${String(err)}`, { cause: err });
}
