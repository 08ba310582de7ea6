/**
 * sysindex Kernel — Install Outcome
 *
 * The result of a single provisioning request. Created per request and
 * consumed immediately by the installer; never persisted.
 */

/** Discriminant for InstallOutcome. */
export enum InstallOutcomeKind {
  /** The store created the resource in response to this request. */
  Created = 'Created',
  /** The store reported the resource already exists (another installer won the race). */
  AlreadyExists = 'AlreadyExists',
  /** The request failed for any other reason. */
  Failed = 'Failed',
}

export type InstallOutcome =
  | { readonly kind: InstallOutcomeKind.Created }
  | { readonly kind: InstallOutcomeKind.AlreadyExists }
  | { readonly kind: InstallOutcomeKind.Failed; readonly cause: Error };

/**
 * Created and AlreadyExists both mean the resource is in place.
 */
export function isSuccessfulOutcome(outcome: InstallOutcome): boolean {
  return outcome.kind !== InstallOutcomeKind.Failed;
}
