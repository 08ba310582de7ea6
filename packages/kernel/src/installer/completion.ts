/**
 * sysindex Kernel — Completion Listeners
 *
 * Public installer operations report completion through a listener that
 * must fire exactly once, with either null (success) or the failure.
 */

import { toError } from '../errors.js';

export type CompletionListener = (error: Error | null) => void;

/**
 * Wrap a listener so only its first invocation is delivered.
 * Later invocations are dropped.
 */
export function onceListener(listener: CompletionListener): CompletionListener {
  let fired = false;
  return (error) => {
    if (fired) return;
    fired = true;
    listener(error);
  };
}

/**
 * Deliver the settlement of `work` to `listener`, exactly once.
 *
 * The listener runs in a promise reaction, never synchronously inside the
 * caller's stack. An exception thrown by the listener is not fed back into
 * it as a failure: it is rethrown from a microtask, so the process sees an
 * uncaught exception rather than an unhandled rejection.
 */
export function notifyOnSettle(work: Promise<void>, listener: CompletionListener): void {
  const done = onceListener(listener);
  const deliver = (error: Error | null): void => {
    try {
      done(error);
    } catch (listenerError: unknown) {
      queueMicrotask(() => {
        throw listenerError;
      });
    }
  };
  void work.then(
    () => deliver(null),
    (err: unknown) => deliver(toError(err)),
  );
}

/**
 * Adapt a listener-style operation to a Promise.
 *
 * @example
 * await asPromise((done) => installer.ensureBothInstalled(done));
 */
export function asPromise(operation: (done: CompletionListener) => void): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    operation((error) => {
      if (error === null) {
        resolve();
      } else {
        reject(error);
      }
    });
  });
}
