/**
 * Request-scoped cancellation helpers.
 *
 * `raceAbort` only stops *this caller* from waiting; the underlying promise
 * keeps running for anyone else attached to it.
 */

import { setMaxListeners } from 'events';

/**
 * Controller scoped to one request. Every pending wait adds an abort listener
 * to its signal, so the per-target listener cap is lifted.
 */
export function createRequestController(): AbortController {
  const controller = new AbortController();
  setMaxListeners(0, controller.signal);
  return controller;
}

export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // Attach a handler so a later rejection of `promise` is not reported as unhandled
    promise.then(noop, noop);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function noop(): void {}
