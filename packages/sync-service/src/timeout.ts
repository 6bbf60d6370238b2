import { GatewayError } from '@groupsync/core';

/**
 * Settle with `promise`, or reject with `onTimeout()` once `timeoutMs` has
 * passed. A missing, zero or non-finite timeout returns `promise` as is.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error = () =>
    new GatewayError({ code: 'TIMEOUT', message: `Operation timed out after ${timeoutMs}ms` })
): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
