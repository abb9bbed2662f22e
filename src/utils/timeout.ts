// =========================================================
// TIMEOUTS — DEADLINES FOR COLLABORATOR CALLS
// =========================================================

import { TimeoutError } from './errors';

/**
 * Race a promise against a deadline. The underlying call is not aborted;
 * its late result is ignored.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
