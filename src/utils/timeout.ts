/**
 * Promise timeout
 *
 * The underlying operation is not cancelled; its eventual result is ignored.
 * Callers that hold a session lock must apply the timeout before any write
 * so a late result can never land outside the lock.
 *
 * @module utils/timeout
 */

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer.
 *
 * @param timeoutMs - 0 or negative disables the timeout
 * @throws TimeoutError when the timer fires first
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

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
      }
    );
  });
}
