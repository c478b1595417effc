/**
 * Promise timeouts.
 *
 * Races an operation against a timer, the same way for embedding calls and
 * backend calls. The underlying operation is not cancelled; its result is
 * ignored once the timer has fired.
 */

/**
 * Resolve with `promise`, or reject with `onTimeout()` after `timeoutMs`.
 * A timeout of 0 or less (or undefined) means no limit.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error
): Promise<T> {
  if (timeoutMs === undefined || timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
