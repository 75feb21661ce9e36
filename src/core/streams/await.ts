import { WaitTimedOutError } from "./errors";

/**
 * Wait for a materialized value for at most `timeoutMs`.
 *
 * Rejects with WaitTimedOutError when the time is up. Giving up only affects
 * the caller: the run behind `value` carries on.
 */
export async function awaitResult<T>(value: PromiseLike<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new RangeError(`timeout must be a non-negative number, got ${timeoutMs}`);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new WaitTimedOutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([value, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
