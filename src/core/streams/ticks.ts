/**
 * Periodic timer source plumbing.
 *
 * Timers only start when the generator is first pulled, and stop as soon as
 * their Cancellable (or the run's abort signal) fires. Ticks already yielded
 * are never taken back.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Cancellable } from "./types";

/**
 * Sleep for `ms`, returning false instead of waiting if `signal` aborts first.
 */
export async function delay(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
}

/**
 * Yield `tick` after `initialDelayMs`, then every `intervalMs`, until aborted.
 */
export async function* ticks<T>(
  initialDelayMs: number,
  intervalMs: number,
  tick: T,
  signal: AbortSignal,
): AsyncGenerator<T> {
  if (!(await delay(initialDelayMs, signal))) return;

  while (!signal.aborted) {
    yield tick;
    if (!(await delay(intervalMs, signal))) return;
  }
}

/**
 * Cancellable backed by an AbortController, one per timer instance.
 */
export class TimerCancellable implements Cancellable {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(): boolean {
    if (this.controller.signal.aborted) return false;
    this.controller.abort();
    return true;
  }

  isCancelled(): boolean {
    return this.controller.signal.aborted;
  }
}
