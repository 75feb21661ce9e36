/**
 * Generator building blocks behind every stage.
 *
 * Each function takes the upstream async generator and returns a new one.
 * All of them close their upstream in a finally block so resources are
 * released when a downstream stage stops early.
 *
 * @module generators
 */

import type { Logger } from "../logging/logger";
import type { ElementType } from "./element-type";
import { applyStage, ErrorStrategy, RunCancelledError, StageFailedError } from "./errors";

/**
 * Stream the items of a sync or async iterable.
 */
export async function* fromIterable<T>(items: Iterable<T> | AsyncIterable<T>): AsyncGenerator<T> {
  for await (const item of items) {
    yield item;
  }
}

/**
 * Stream the single value a promise resolves to. A rejection fails the stream.
 */
export async function* fromPromise<T>(promise: PromiseLike<T>, stageName: string): AsyncGenerator<T> {
  yield await applyStage(stageName, 0, () => promise);
}

const ABORTED = Symbol("aborted");

function onAbort(signal: AbortSignal): { promise: Promise<typeof ABORTED>; dispose: () => void } {
  let dispose = () => {};
  const promise = new Promise<typeof ABORTED>((resolve) => {
    if (signal.aborted) {
      resolve(ABORTED);
      return;
    }
    const listener = () => resolve(ABORTED);
    signal.addEventListener("abort", listener, { once: true });
    dispose = () => signal.removeEventListener("abort", listener);
  });
  return { promise, dispose: () => dispose() };
}

/**
 * Pass items through until `signal` aborts, then throw RunCancelledError.
 *
 * A pull that is still pending when the signal fires is abandoned: the
 * upstream is asked to return and any failure doing so is logged.
 */
export async function* abortable<T>(
  stream: AsyncGenerator<T>,
  signal: AbortSignal,
  logger: Logger,
  runId?: string,
): AsyncGenerator<T> {
  const aborted = onAbort(signal);
  let cancelled = false;

  try {
    while (true) {
      const next = await Promise.race([stream.next(), aborted.promise]);
      if (next === ABORTED || signal.aborted) {
        cancelled = true;
        throw new RunCancelledError(runId);
      }
      if (next.done) return;
      yield next.value;
    }
  } finally {
    aborted.dispose();
    if (cancelled) {
      void stream.return(undefined).catch((error: unknown) => {
        logger.debug({ event: "source_close_failed", err: error });
      });
    } else {
      await stream.return(undefined);
    }
  }
}

/**
 * Validate each element against a declared element type.
 */
export async function* validate<T>(
  stream: AsyncGenerator<unknown>,
  type: ElementType<T>,
  stageName: string,
): AsyncGenerator<T> {
  let index = 0;
  try {
    for await (const item of stream) {
      const parsed = type.schema.safeParse(item);
      if (!parsed.success) {
        throw new StageFailedError(stageName, index, parsed.error);
      }
      yield parsed.data;
      index++;
    }
  } finally {
    await stream.return(undefined);
  }
}

export interface MapGeneratorOptions {
  stageName: string;
  onError: ErrorStrategy;
  logger: Logger;
}

/**
 * Transform each item. With ErrorStrategy.SKIP a throwing item is dropped and logged.
 */
export async function* map<TIn, TOut>(
  stream: AsyncGenerator<TIn>,
  fn: (item: TIn, index: number) => TOut | Promise<TOut>,
  options: MapGeneratorOptions,
): AsyncGenerator<TOut> {
  let index = 0;
  try {
    for await (const item of stream) {
      const current = index++;
      try {
        yield await applyStage(options.stageName, current, () => fn(item, current));
      } catch (error) {
        if (options.onError !== ErrorStrategy.SKIP || !(error instanceof StageFailedError)) {
          throw error;
        }
        options.logger.warn({
          event: "element_skipped",
          stage: options.stageName,
          index: current,
          err: error.cause,
        });
      }
    }
  } finally {
    await stream.return(undefined);
  }
}

export async function* filter<T>(
  stream: AsyncGenerator<T>,
  predicate: (item: T, index: number) => boolean | Promise<boolean>,
  stageName: string,
): AsyncGenerator<T> {
  let index = 0;
  try {
    for await (const item of stream) {
      const current = index++;
      if (await applyStage(stageName, current, () => predicate(item, current))) {
        yield item;
      }
    }
  } finally {
    await stream.return(undefined);
  }
}

/**
 * Expand each item into zero or more items.
 */
export async function* mapConcat<TIn, TOut>(
  stream: AsyncGenerator<TIn>,
  fn: (item: TIn, index: number) => Iterable<TOut> | Promise<Iterable<TOut>>,
  stageName: string,
): AsyncGenerator<TOut> {
  let index = 0;
  try {
    for await (const item of stream) {
      const current = index++;
      yield* await applyStage(stageName, current, () => fn(item, current));
    }
  } finally {
    await stream.return(undefined);
  }
}

/**
 * Pass the first `n` items, then close the upstream.
 */
export async function* take<T>(stream: AsyncGenerator<T>, n: number): AsyncGenerator<T> {
  let count = 0;
  try {
    if (n <= 0) return;
    for await (const item of stream) {
      yield item;
      count++;
      if (count >= n) break;
    }
  } finally {
    await stream.return(undefined);
  }
}

export async function* drop<T>(stream: AsyncGenerator<T>, n: number): AsyncGenerator<T> {
  let seen = 0;
  try {
    for await (const item of stream) {
      if (seen >= n) {
        yield item;
      } else {
        seen++;
      }
    }
  } finally {
    await stream.return(undefined);
  }
}

/**
 * Pass items while the predicate holds; the first failing item completes the stream.
 */
export async function* takeWhile<T>(
  stream: AsyncGenerator<T>,
  predicate: (item: T, index: number) => boolean | Promise<boolean>,
  stageName: string,
): AsyncGenerator<T> {
  let index = 0;
  try {
    for await (const item of stream) {
      const current = index++;
      if (!(await applyStage(stageName, current, () => predicate(item, current)))) break;
      yield item;
    }
  } finally {
    await stream.return(undefined);
  }
}

/**
 * Group items into arrays of `size`; the last group may be shorter.
 */
export async function* grouped<T>(stream: AsyncGenerator<T>, size: number): AsyncGenerator<T[]> {
  let group: T[] = [];
  try {
    for await (const item of stream) {
      group.push(item);
      if (group.length >= size) {
        yield group;
        group = [];
      }
    }
    if (group.length > 0) {
      yield group;
    }
  } finally {
    await stream.return(undefined);
  }
}

/**
 * Run a side effect for each item without changing it.
 */
export async function* tap<T>(
  stream: AsyncGenerator<T>,
  fn: (item: T, index: number) => void,
): AsyncGenerator<T> {
  let index = 0;
  try {
    for await (const item of stream) {
      fn(item, index++);
      yield item;
    }
  } finally {
    await stream.return(undefined);
  }
}
