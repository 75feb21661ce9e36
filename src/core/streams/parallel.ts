/**
 * Bounded-concurrency mapping for streams.
 *
 * Never pulls more than `parallelism` items ahead of the slowest pending one,
 * so a slow function applies backpressure to the upstream. Results come out in
 * input order.
 *
 * @module parallel
 */

import { applyStage } from "./errors";

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value) => ({ ok: true, value }),
    (error: unknown) => ({ ok: false, error }),
  );
}

/**
 * Apply an async function to every item with at most `parallelism` calls in flight.
 *
 * Fails fast: the first failed call (in output order) fails the stream and
 * stops pulling from the upstream.
 *
 * @example
 * ```typescript
 * const enriched = mapAsyncOrdered(ids, 4, async (id) => lookup(id), "lookup");
 * ```
 */
export async function* mapAsyncOrdered<TIn, TOut>(
  source: AsyncGenerator<TIn>,
  parallelism: number,
  fn: (item: TIn, index: number) => Promise<TOut>,
  stageName: string,
): AsyncGenerator<TOut> {
  const pending: Array<Promise<Settled<TOut>>> = [];
  let index = 0;
  let exhausted = false;

  try {
    while (true) {
      while (!exhausted && pending.length < parallelism) {
        const next = await source.next();
        if (next.done) {
          exhausted = true;
          break;
        }
        const current = index++;
        pending.push(settle(applyStage(stageName, current, () => fn(next.value, current))));
      }

      const head = pending.shift();
      if (!head) return;

      const result = await head;
      if (!result.ok) {
        throw result.error;
      }
      yield result.value;
    }
  } finally {
    pending.length = 0;
    await source.return(undefined);
  }
}
