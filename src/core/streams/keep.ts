/**
 * Materialized value combiners used when connecting two blueprints.
 *
 * `source.to(sink)` keeps the right-hand (sink) value, so a source's own value,
 * such as a timer's Cancellable, is dropped unless another combiner is passed:
 *
 * ```typescript
 * const cancellable = Source.tick(1000, 1000, "tick")
 *   .to(Sink.ignore(), Keep.left)
 *   .run(materializer);
 * ```
 */

import { type MatPolicy, NotUsed } from "./types";

export type MatCombiner<L, R, M> = (left: L, right: R) => M;

function keepLeft<L, R>(left: L, _right: R): L {
  return left;
}

function keepRight<L, R>(_left: L, right: R): R {
  return right;
}

function keepBoth<L, R>(left: L, right: R): [L, R] {
  return [left, right];
}

function keepNone<L, R>(_left: L, _right: R): NotUsed {
  return NotUsed;
}

export const Keep = {
  left: keepLeft,
  right: keepRight,
  both: keepBoth,
  none: keepNone,
} as const;

const policies = new Map<unknown, MatPolicy>([
  [keepLeft, "left"],
  [keepRight, "right"],
  [keepBoth, "both"],
  [keepNone, "none"],
]);

/**
 * Name of the policy a combiner implements; anything not from Keep is "custom".
 */
export function policyOf(combine: unknown): MatPolicy {
  return policies.get(combine) ?? "custom";
}
