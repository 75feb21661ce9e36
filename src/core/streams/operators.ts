/**
 * Stage definitions shared by Source and Flow.
 *
 * An operator is only a description: a name, optional declared output type,
 * and the logic to wire into a run. Argument checks happen here, so invalid
 * operators are rejected while the blueprint is being built.
 */

import type { ElementType, TypeTag } from "./element-type";
import { ErrorStrategy } from "./errors";
import * as gen from "./generators";
import { mapAsyncOrdered } from "./parallel";
import type { StageLogic } from "./types";

export interface StageDefinition<In, Out> {
  name: string;
  logic: StageLogic<In, Out>;
  /** Declared output type; absent when the operator cannot know it */
  outType?: TypeTag;
}

export interface MapOptions<Out> {
  /** Stage name used in errors and logs (default: "map") */
  name?: string;
  /** Reaction to a throwing function (default: ErrorStrategy.FAIL) */
  onError?: ErrorStrategy;
  /** Declared output element type */
  elementType?: ElementType<Out>;
}

function requireNonNegativeInt(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${what} must be a non-negative integer, got ${value}`);
  }
}

function requirePositiveInt(value: number, what: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${what} must be a positive integer, got ${value}`);
  }
}

export function mapStage<In, Out>(
  fn: (item: In, index: number) => Out | Promise<Out>,
  options: MapOptions<Out> = {},
): StageDefinition<In, Out> {
  const name = options.name ?? "map";
  const onError = options.onError ?? ErrorStrategy.FAIL;
  const outType = options.elementType;

  return {
    name,
    logic: (input, ctx) => {
      const mapped = gen.map(input, fn, { stageName: name, onError, logger: ctx.logger });
      return outType ? gen.validate(mapped, outType, name) : mapped;
    },
    ...(outType && { outType }),
  };
}

export function mapAsyncStage<In, Out>(
  parallelism: number,
  fn: (item: In, index: number) => Promise<Out>,
): StageDefinition<In, Out> {
  requirePositiveInt(parallelism, "mapAsync parallelism");
  return {
    name: "mapAsync",
    logic: (input) => mapAsyncOrdered(input, parallelism, fn, "mapAsync"),
  };
}

export function filterStage<T>(predicate: (item: T, index: number) => boolean | Promise<boolean>): StageDefinition<T, T> {
  return {
    name: "filter",
    logic: (input) => gen.filter(input, predicate, "filter"),
  };
}

export function mapConcatStage<In, Out>(
  fn: (item: In, index: number) => Iterable<Out> | Promise<Iterable<Out>>,
): StageDefinition<In, Out> {
  return {
    name: "mapConcat",
    logic: (input) => gen.mapConcat(input, fn, "mapConcat"),
  };
}

export function takeStage<T>(n: number): StageDefinition<T, T> {
  requireNonNegativeInt(n, "take count");
  return {
    name: "take",
    logic: (input) => gen.take(input, n),
  };
}

export function dropStage<T>(n: number): StageDefinition<T, T> {
  requireNonNegativeInt(n, "drop count");
  return {
    name: "drop",
    logic: (input) => gen.drop(input, n),
  };
}

export function takeWhileStage<T>(
  predicate: (item: T, index: number) => boolean | Promise<boolean>,
): StageDefinition<T, T> {
  return {
    name: "takeWhile",
    logic: (input) => gen.takeWhile(input, predicate, "takeWhile"),
  };
}

export function groupedStage<T>(size: number): StageDefinition<T, T[]> {
  requirePositiveInt(size, "grouped size");
  return {
    name: "grouped",
    logic: (input) => gen.grouped(input, size),
  };
}

/**
 * Debug-log every element passing through, under the given label.
 */
export function logStage<T>(label: string): StageDefinition<T, T> {
  return {
    name: `log(${label})`,
    logic: (input, ctx) =>
      gen.tap(input, (element, index) => {
        ctx.logger.debug({ event: "element", stage: label, index, element });
      }),
  };
}
