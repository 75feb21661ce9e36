/**
 * Sink blueprints: the consuming end of a stream.
 *
 * Every built-in sink materializes a promise that settles when its run ends.
 * State such as a fold accumulator is created inside the factory, so each run
 * gets its own.
 *
 * @example
 * ```typescript
 * const sum = Sink.fold(0, (acc: number, n: number) => acc + n);
 * const total = await Source.from([1, 2, 3]).runWith(sum, materializer); // 6
 * ```
 */

import type { ElementType, TypeTag } from "./element-type";
import { applyStage, NoSuchElementError } from "./errors";
import { deferred } from "./deferred";
import * as gen from "./generators";
import { Keep } from "./keep";
import type { Materializer } from "./materializer";
import type { Source } from "./source";
import {
  type BlueprintDescription,
  Done,
  type MaterializationContext,
  type MatPolicy,
  type SinkFactory,
  type StageDescriptor,
} from "./types";

type Consumer<In, R> = (input: AsyncGenerator<In>, ctx: MaterializationContext) => Promise<R>;

export class Sink<In, Mat> {
  readonly stages: readonly StageDescriptor[];

  /** @internal Use the static constructors or Flow.to() */
  constructor(
    stages: readonly StageDescriptor[],
    readonly factory: SinkFactory<In, Mat>,
    readonly inType?: TypeTag,
    readonly matPolicy: MatPolicy = "right",
  ) {
    this.stages = Object.freeze([...stages]);
  }

  /**
   * Build a sink whose materialized value is a promise of whatever `consumer` returns.
   * A failing consumer rejects that promise and fails the run.
   *
   * With an element type, connecting an upstream that declares a different
   * type throws ShapeMismatchError, and every element is validated.
   */
  static fromConsumer<In, R>(
    name: string,
    consumer: Consumer<In, R>,
    elementType?: ElementType<In>,
  ): Sink<In, Promise<R>> {
    return new Sink<In, Promise<R>>([{ name, role: "sink", inType: elementType?.name }], (ctx) => {
      const result = deferred<R>();
      // Keep.left and friends may drop this promise; its failure is also reported on the run.
      void result.promise.catch((error: unknown) => {
        ctx.logger.trace({ event: "materialized_value_rejected", stage: name, err: error });
      });

      return {
        mat: result.promise,
        consume: async (input) => {
          try {
            result.resolve(await consumer(elementType ? gen.validate(input, elementType, name) : input, ctx));
          } catch (error) {
            result.reject(error);
            throw error;
          }
        },
      };
    }, elementType);
  }

  /**
   * Reduce the stream into a single value, starting from `zero`.
   */
  static fold<In, Acc>(
    zero: Acc,
    fn: (accumulator: Acc, element: In) => Acc | Promise<Acc>,
    elementType?: ElementType<In>,
  ): Sink<In, Promise<Acc>> {
    return Sink.fromConsumer<In, Acc>("fold", async (input) => {
      let accumulator = zero;
      let index = 0;
      for await (const element of input) {
        const current = accumulator;
        accumulator = await applyStage("fold", index++, () => fn(current, element));
      }
      return accumulator;
    }, elementType);
  }

  /**
   * First element of the stream; fails with NoSuchElementError if there is none.
   */
  static head<In>(elementType?: ElementType<In>): Sink<In, Promise<In>> {
    return Sink.fromConsumer<In, In>("head", async (input) => {
      for await (const element of input) {
        return element;
      }
      throw new NoSuchElementError("head");
    }, elementType);
  }

  static headOption<In>(): Sink<In, Promise<In | undefined>> {
    return Sink.fromConsumer<In, In | undefined>("headOption", async (input) => {
      for await (const element of input) {
        return element;
      }
      return undefined;
    });
  }

  /**
   * Pull every element and discard it.
   */
  static ignore(): Sink<unknown, Promise<Done>> {
    return Sink.fromConsumer<unknown, Done>("ignore", async (input) => {
      let next = await input.next();
      while (!next.done) {
        next = await input.next();
      }
      return Done;
    });
  }

  static foreach<In>(
    fn: (element: In) => void | Promise<void>,
    elementType?: ElementType<In>,
  ): Sink<In, Promise<Done>> {
    return Sink.fromConsumer<In, Done>("foreach", async (input) => {
      let index = 0;
      for await (const element of input) {
        await applyStage("foreach", index++, () => fn(element));
      }
      return Done;
    }, elementType);
  }

  /**
   * Collect every element into an array. Only for finite streams.
   */
  static collect<In>(elementType?: ElementType<In>): Sink<In, Promise<In[]>> {
    return Sink.fromConsumer<In, In[]>("collect", async (input) => {
      const elements: In[] = [];
      for await (const element of input) {
        elements.push(element);
      }
      return elements;
    }, elementType);
  }

  /**
   * Connect `source` to this sink and run it, returning the source's materialized value.
   */
  runWith<SourceMat>(source: Source<In, SourceMat>, materializer: Materializer): SourceMat {
    return source.to(this, Keep.left).run(materializer);
  }

  describe(): BlueprintDescription {
    return { stages: this.stages, matPolicy: this.matPolicy };
  }
}
