/**
 * Source blueprints: the producing end of a stream.
 *
 * A Source is immutable. Every operator returns a new Source that shares the
 * existing stage factories, so the receiver stays usable and keeps producing
 * exactly what it produced before:
 *
 * ```typescript
 * const numbers = Source.from([1, 2, 3]);
 * const zeroes = numbers.map(() => 0); // numbers is unchanged
 * ```
 *
 * Operators never change which materialized value a Source carries; only a
 * combiner passed to via()/to() does.
 */

import { assertCompatible, type ElementType, type TypeTag } from "./element-type";
import type { Flow } from "./flow";
import * as gen from "./generators";
import { Keep, type MatCombiner, policyOf } from "./keep";
import type { Materializer } from "./materializer";
import {
  dropStage,
  filterStage,
  groupedStage,
  logStage,
  type MapOptions,
  mapAsyncStage,
  mapConcatStage,
  mapStage,
  type StageDefinition,
  takeStage,
  takeWhileStage,
} from "./operators";
import { RunnableGraph } from "./runnable-graph";
import { Sink } from "./sink";
import { TimerCancellable, ticks } from "./ticks";
import {
  type BlueprintDescription,
  type Cancellable,
  type Done,
  type MatPolicy,
  NotUsed,
  type SourceFactory,
  type StageDescriptor,
} from "./types";

export class Source<Out, Mat> {
  readonly stages: readonly StageDescriptor[];

  /** @internal Use the static constructors */
  constructor(
    stages: readonly StageDescriptor[],
    readonly factory: SourceFactory<Out, Mat>,
    readonly outType?: TypeTag,
    readonly matPolicy: MatPolicy = "left",
  ) {
    this.stages = Object.freeze([...stages]);
  }

  /**
   * Emit the items of an iterable. Every run iterates it again from the start,
   * so pass a re-iterable collection rather than a one-shot generator.
   */
  static from<T>(items: Iterable<T> | AsyncIterable<T>, elementType?: ElementType<T>): Source<T, NotUsed> {
    return new Source<T, NotUsed>(
      [{ name: "from", role: "source", outType: elementType?.name }],
      () => ({
        stream: elementType ? gen.validate(gen.fromIterable(items), elementType, "from") : gen.fromIterable(items),
        mat: NotUsed,
      }),
      elementType,
    );
  }

  static single<T>(element: T): Source<T, NotUsed> {
    return new Source<T, NotUsed>([{ name: "single", role: "source" }], () => ({
      stream: gen.fromIterable([element]),
      mat: NotUsed,
    }));
  }

  static empty<T = never>(): Source<T, NotUsed> {
    return new Source<T, NotUsed>([{ name: "empty", role: "source" }], () => ({
      stream: gen.fromIterable<T>([]),
      mat: NotUsed,
    }));
  }

  /**
   * Emit the value `promise` resolves to; a rejection fails the run.
   */
  static fromPromise<T>(promise: PromiseLike<T>): Source<T, NotUsed> {
    return new Source<T, NotUsed>([{ name: "fromPromise", role: "source" }], () => ({
      stream: gen.fromPromise(promise, "fromPromise"),
      mat: NotUsed,
    }));
  }

  /**
   * Emit `tick` after `initialDelayMs` and then every `intervalMs`.
   *
   * Materializes a Cancellable; each run gets its own timer. Cancelling stops
   * further ticks and completes the stream.
   */
  static tick<T>(initialDelayMs: number, intervalMs: number, tick: T): Source<T, Cancellable> {
    if (!Number.isFinite(initialDelayMs) || initialDelayMs < 0) {
      throw new RangeError(`tick initial delay must be a non-negative number, got ${initialDelayMs}`);
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`tick interval must be a positive number, got ${intervalMs}`);
    }

    return new Source<T, Cancellable>([{ name: "tick", role: "source" }], (ctx) => {
      const cancellable = new TimerCancellable();
      ctx.signal.addEventListener("abort", () => cancellable.cancel(), { once: true });
      return {
        stream: ticks(initialDelayMs, intervalMs, tick, cancellable.signal),
        mat: cancellable,
      };
    });
  }

  private append<Next>(stage: StageDefinition<Out, Next>, outType: TypeTag | undefined): Source<Next, Mat> {
    return new Source<Next, Mat>(
      [...this.stages, { name: stage.name, role: "flow", inType: this.outType?.name, outType: outType?.name }],
      (ctx) => {
        const upstream = this.factory(ctx);
        return { stream: stage.logic(upstream.stream, ctx), mat: upstream.mat };
      },
      outType,
      this.matPolicy,
    );
  }

  map<Next>(fn: (element: Out, index: number) => Next | Promise<Next>, options?: MapOptions<Next>): Source<Next, Mat> {
    const stage = mapStage(fn, options);
    return this.append(stage, stage.outType);
  }

  mapAsync<Next>(parallelism: number, fn: (element: Out, index: number) => Promise<Next>): Source<Next, Mat> {
    return this.append(mapAsyncStage(parallelism, fn), undefined);
  }

  filter(predicate: (element: Out, index: number) => boolean | Promise<boolean>): Source<Out, Mat> {
    return this.append(filterStage(predicate), this.outType);
  }

  mapConcat<Next>(fn: (element: Out, index: number) => Iterable<Next> | Promise<Iterable<Next>>): Source<Next, Mat> {
    return this.append(mapConcatStage(fn), undefined);
  }

  take(n: number): Source<Out, Mat> {
    return this.append(takeStage<Out>(n), this.outType);
  }

  drop(n: number): Source<Out, Mat> {
    return this.append(dropStage<Out>(n), this.outType);
  }

  takeWhile(predicate: (element: Out, index: number) => boolean | Promise<boolean>): Source<Out, Mat> {
    return this.append(takeWhileStage(predicate), this.outType);
  }

  grouped(size: number): Source<Out[], Mat> {
    return this.append(groupedStage<Out>(size), undefined);
  }

  log(label: string): Source<Out, Mat> {
    return this.append(logStage<Out>(label), this.outType);
  }

  /**
   * Append a flow. Keeps this source's materialized value unless `combine` says otherwise.
   */
  via<Next>(flow: Flow<Out, Next, unknown>): Source<Next, Mat>;
  via<Next, FlowMat, M>(flow: Flow<Out, Next, FlowMat>, combine: MatCombiner<Mat, FlowMat, M>): Source<Next, M>;
  via<Next, FlowMat, M>(
    flow: Flow<Out, Next, FlowMat>,
    combine?: MatCombiner<Mat, FlowMat, M>,
  ): Source<Next, Mat> | Source<Next, M> {
    return combine ? this.viaWith(flow, combine) : this.viaWith(flow, Keep.left);
  }

  private viaWith<Next, FlowMat, M>(
    flow: Flow<Out, Next, FlowMat>,
    combine: MatCombiner<Mat, FlowMat, M>,
  ): Source<Next, M> {
    assertCompatible(this.outType, flow.inType, "source to flow");
    return new Source<Next, M>(
      [...this.stages, ...flow.stages],
      (ctx) => {
        const upstream = this.factory(ctx);
        const downstream = flow.factory(ctx);
        return { stream: downstream.transform(upstream.stream), mat: combine(upstream.mat, downstream.mat) };
      },
      flow.outType,
      policyOf(combine),
    );
  }

  /**
   * Connect a sink, producing a runnable graph.
   *
   * Without `combine` the graph keeps the sink's materialized value and drops
   * this source's one. Pass Keep.left or Keep.both to retain it.
   */
  to<SinkMat>(sink: Sink<Out, SinkMat>): RunnableGraph<SinkMat>;
  to<SinkMat, M>(sink: Sink<Out, SinkMat>, combine: MatCombiner<Mat, SinkMat, M>): RunnableGraph<M>;
  to<SinkMat, M>(
    sink: Sink<Out, SinkMat>,
    combine?: MatCombiner<Mat, SinkMat, M>,
  ): RunnableGraph<SinkMat> | RunnableGraph<M> {
    return combine ? this.toWith(sink, combine) : this.toWith(sink, Keep.right);
  }

  private toWith<SinkMat, M>(sink: Sink<Out, SinkMat>, combine: MatCombiner<Mat, SinkMat, M>): RunnableGraph<M> {
    assertCompatible(this.outType, sink.inType, "source to sink");
    return new RunnableGraph<M>([...this.stages, ...sink.stages], policyOf(combine), (ctx) => {
      const upstream = this.factory(ctx);
      const downstream = sink.factory(ctx);
      return {
        run: () => downstream.consume(gen.abortable(upstream.stream, ctx.signal, ctx.logger, ctx.runId)),
        mat: combine(upstream.mat, downstream.mat),
      };
    });
  }

  /**
   * Connect `sink` and run in one step, returning the sink's materialized value.
   */
  runWith<SinkMat>(sink: Sink<Out, SinkMat>, materializer: Materializer): SinkMat {
    return this.to(sink).run(materializer);
  }

  runFold<Acc>(
    zero: Acc,
    fn: (accumulator: Acc, element: Out) => Acc | Promise<Acc>,
    materializer: Materializer,
  ): Promise<Acc> {
    return this.runWith(Sink.fold(zero, fn), materializer);
  }

  runForeach(fn: (element: Out) => void | Promise<void>, materializer: Materializer): Promise<Done> {
    return this.runWith(Sink.foreach(fn), materializer);
  }

  describe(): BlueprintDescription {
    return { stages: this.stages, matPolicy: this.matPolicy };
  }
}
