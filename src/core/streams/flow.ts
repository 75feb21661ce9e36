/**
 * Flow blueprints: reusable processing steps with one input and one output.
 *
 * ```typescript
 * const doubler = Flow.of(ElementTypes.number).map((n) => n * 2);
 *
 * Source.from([1, 2, 3]).via(doubler).to(Sink.foreach(console.log));
 * const printDoubled = doubler.to(Sink.foreach(console.log));
 * ```
 */

import { assertCompatible, type ElementType, type TypeTag } from "./element-type";
import * as gen from "./generators";
import { Keep, type MatCombiner, policyOf } from "./keep";
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
import { Sink } from "./sink";
import { type BlueprintDescription, type FlowFactory, type MatPolicy, NotUsed, type StageDescriptor } from "./types";

export class Flow<In, Out, Mat> {
  readonly stages: readonly StageDescriptor[];

  /** @internal Use Flow.of() */
  constructor(
    stages: readonly StageDescriptor[],
    readonly factory: FlowFactory<In, Out, Mat>,
    readonly inType?: TypeTag,
    readonly outType?: TypeTag,
    readonly matPolicy: MatPolicy = "left",
  ) {
    this.stages = Object.freeze([...stages]);
  }

  /**
   * Identity flow. With an element type, every element is validated against it
   * and connects to endpoints declaring a different type are rejected.
   */
  static of<T>(elementType?: ElementType<T>): Flow<T, T, NotUsed> {
    return new Flow<T, T, NotUsed>(
      [{ name: "of", role: "flow", inType: elementType?.name, outType: elementType?.name }],
      () => ({
        transform: (input) => (elementType ? gen.validate(input, elementType, "of") : input),
        mat: NotUsed,
      }),
      elementType,
      elementType,
    );
  }

  private append<Next>(stage: StageDefinition<Out, Next>, outType: TypeTag | undefined): Flow<In, Next, Mat> {
    return new Flow<In, Next, Mat>(
      [...this.stages, { name: stage.name, role: "flow", inType: this.outType?.name, outType: outType?.name }],
      (ctx) => {
        const upstream = this.factory(ctx);
        return { transform: (input) => stage.logic(upstream.transform(input), ctx), mat: upstream.mat };
      },
      this.inType,
      outType,
      this.matPolicy,
    );
  }

  map<Next>(fn: (element: Out, index: number) => Next | Promise<Next>, options?: MapOptions<Next>): Flow<In, Next, Mat> {
    const stage = mapStage(fn, options);
    return this.append(stage, stage.outType);
  }

  mapAsync<Next>(parallelism: number, fn: (element: Out, index: number) => Promise<Next>): Flow<In, Next, Mat> {
    return this.append(mapAsyncStage(parallelism, fn), undefined);
  }

  filter(predicate: (element: Out, index: number) => boolean | Promise<boolean>): Flow<In, Out, Mat> {
    return this.append(filterStage(predicate), this.outType);
  }

  mapConcat<Next>(
    fn: (element: Out, index: number) => Iterable<Next> | Promise<Iterable<Next>>,
  ): Flow<In, Next, Mat> {
    return this.append(mapConcatStage(fn), undefined);
  }

  take(n: number): Flow<In, Out, Mat> {
    return this.append(takeStage<Out>(n), this.outType);
  }

  drop(n: number): Flow<In, Out, Mat> {
    return this.append(dropStage<Out>(n), this.outType);
  }

  takeWhile(predicate: (element: Out, index: number) => boolean | Promise<boolean>): Flow<In, Out, Mat> {
    return this.append(takeWhileStage(predicate), this.outType);
  }

  grouped(size: number): Flow<In, Out[], Mat> {
    return this.append(groupedStage<Out>(size), undefined);
  }

  log(label: string): Flow<In, Out, Mat> {
    return this.append(logStage<Out>(label), this.outType);
  }

  via<Next>(flow: Flow<Out, Next, unknown>): Flow<In, Next, Mat>;
  via<Next, FlowMat, M>(flow: Flow<Out, Next, FlowMat>, combine: MatCombiner<Mat, FlowMat, M>): Flow<In, Next, M>;
  via<Next, FlowMat, M>(
    flow: Flow<Out, Next, FlowMat>,
    combine?: MatCombiner<Mat, FlowMat, M>,
  ): Flow<In, Next, Mat> | Flow<In, Next, M> {
    return combine ? this.viaWith(flow, combine) : this.viaWith(flow, Keep.left);
  }

  private viaWith<Next, FlowMat, M>(
    flow: Flow<Out, Next, FlowMat>,
    combine: MatCombiner<Mat, FlowMat, M>,
  ): Flow<In, Next, M> {
    assertCompatible(this.outType, flow.inType, "flow to flow");
    return new Flow<In, Next, M>(
      [...this.stages, ...flow.stages],
      (ctx) => {
        const upstream = this.factory(ctx);
        const downstream = flow.factory(ctx);
        return {
          transform: (input) => downstream.transform(upstream.transform(input)),
          mat: combine(upstream.mat, downstream.mat),
        };
      },
      this.inType,
      flow.outType,
      policyOf(combine),
    );
  }

  /**
   * Prefix `sink` with this flow. Keeps this flow's materialized value unless
   * `combine` says otherwise.
   */
  to<SinkMat>(sink: Sink<Out, SinkMat>): Sink<In, Mat>;
  to<SinkMat, M>(sink: Sink<Out, SinkMat>, combine: MatCombiner<Mat, SinkMat, M>): Sink<In, M>;
  to<SinkMat, M>(sink: Sink<Out, SinkMat>, combine?: MatCombiner<Mat, SinkMat, M>): Sink<In, Mat> | Sink<In, M> {
    return combine ? this.toWith(sink, combine) : this.toWith(sink, Keep.left);
  }

  private toWith<SinkMat, M>(sink: Sink<Out, SinkMat>, combine: MatCombiner<Mat, SinkMat, M>): Sink<In, M> {
    assertCompatible(this.outType, sink.inType, "flow to sink");
    return new Sink<In, M>(
      [...this.stages, ...sink.stages],
      (ctx) => {
        const upstream = this.factory(ctx);
        const downstream = sink.factory(ctx);
        return {
          consume: (input) => downstream.consume(upstream.transform(input)),
          mat: combine(upstream.mat, downstream.mat),
        };
      },
      this.inType,
      policyOf(combine),
    );
  }

  describe(): BlueprintDescription {
    return { stages: this.stages, matPolicy: this.matPolicy };
  }
}
