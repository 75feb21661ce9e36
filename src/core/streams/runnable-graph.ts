/**
 * A fully connected blueprint: a source wired to a sink, ready to run.
 *
 * Running the same graph twice gives two independent runs with two
 * independent materialized values.
 */

import type { Materializer } from "./materializer";
import type { BlueprintDescription, GraphFactory, MatPolicy, StageDescriptor } from "./types";

export class RunnableGraph<Mat> {
  readonly stages: readonly StageDescriptor[];

  /** @internal Use Source.to() */
  constructor(
    stages: readonly StageDescriptor[],
    readonly matPolicy: MatPolicy,
    readonly factory: GraphFactory<Mat>,
  ) {
    this.stages = Object.freeze([...stages]);
  }

  /**
   * Materialize this graph and return the materialized value of the new run.
   * Use materializer.materialize() to get the RunHandle as well.
   */
  run(materializer: Materializer): Mat {
    return materializer.materialize(this).materializedValue;
  }

  describe(): BlueprintDescription {
    return { stages: this.stages, matPolicy: this.matPolicy };
  }
}
