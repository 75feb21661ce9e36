/**
 * Stream blueprints and their materialization.
 *
 * Build immutable Source/Flow/Sink blueprints, connect them into a
 * RunnableGraph, and run it through a Materializer as many times as needed.
 *
 * @module streams
 */

export { awaitResult } from "./await";
export type { ElementType, TypeTag } from "./element-type";
export { assertCompatible, ElementTypes, elementType } from "./element-type";
export {
  ErrorStrategy,
  MaterializerClosedError,
  NoSuchElementError,
  RunCancelledError,
  ShapeMismatchError,
  StageFailedError,
  StreamError,
  type StreamErrorCode,
  WaitTimedOutError,
} from "./errors";
export { Flow } from "./flow";
export { Keep, type MatCombiner, policyOf } from "./keep";
export { DEFAULT_MATERIALIZER_SETTINGS, Materializer, type MaterializerSettings } from "./materializer";
export type { MapOptions } from "./operators";
export { RunHandle } from "./run-handle";
export { RunnableGraph } from "./runnable-graph";
export { Sink } from "./sink";
export { Source } from "./source";
export type {
  BlueprintDescription,
  Cancellable,
  MaterializationContext,
  MatPolicy,
  RunOutcome,
  RunState,
  StageDescriptor,
  StageRole,
} from "./types";
export { Done, NotUsed } from "./types";
