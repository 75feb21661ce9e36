/**
 * Core types for stream blueprints and materialization.
 *
 * A blueprint never runs by itself. Each blueprint holds a factory; the
 * materializer calls the factory once per run with a fresh
 * MaterializationContext, and the factory returns brand new stage instances
 * together with the materialized value for that run.
 *
 * Key concepts:
 * 1. Stage instances - the live generator plumbing for one run
 * 2. Materialized value - what a run hands back to the caller (a promise, a Cancellable, ...)
 * 3. Stage descriptors - the frozen, inspectable description of a blueprint
 */

import type { Logger } from "../logging/logger";

/**
 * Materialized value of stages that produce nothing useful.
 */
export const NotUsed = Object.freeze({ kind: "NotUsed" } as const);
export type NotUsed = typeof NotUsed;

/**
 * Completion marker resolved by sinks that have no result of their own.
 */
export const Done = Object.freeze({ kind: "Done" } as const);
export type Done = typeof Done;

/**
 * Handle that stops a running resource, such as a periodic timer.
 */
export interface Cancellable {
  /** Returns true if this call cancelled it, false if it was already cancelled */
  cancel(): boolean;
  isCancelled(): boolean;
}

/**
 * Per-run context handed to every stage factory.
 */
export interface MaterializationContext {
  runId: string;
  /** Aborted when the run is cancelled through its handle */
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Stage logic: turns the upstream generator into a downstream generator.
 */
export type StageLogic<In, Out> = (input: AsyncGenerator<In>, ctx: MaterializationContext) => AsyncGenerator<Out>;

export interface SourceInstance<Out, Mat> {
  stream: AsyncGenerator<Out>;
  mat: Mat;
}

export interface FlowInstance<In, Out, Mat> {
  transform: (input: AsyncGenerator<In>) => AsyncGenerator<Out>;
  mat: Mat;
}

export interface SinkInstance<In, Mat> {
  consume: (input: AsyncGenerator<In>) => Promise<void>;
  mat: Mat;
}

export interface GraphInstance<Mat> {
  run: () => Promise<void>;
  mat: Mat;
}

export type SourceFactory<Out, Mat> = (ctx: MaterializationContext) => SourceInstance<Out, Mat>;
export type FlowFactory<In, Out, Mat> = (ctx: MaterializationContext) => FlowInstance<In, Out, Mat>;
export type SinkFactory<In, Mat> = (ctx: MaterializationContext) => SinkInstance<In, Mat>;
export type GraphFactory<Mat> = (ctx: MaterializationContext) => GraphInstance<Mat>;

export type StageRole = "source" | "flow" | "sink";

export interface StageDescriptor {
  readonly name: string;
  readonly role: StageRole;
  /** Declared element type name consumed by this stage, if any */
  readonly inType?: string;
  /** Declared element type name produced by this stage, if any */
  readonly outType?: string;
}

/**
 * Which side's materialized value survives a connect.
 */
export type MatPolicy = "left" | "right" | "both" | "none" | "custom";

export interface BlueprintDescription {
  stages: readonly StageDescriptor[];
  matPolicy: MatPolicy;
}

export type RunState = "created" | "running" | "completed" | "cancelled" | "failed";

/**
 * Terminal state of a run, as reported by RunHandle.completion.
 */
export type RunOutcome = { state: "completed" } | { state: "cancelled" } | { state: "failed"; error: unknown };
