/**
 * Error types for stream blueprints and their runs.
 *
 * Every error carries a `code` for programmatic handling:
 * - SHAPE_MISMATCH: connecting endpoints whose element types differ
 * - STAGE_FAILED: a user function inside a stage threw
 * - RUN_CANCELLED: the run was cancelled through its handle
 * - WAIT_TIMED_OUT: the caller gave up waiting on a materialized value
 * - NO_SUCH_ELEMENT: a head sink saw an empty stream
 * - MATERIALIZER_CLOSED: materialize() after shutdown()
 *
 * @module errors
 */

export type StreamErrorCode =
  | "SHAPE_MISMATCH"
  | "STAGE_FAILED"
  | "RUN_CANCELLED"
  | "WAIT_TIMED_OUT"
  | "NO_SUCH_ELEMENT"
  | "MATERIALIZER_CLOSED";

export class StreamError extends Error {
  readonly code: StreamErrorCode;

  constructor(code: StreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Thrown while building a blueprint, before anything runs.
 */
export class ShapeMismatchError extends StreamError {
  constructor(
    readonly upstreamType: string,
    readonly downstreamType: string,
    readonly connection: string,
  ) {
    super(
      "SHAPE_MISMATCH",
      `Cannot connect ${connection}: upstream emits "${upstreamType}" but downstream expects "${downstreamType}"`,
    );
  }
}

/**
 * Wraps whatever a user function threw, with the stage and element that caused it.
 */
export class StageFailedError extends StreamError {
  constructor(
    readonly stageName: string,
    readonly elementIndex: number,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("STAGE_FAILED", `Stage "${stageName}" failed on element ${elementIndex}: ${reason}`, { cause });
  }
}

export class RunCancelledError extends StreamError {
  constructor(readonly runId?: string) {
    super("RUN_CANCELLED", runId ? `Run ${runId} was cancelled` : "Run was cancelled");
  }
}

/**
 * Caller-side only: the run that produced the awaited value keeps going.
 */
export class WaitTimedOutError extends StreamError {
  constructor(readonly timeoutMs: number) {
    super("WAIT_TIMED_OUT", `Timed out after ${timeoutMs}ms waiting for materialized value`);
  }
}

export class NoSuchElementError extends StreamError {
  constructor(stageName: string) {
    super("NO_SUCH_ELEMENT", `Stage "${stageName}" completed without receiving any element`);
  }
}

export class MaterializerClosedError extends StreamError {
  constructor(readonly materializerName: string) {
    super("MATERIALIZER_CLOSED", `Materializer "${materializerName}" has been shut down`);
  }
}

/**
 * How a mapping stage reacts when its function throws.
 *
 * - FAIL: fail the whole run with a StageFailedError (default)
 * - SKIP: drop the element, log it, and keep going
 */
export enum ErrorStrategy {
  FAIL = "fail",
  SKIP = "skip",
}

/**
 * Run a user-supplied stage function, attributing any failure to the stage.
 */
export async function applyStage<T>(stageName: string, index: number, fn: () => T | PromiseLike<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new StageFailedError(stageName, index, error);
  }
}
