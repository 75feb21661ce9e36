/**
 * One execution of a runnable graph.
 *
 * State machine:
 *
 *   created -> running -> completed | cancelled | failed
 *
 * The run starts on a later microtask, so the handle is always observed in
 * the `created` state first. `completion` never rejects; failures are reported
 * as an outcome and through the sink's materialized value.
 */

import type { Logger } from "../logging/logger";
import { RunCancelledError } from "./errors";
import type { RunOutcome, RunState } from "./types";

export class RunHandle<Mat> {
  private currentState: RunState = "created";
  private readonly startedAt = Date.now();
  readonly completion: Promise<RunOutcome>;

  /** @internal Created by Materializer.materialize() */
  constructor(
    readonly id: string,
    readonly materializedValue: Mat,
    private readonly controller: AbortController,
    private readonly logger: Logger,
    run: () => Promise<void>,
    private readonly onTerminate: (outcome: RunOutcome) => void,
  ) {
    this.completion = Promise.resolve().then(() => this.execute(run));
  }

  get state(): RunState {
    return this.currentState;
  }

  get isTerminated(): boolean {
    return this.currentState === "completed" || this.currentState === "cancelled" || this.currentState === "failed";
  }

  /**
   * Abort the run. Returns false if it had already ended or was already cancelled.
   *
   * Cancellation is cooperative: the source stops being pulled, elements that
   * were already emitted stay emitted, and the sink's materialized value
   * rejects with RunCancelledError.
   */
  cancel(): boolean {
    if (this.isTerminated || this.controller.signal.aborted) return false;
    this.logger.debug({ event: "run_cancel_requested" });
    this.controller.abort();
    return true;
  }

  private async execute(run: () => Promise<void>): Promise<RunOutcome> {
    this.currentState = "running";
    this.logger.debug({ event: "run_started" });

    try {
      await run();
      return this.finish({ state: "completed" });
    } catch (error) {
      if (error instanceof RunCancelledError) {
        return this.finish({ state: "cancelled" });
      }
      return this.finish({ state: "failed", error });
    }
  }

  private finish(outcome: RunOutcome): RunOutcome {
    this.currentState = outcome.state;
    const durationMs = Date.now() - this.startedAt;

    switch (outcome.state) {
      case "completed":
        this.logger.debug({ event: "run_completed", durationMs });
        break;
      case "cancelled":
        this.logger.info({ event: "run_cancelled", durationMs });
        break;
      case "failed":
        this.logger.warn({ event: "run_failed", durationMs, err: outcome.error });
        break;
    }

    this.onTerminate(outcome);
    return outcome;
  }
}
