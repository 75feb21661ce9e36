/**
 * Materializer: turns runnable graphs into runs.
 *
 * Every call to materialize() builds fresh stage instances from the graph's
 * factories (new timers, new accumulators, a new abort controller), so runs of
 * the same graph never share mutable state.
 *
 * @example
 * ```typescript
 * const materializer = Materializer.create({ name: "docs" });
 * const sum = Source.from([1, 2, 3]).runWith(Sink.fold(0, (a: number, b: number) => a + b), materializer);
 * console.log(await materializer.awaitResult(sum)); // 6
 * await materializer.shutdown();
 * ```
 */

import { randomUUID } from "node:crypto";
import type { Config } from "../../config/schema";
import { applyLoggingConfig, createLogger, type Logger } from "../logging/logger";
import { awaitResult } from "./await";
import { MaterializerClosedError } from "./errors";
import { RunHandle } from "./run-handle";
import type { RunnableGraph } from "./runnable-graph";

export interface MaterializerSettings {
  /** Name used in logs and errors */
  name: string;
  /** Default timeout for awaitResult() in milliseconds */
  awaitTimeoutMs: number;
}

export const DEFAULT_MATERIALIZER_SETTINGS: MaterializerSettings = {
  name: "default",
  awaitTimeoutMs: 3000,
};

export class Materializer {
  private readonly runs = new Map<string, RunHandle<unknown>>();
  private readonly logger: Logger;
  private closed = false;

  private constructor(readonly settings: MaterializerSettings) {
    this.logger = createLogger("materializer", { materializer: settings.name });
  }

  static create(settings: Partial<MaterializerSettings> = {}): Materializer {
    return new Materializer({ ...DEFAULT_MATERIALIZER_SETTINGS, ...settings });
  }

  /**
   * Create a materializer from loaded configuration, applying its logging section first.
   */
  static fromConfig(config: Config): Materializer {
    applyLoggingConfig(config.logging);
    return Materializer.create(config.materializer);
  }

  /** Number of runs that have not reached a terminal state */
  get activeRuns(): number {
    return this.runs.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Start a new run of `graph` and return its handle.
   */
  materialize<Mat>(graph: RunnableGraph<Mat>): RunHandle<Mat> {
    if (this.closed) {
      throw new MaterializerClosedError(this.settings.name);
    }

    const runId = randomUUID();
    const controller = new AbortController();
    const logger = this.logger.child({ runId });
    const { run, mat } = graph.factory({ runId, signal: controller.signal, logger });

    logger.debug({ event: "run_materialized", stages: graph.stages.map((stage) => stage.name), matPolicy: graph.matPolicy });

    const handle = new RunHandle(runId, mat, controller, logger, run, () => {
      this.runs.delete(runId);
    });
    this.runs.set(runId, handle);
    return handle;
  }

  /**
   * Wait for a materialized value, failing with WaitTimedOutError after
   * `timeoutMs` (default: settings.awaitTimeoutMs).
   */
  awaitResult<T>(value: PromiseLike<T>, timeoutMs: number = this.settings.awaitTimeoutMs): Promise<T> {
    return awaitResult(value, timeoutMs);
  }

  /**
   * Cancel every active run and refuse new ones. Resolves once all runs have ended.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const active = [...this.runs.values()];
    this.logger.info({ event: "materializer_shutdown", activeRuns: active.length });

    for (const handle of active) {
      handle.cancel();
    }
    await Promise.all(active.map((handle) => handle.completion));
  }
}
