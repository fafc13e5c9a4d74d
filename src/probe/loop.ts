import { performance } from "node:perf_hooks";
import { setTimeout as delay } from "node:timers/promises";
import { describeError, isExecutionError } from "../errors";
import type { ResultWriter } from "../ledger/result-ledger";
import type { AppLogger } from "../logging";
import type { QuerySpec } from "../schemas/query";
import { formatTimestamp, type QueryResult } from "../schemas/result";
import type { QueryExecutor } from "../search/types";
import type { RunningStats } from "../stats/running-stats";

export type ProbeState = "init" | "running" | "stopped";
export type ProbeStopReason = "duration-elapsed" | "stop-requested";

export interface ProbeClock {
  /** Monotonic milliseconds. */
  monotonic(): number;
  /** Wall-clock instant used for result timestamps. */
  now(): Date;
  sleep(ms: number): Promise<void>;
}

export const systemClock: ProbeClock = {
  monotonic: () => performance.now(),
  now: () => new Date(),
  sleep: (ms) => delay(ms),
};

export interface ProbeRunSummary {
  sweeps: number;
  succeeded: number;
  failed: number;
  reason: ProbeStopReason;
}

export interface ProbeLoopDependencies {
  queries: readonly QuerySpec[];
  executor: QueryExecutor;
  ledger: ResultWriter;
  stats: RunningStats;
  logger: AppLogger;
  intervalSeconds: number;
  /** Total run time; absent means run until a stop is requested. */
  testDurationSeconds?: number;
  clock?: ProbeClock;
}

export class ProbeLoop {
  #queries: readonly QuerySpec[];
  #executor: QueryExecutor;
  #ledger: ResultWriter;
  #stats: RunningStats;
  #logger: AppLogger;
  #intervalMs: number;
  #durationMs: number | undefined;
  #clock: ProbeClock;
  #state: ProbeState = "init";
  #stopRequested = false;

  constructor(deps: ProbeLoopDependencies) {
    if (deps.queries.length === 0) {
      throw new Error("Probe loop needs at least one query");
    }
    if (!(deps.intervalSeconds >= 1)) {
      throw new RangeError(`Query interval must be at least 1 second, got ${deps.intervalSeconds}`);
    }

    this.#queries = deps.queries;
    this.#executor = deps.executor;
    this.#ledger = deps.ledger;
    this.#stats = deps.stats;
    this.#logger = deps.logger;
    this.#intervalMs = deps.intervalSeconds * 1000;
    this.#durationMs =
      deps.testDurationSeconds && deps.testDurationSeconds > 0
        ? deps.testDurationSeconds * 1000
        : undefined;
    this.#clock = deps.clock ?? systemClock;
  }

  get state(): ProbeState {
    return this.#state;
  }

  /**
   * Asks the loop to stop at its next resumption point: after the request in
   * flight completes, or after the current pacing sleep.
   */
  requestStop(): void {
    if (!this.#stopRequested && this.#state !== "stopped") {
      this.#stopRequested = true;
      this.#logger.info("Stop requested; probe loop will stop at the next resumption point");
    }
  }

  async run(): Promise<ProbeRunSummary> {
    if (this.#state !== "init") {
      throw new Error(`Probe loop cannot start from state "${this.#state}"`);
    }
    this.#state = "running";

    const startedAt = this.#clock.monotonic();
    const summary: ProbeRunSummary = {
      sweeps: 0,
      succeeded: 0,
      failed: 0,
      reason: "stop-requested",
    };

    try {
      for (;;) {
        if (this.#stopRequested) {
          summary.reason = "stop-requested";
          break;
        }
        if (
          this.#durationMs !== undefined &&
          this.#clock.monotonic() - startedAt >= this.#durationMs
        ) {
          summary.reason = "duration-elapsed";
          break;
        }

        summary.sweeps += 1;
        this.#logger.debug({ sweep: summary.sweeps }, "Sweep started");

        for (const spec of this.#queries) {
          if (await this.#probe(spec)) {
            summary.succeeded += 1;
          } else {
            summary.failed += 1;
          }
          if (this.#stopRequested) {
            break;
          }

          this.#logger.debug({ intervalSeconds: this.#intervalMs / 1000 }, "Sleeping before next query");
          await this.#clock.sleep(this.#intervalMs);
          if (this.#stopRequested) {
            break;
          }
        }
      }
    } finally {
      this.#state = "stopped";
    }

    this.#logger.info(summary, "Probe loop stopped");
    return summary;
  }

  async #probe(spec: QuerySpec): Promise<boolean> {
    this.#logger.info({ query: spec.name }, "Executing query");

    // Rows are stamped with the dispatch time, not the completion time.
    const dispatchedAt = this.#clock.now();
    let duration: number;
    try {
      duration = await this.#executor.execute(spec);
    } catch (error) {
      if (!isExecutionError(error)) {
        throw error;
      }
      this.#logger.warn(
        { query: spec.name, err: error, cause: describeError(error.cause) },
        "Query failed",
      );
      return false;
    }

    const result: QueryResult = {
      timestamp: formatTimestamp(dispatchedAt),
      name: spec.name,
      duration,
    };

    try {
      await this.#ledger.append(result);
    } catch (error) {
      this.#logger.error({ query: spec.name, err: error }, "Failed to record query result");
      throw error;
    }

    this.#stats.record(spec.name, duration);
    this.#logger.info(
      {
        query: spec.name,
        duration,
        average: this.#stats.average(spec.name),
        samples: this.#stats.count(spec.name),
      },
      "Query average time",
    );
    return true;
  }
}
