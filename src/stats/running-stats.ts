import type { QueryResult } from "../schemas/result";

interface Totals {
  count: number;
  sum: number;
}

export interface QueryStatsSnapshot {
  count: number;
  average: number;
}

/**
 * Full-history arithmetic mean of durations per query name.
 */
export class RunningStats {
  #totals = new Map<string, Totals>();

  static async fromResults(
    seed: AsyncIterable<QueryResult> | Iterable<QueryResult>,
  ): Promise<RunningStats> {
    const stats = new RunningStats();
    for await (const result of seed) {
      stats.record(result.name, result.duration);
    }
    return stats;
  }

  record(name: string, duration: number): void {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new RangeError(`Duration for "${name}" must be a non-negative number, got ${duration}`);
    }

    const totals = this.#totals.get(name);
    if (totals) {
      totals.count += 1;
      totals.sum += duration;
    } else {
      this.#totals.set(name, { count: 1, sum: duration });
    }
  }

  average(name: string): number {
    const totals = this.#totals.get(name);
    if (!totals || totals.count === 0) {
      return 0;
    }
    return totals.sum / totals.count;
  }

  count(name: string): number {
    return this.#totals.get(name)?.count ?? 0;
  }

  snapshot(): Record<string, QueryStatsSnapshot> {
    const snapshot: Record<string, QueryStatsSnapshot> = {};
    for (const [name, totals] of this.#totals) {
      snapshot[name] = { count: totals.count, average: totals.sum / totals.count };
    }
    return snapshot;
  }
}
