import { performance } from "node:perf_hooks";
import { toExecutionError } from "../errors";
import type { QuerySpec } from "../schemas/query";
import type { SearchClientRegistry } from "./client-registry";
import type { QueryExecutor } from "./types";

export interface SearchQueryExecutorDependencies {
  endpoint: string;
  registry: SearchClientRegistry;
  /** Monotonic clock in milliseconds. Defaults to `performance.now`. */
  now?: () => number;
}

export class SearchQueryExecutor implements QueryExecutor {
  #endpoint: string;
  #registry: SearchClientRegistry;
  #now: () => number;

  constructor(deps: SearchQueryExecutorDependencies) {
    this.#endpoint = deps.endpoint;
    this.#registry = deps.registry;
    this.#now = deps.now ?? (() => performance.now());
  }

  async execute(spec: QuerySpec): Promise<number> {
    const transport = this.#registry.get(this.#endpoint);

    const start = this.#now();
    try {
      await transport.search(spec.path, spec.body);
    } catch (error) {
      throw toExecutionError(spec.name, error);
    }
    const end = this.#now();

    return Math.max(0, end - start) / 1000;
  }
}
