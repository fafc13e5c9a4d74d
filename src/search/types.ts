import type { JsonObject } from "../schemas/json";
import type { QuerySpec } from "../schemas/query";

/**
 * Minimal surface the executor needs from a search client bound to one endpoint.
 */
export interface SearchTransport {
  search(path: string, body: JsonObject): Promise<unknown>;
  close(): Promise<void>;
}

export type SearchTransportFactory = (endpoint: string) => SearchTransport;

export interface QueryExecutor {
  /**
   * Runs one query and resolves with its round-trip duration in seconds.
   * Rejects with an `ExecutionError` when the call fails.
   */
  execute(spec: QuerySpec): Promise<number>;
}
