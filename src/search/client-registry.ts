import { Client } from "@elastic/elasticsearch";
import type { JsonObject } from "../schemas/json";
import type { SearchTransport, SearchTransportFactory } from "./types";

export interface ElasticsearchTransportOptions {
  apiKey?: string;
  requestTimeoutMs: number;
}

/**
 * Holds one search client per endpoint address for the lifetime of the process,
 * so repeated probes against the same endpoint reuse its connections.
 */
export class SearchClientRegistry {
  #factory: SearchTransportFactory;
  #clients = new Map<string, SearchTransport>();

  constructor(factory: SearchTransportFactory) {
    this.#factory = factory;
  }

  get(endpoint: string): SearchTransport {
    const key = normalizeEndpoint(endpoint);
    const existing = this.#clients.get(key);
    if (existing) {
      return existing;
    }

    const created = this.#factory(key);
    this.#clients.set(key, created);
    return created;
  }

  get size(): number {
    return this.#clients.size;
  }

  async closeAll(): Promise<void> {
    const clients = Array.from(this.#clients.values());
    this.#clients.clear();
    await Promise.all(clients.map((client) => client.close()));
  }
}

export function normalizeEndpoint(endpoint: string): string {
  return endpoint.trim().replace(/\/+$/, "");
}

// "metrics-a,logs-b" becomes "/metrics-a,logs-b/_search"; an empty path searches every index.
export function buildSearchPath(path: string): string {
  const target = path.trim().replace(/^\/+|\/+$/g, "");
  return target ? `/${target}/_search` : "/_search";
}

export function createElasticsearchTransportFactory(
  options: ElasticsearchTransportOptions,
): SearchTransportFactory {
  return (endpoint) => {
    const client = new Client({
      node: endpoint,
      maxRetries: 0,
      requestTimeout: options.requestTimeoutMs,
      ...(options.apiKey ? { auth: { apiKey: options.apiKey } } : {}),
    });

    return {
      search: (path: string, body: JsonObject) =>
        client.transport.request({
          method: "POST",
          path: buildSearchPath(path),
          body,
        }),
      close: () => client.close(),
    };
  };
}
