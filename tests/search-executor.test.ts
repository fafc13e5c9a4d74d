import { describe, expect, it, vi } from "vitest";
import { ExecutionError } from "../src/errors";
import {
  SearchClientRegistry,
  buildSearchPath,
  normalizeEndpoint,
} from "../src/search/client-registry";
import { SearchQueryExecutor } from "../src/search/executor";
import type { SearchTransport } from "../src/search/types";
import { querySpec } from "./helpers/probe";

function createTransportMock() {
  const search = vi.fn<SearchTransport["search"]>().mockResolvedValue({ hits: { hits: [] } });
  const close = vi.fn<SearchTransport["close"]>().mockResolvedValue(undefined);
  const transport: SearchTransport = { search, close };
  return { transport, search, close };
}

describe("SearchClientRegistry", () => {
  it("creates one client per endpoint address", () => {
    const { transport } = createTransportMock();
    const factory = vi.fn().mockReturnValue(transport);
    const registry = new SearchClientRegistry(factory);

    const first = registry.get("http://search.local:9200");
    const second = registry.get("http://search.local:9200/");
    registry.get("http://other.local:9200");

    expect(first).toBe(second);
    expect(registry.size).toBe(2);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(factory).toHaveBeenNthCalledWith(1, "http://search.local:9200");
    expect(factory).toHaveBeenNthCalledWith(2, "http://other.local:9200");
  });

  it("closes every client and forgets them", async () => {
    const a = createTransportMock();
    const b = createTransportMock();
    const factory = vi.fn().mockReturnValueOnce(a.transport).mockReturnValueOnce(b.transport);
    const registry = new SearchClientRegistry(factory);
    registry.get("http://a.local");
    registry.get("http://b.local");

    await registry.closeAll();

    expect(a.close).toHaveBeenCalledTimes(1);
    expect(b.close).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(0);
  });
});

describe("search paths", () => {
  it("joins the resource path with the search endpoint", () => {
    expect(buildSearchPath("metrics-*,remote:metrics-*")).toBe("/metrics-*,remote:metrics-*/_search");
    expect(buildSearchPath("/apm-*/")).toBe("/apm-*/_search");
    expect(buildSearchPath("")).toBe("/_search");
  });

  it("trims trailing slashes from endpoints", () => {
    expect(normalizeEndpoint(" https://search.local:9243// ")).toBe("https://search.local:9243");
  });
});

describe("SearchQueryExecutor", () => {
  it("returns the round-trip time in seconds", async () => {
    const { transport, search } = createTransportMock();
    const registry = new SearchClientRegistry(() => transport);
    const now = vi.fn<() => number>().mockReturnValueOnce(1_000).mockReturnValueOnce(1_250);
    const executor = new SearchQueryExecutor({
      endpoint: "http://search.local:9200",
      registry,
      now,
    });
    const spec = querySpec("a", "metrics-*");

    const duration = await executor.execute(spec);

    expect(duration).toBe(0.25);
    expect(search).toHaveBeenCalledWith("metrics-*", spec.body);
  });

  it("reuses the same client across calls", async () => {
    const { transport } = createTransportMock();
    const factory = vi.fn().mockReturnValue(transport);
    const executor = new SearchQueryExecutor({
      endpoint: "http://search.local:9200",
      registry: new SearchClientRegistry(factory),
    });

    await executor.execute(querySpec("a"));
    await executor.execute(querySpec("b"));

    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("wraps transport failures in an ExecutionError", async () => {
    const { transport, search } = createTransportMock();
    const cause = new Error("connect ECONNREFUSED 127.0.0.1:9200");
    search.mockRejectedValueOnce(cause);
    const executor = new SearchQueryExecutor({
      endpoint: "http://search.local:9200",
      registry: new SearchClientRegistry(() => transport),
    });

    const error = await executor.execute(querySpec("x")).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({
      code: "EXECUTION",
      queryName: "x",
      message: 'Query "x" failed: connect ECONNREFUSED 127.0.0.1:9200',
      cause,
    });
    expect(search).toHaveBeenCalledTimes(1);
  });
});
