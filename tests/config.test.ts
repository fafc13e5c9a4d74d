import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, type LoadConfigOptions } from "../src/config";

const BASE_DIR = path.resolve("/tmp/probe-config");

const DEFAULT_OPTIONS: LoadConfigOptions = {
  useDotenv: false,
  envVars: {},
  cwd: BASE_DIR,
};

const CLEARED_ENV: Record<string, string | undefined> = {
  NODE_ENV: undefined,
  LOG_LEVEL: undefined,
  ESPROBER_LOG_FILENAME: undefined,
  ESPROBER_API_URL: undefined,
  ESPROBER_API_KEY: undefined,
  ESPROBER_QUERIES_FILENAME: undefined,
  ESPROBER_CSV_FILENAME: undefined,
  ESPROBER_QUERY_INTERVAL: undefined,
  ESPROBER_TEST_DURATION: undefined,
  ESPROBER_REQUEST_TIMEOUT: undefined,
};

function withEnv(envVars: Record<string, string | undefined>): LoadConfigOptions {
  return { ...DEFAULT_OPTIONS, envVars: { ...CLEARED_ENV, ...envVars } };
}

describe("loadConfig", () => {
  it("uses defaults when nothing is configured", () => {
    const config = loadConfig({}, withEnv({}));

    expect(config.env).toBe("development");
    expect(config.logLevel).toBe("info");
    expect(config.logFile).toBeUndefined();
    expect(config.endpoint.url).toBe("http://localhost:9200");
    expect(config.endpoint.apiKey).toBeUndefined();
    expect(config.queriesFile).toBe(path.join(BASE_DIR, "queries.json"));
    expect(config.ledgerFile).toBe(path.join(BASE_DIR, "esprober.csv"));
    expect(config.probe.intervalSeconds).toBe(60);
    expect(config.probe.testDurationSeconds).toBeUndefined();
    expect(config.probe.requestTimeoutSeconds).toBe(120);
  });

  it("applies environment variable overrides", () => {
    const config = loadConfig(
      {},
      withEnv({
        NODE_ENV: "production",
        LOG_LEVEL: "debug",
        ESPROBER_LOG_FILENAME: "logs/esprober.log",
        ESPROBER_API_URL: "https://search.example.test:9243/",
        ESPROBER_API_KEY: " test-secret ",
        ESPROBER_QUERIES_FILENAME: "/etc/probe/queries.json",
        ESPROBER_CSV_FILENAME: "results/latency.csv",
        ESPROBER_QUERY_INTERVAL: "2.5",
        ESPROBER_TEST_DURATION: "3600",
        ESPROBER_REQUEST_TIMEOUT: "30",
      }),
    );

    expect(config.env).toBe("production");
    expect(config.logLevel).toBe("debug");
    expect(config.logFile).toBe(path.join(BASE_DIR, "logs", "esprober.log"));
    expect(config.endpoint.url).toBe("https://search.example.test:9243");
    expect(config.endpoint.apiKey).toBe("test-secret");
    expect(config.queriesFile).toBe(path.resolve("/etc/probe/queries.json"));
    expect(config.ledgerFile).toBe(path.join(BASE_DIR, "results", "latency.csv"));
    expect(config.probe.intervalSeconds).toBe(2.5);
    expect(config.probe.testDurationSeconds).toBe(3600);
    expect(config.probe.requestTimeoutSeconds).toBe(30);
  });

  it("raises interval and timeout to one second", () => {
    const config = loadConfig(
      {},
      withEnv({
        ESPROBER_QUERY_INTERVAL: "0.2",
        ESPROBER_REQUEST_TIMEOUT: "0",
      }),
    );

    expect(config.probe.intervalSeconds).toBe(1);
    expect(config.probe.requestTimeoutSeconds).toBe(1);
  });

  it("treats a zero, negative or blank test duration as indefinite", () => {
    for (const value of ["0", "-5", "   "]) {
      const config = loadConfig({}, withEnv({ ESPROBER_TEST_DURATION: value }));
      expect(config.probe.testDurationSeconds).toBeUndefined();
    }
  });

  it("treats a blank API key as absent", () => {
    const config = loadConfig({}, withEnv({ ESPROBER_API_KEY: "   " }));

    expect(config.endpoint.apiKey).toBeUndefined();
  });

  it("expands a leading tilde in file paths", () => {
    const config = loadConfig({}, withEnv({ ESPROBER_CSV_FILENAME: "~/esprober.csv" }));

    expect(config.ledgerFile.startsWith("~")).toBe(false);
    expect(path.basename(config.ledgerFile)).toBe("esprober.csv");
  });

  it("honors explicit override parameters", () => {
    const config = loadConfig(
      {
        env: "test",
        logLevel: "trace",
        ledgerFile: "override.csv",
        probe: {
          intervalSeconds: 5,
          testDurationSeconds: 10,
        },
      },
      withEnv({ ESPROBER_QUERY_INTERVAL: "30" }),
    );

    expect(config.env).toBe("test");
    expect(config.logLevel).toBe("trace");
    expect(config.ledgerFile).toBe(path.join(BASE_DIR, "override.csv"));
    expect(config.probe.intervalSeconds).toBe(5);
    expect(config.probe.testDurationSeconds).toBe(10);
    expect(config.probe.requestTimeoutSeconds).toBe(120);
  });

  it("throws when overrides violate schema constraints", () => {
    expect(() =>
      loadConfig({ probe: { intervalSeconds: 0.5 } }, withEnv({})),
    ).toThrow();
    expect(() =>
      loadConfig({ endpoint: { url: "not a url" } }, withEnv({})),
    ).toThrow();
  });

  it("rejects numeric settings that do not parse", () => {
    expect(() =>
      loadConfig({}, withEnv({ ESPROBER_QUERY_INTERVAL: "often" })),
    ).toThrow('Unable to coerce numeric value from "often"');
  });
});
