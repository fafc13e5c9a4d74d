import { readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";
import { createLogger } from "../src/logging";
import { createTempDir, removeTempDir } from "./helpers/probe";

describe("createLogger", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir("logging-");
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it("writes JSON lines with service fields to the configured log file", async () => {
    const logFile = path.join(tempDir, "logs", "esprober.log");
    const config = loadConfig(
      { env: "test", logLevel: "info", logFile },
      { useDotenv: false, envVars: {}, cwd: tempDir },
    );
    const logger = createLogger(config);

    logger.info({ query: "a", average: 0.5 }, "Query average time");
    logger.debug("not written at info level");

    const lines = (await readFile(logFile, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 30,
      service: "search-latency-probe",
      environment: "test",
      query: "a",
      average: 0.5,
      msg: "Query average time",
    });
  });

  it("lets callers override the level", () => {
    const config = loadConfig(
      { env: "test", logLevel: "info" },
      { useDotenv: false, envVars: {}, cwd: tempDir },
    );

    expect(createLogger(config, { level: "silent" }).level).toBe("silent");
  });
});
