import { config as loadEnvFile } from "dotenv";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const ENVIRONMENTS = ["development", "test", "production"] as const;

export const ConfigSchema = z.object({
  env: z.enum(ENVIRONMENTS),
  logLevel: z.enum(LOG_LEVELS),
  logFile: z.string().min(1).optional(),
  endpoint: z.object({
    url: z
      .string()
      .url()
      .transform((value) => value.replace(/\/+$/, "")),
    apiKey: z.string().min(1).optional(),
  }),
  queriesFile: z.string().min(1),
  ledgerFile: z.string().min(1),
  probe: z.object({
    intervalSeconds: z.number().finite().min(1),
    testDurationSeconds: z.number().finite().positive().optional(),
    requestTimeoutSeconds: z.number().finite().min(1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
type ConfigInput = z.input<typeof ConfigSchema>;

export type ConfigOverrides = Partial<Omit<ConfigInput, "endpoint" | "probe">> & {
  endpoint?: Partial<ConfigInput["endpoint"]>;
  probe?: Partial<ConfigInput["probe"]>;
};

export interface LoadConfigOptions {
  /**
   * Explicit .env file location. Pass `false` to skip dotenv entirely.
   */
  envFile?: string | false;
  /**
   * Additional environment variables to overlay (useful for tests).
   */
  envVars?: Record<string, string | undefined>;
  /**
   * Toggle dotenv loading. Defaults to `true`.
   */
  useDotenv?: boolean;
  /**
   * Base directory used when resolving relative paths. Defaults to `process.cwd()`.
   */
  cwd?: string;
}

const DEFAULT_ENDPOINT = "http://localhost:9200";
const DEFAULT_INTERVAL_SECONDS = 60;
const DEFAULT_REQUEST_TIMEOUT_SECONDS = 120;

export function loadConfig(
  overrides: ConfigOverrides = {},
  options: LoadConfigOptions = {},
): Config {
  const {
    envFile,
    envVars = {},
    useDotenv = true,
    cwd: baseDir = process.cwd(),
  } = options;

  if (useDotenv) {
    const resolvedEnvPath =
      envFile === undefined
        ? path.resolve(baseDir, ".env")
        : envFile === false
          ? undefined
          : envFile;

    if (resolvedEnvPath && existsSync(resolvedEnvPath)) {
      loadEnvFile({ path: resolvedEnvPath });
    }
  }

  const mergedEnv: Record<string, string | undefined> = {
    ...process.env,
    ...envVars,
  };

  const logFile = overrides.logFile ?? blankToUndefined(mergedEnv.ESPROBER_LOG_FILENAME);

  // Interval and timeout below one second are raised to one; a duration of
  // zero or less means "run until stopped".
  const testDuration = coerceNumber(mergedEnv.ESPROBER_TEST_DURATION, 0);

  // Environment strings are validated by the schema, not trusted here.
  const raw = {
    env: overrides.env ?? blankToUndefined(mergedEnv.NODE_ENV) ?? "development",
    logLevel: overrides.logLevel ?? blankToUndefined(mergedEnv.LOG_LEVEL) ?? "info",
    logFile: logFile ? resolvePath(baseDir, logFile) : undefined,
    endpoint: {
      url:
        overrides.endpoint?.url ??
        blankToUndefined(mergedEnv.ESPROBER_API_URL) ??
        DEFAULT_ENDPOINT,
      apiKey:
        overrides.endpoint?.apiKey ?? blankToUndefined(mergedEnv.ESPROBER_API_KEY),
    },
    queriesFile: resolvePath(
      baseDir,
      overrides.queriesFile ??
        blankToUndefined(mergedEnv.ESPROBER_QUERIES_FILENAME) ??
        "queries.json",
    ),
    ledgerFile: resolvePath(
      baseDir,
      overrides.ledgerFile ??
        blankToUndefined(mergedEnv.ESPROBER_CSV_FILENAME) ??
        "esprober.csv",
    ),
    probe: {
      intervalSeconds:
        overrides.probe?.intervalSeconds ??
        Math.max(1, coerceNumber(mergedEnv.ESPROBER_QUERY_INTERVAL, DEFAULT_INTERVAL_SECONDS)),
      testDurationSeconds:
        overrides.probe?.testDurationSeconds ?? (testDuration > 0 ? testDuration : undefined),
      requestTimeoutSeconds:
        overrides.probe?.requestTimeoutSeconds ??
        Math.max(
          1,
          coerceNumber(mergedEnv.ESPROBER_REQUEST_TIMEOUT, DEFAULT_REQUEST_TIMEOUT_SECONDS),
        ),
    },
  };

  return Object.freeze(ConfigSchema.parse(raw));
}

function blankToUndefined(value?: string | null): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

function resolvePath(baseDir: string, value: string): string {
  const expanded =
    value === "~" || value.startsWith("~/")
      ? path.join(os.homedir(), value.slice(1))
      : value;
  return path.resolve(baseDir, expanded);
}

function coerceNumber(value: string | undefined, fallback: number): number {
  const normalized = blankToUndefined(value);
  if (normalized === undefined) {
    return fallback;
  }

  const parsed = Number(normalized);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Unable to coerce numeric value from "${normalized}"`);
  }
  return parsed;
}
