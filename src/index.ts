import process from "node:process";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { loadConfig } from "./config";
import { createLogger } from "./logging";
import { createAppContainer } from "./container";
import type { ProbeRunSummary } from "./probe/loop";

export interface BootstrapResult {
  readonly config: ReturnType<typeof loadConfig>;
  readonly summary: ProbeRunSummary;
}

export interface BootstrapOptions {
  readonly envFile?: string | false;
  readonly envVars?: Record<string, string | undefined>;
}

export async function bootstrap(
  options: BootstrapOptions = {},
): Promise<BootstrapResult> {
  const { envFile, envVars } = options;
  const config = loadConfig({}, { envFile, envVars });
  const logger = createLogger(config);
  const version = process.env.npm_package_version ?? "0.3.0";

  console.error(
    renderBanner({
      appName: "search-latency-probe",
      version,
      endpoint: config.endpoint.url,
      ledgerFile: config.ledgerFile,
    }),
  );

  logger.info(
    {
      endpoint: config.endpoint.url,
      apiKey: config.endpoint.apiKey ? "configured" : "none",
      queriesFile: config.queriesFile,
      ledgerFile: config.ledgerFile,
      ledgerDir: path.dirname(config.ledgerFile),
      intervalSeconds: config.probe.intervalSeconds,
      testDurationSeconds: config.probe.testDurationSeconds ?? null,
      requestTimeoutSeconds: config.probe.requestTimeoutSeconds,
    },
    "Configuration resolved",
  );

  const container = await createAppContainer({ config, logger });

  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Received termination signal");
    container.loop.requestStop();
  };

  process.once("SIGINT", handleSignal);
  process.once("SIGTERM", handleSignal);
  if (process.platform === "win32") {
    // Handle Ctrl+Break on Windows
    process.once("SIGBREAK", handleSignal);
  }

  try {
    const summary = await container.loop.run();
    return { config, summary };
  } finally {
    process.off("SIGINT", handleSignal);
    process.off("SIGTERM", handleSignal);
    process.off("SIGBREAK", handleSignal);
    try {
      await container.shutdown();
    } catch (error) {
      logger.error({ err: error }, "Error during shutdown");
    }
  }
}

export function isEntryPoint(moduleUrl: string, argv: readonly string[] = process.argv): boolean {
  const script = argv[1];
  return script !== undefined && moduleUrl === pathToFileURL(path.resolve(script)).href;
}

if (isEntryPoint(import.meta.url)) {
  let cli: CliParseResult;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printHelp();
    process.exit(1);
  }

  if (cli.showHelp) {
    printHelp();
    process.exit(0);
  }

  for (const [key, value] of Object.entries(cli.envVars)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  bootstrap({
    envFile: cli.envFile,
    envVars: cli.envVars,
  }).then(
    () => process.exit(0),
    (error: unknown) => {
      console.error("Fatal probe error:", error);
      process.exit(1);
    },
  );
}

interface BannerOptions {
  appName: string;
  version: string;
  endpoint: string;
  ledgerFile: string;
}

function renderBanner({ appName, version, endpoint, ledgerFile }: BannerOptions): string {
  const lines = [
    "===============================================",
    `  ${appName} v${version}`,
    `  Endpoint: ${endpoint}`,
    `  Ledger: ${ledgerFile}`,
    "===============================================",
  ];

  return `\n${lines.join("\n")}\n`;
}

export interface CliParseResult {
  envFile?: string | false;
  envVars: Record<string, string | undefined>;
  showHelp: boolean;
}

export function parseCliArgs(argv: string[], cwd: string = process.cwd()): CliParseResult {
  const result: CliParseResult = {
    envVars: {},
    showHelp: false,
  };

  const requireValue = (flag: string, value: string | undefined): string => {
    if (!value) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--":
        return result;
      case "-h":
      case "--help":
        result.showHelp = true;
        return result;
      case "-c":
      case "--config": {
        const value = requireValue(arg, argv[i + 1]);
        result.envFile =
          value.toLowerCase() === "false" ? false : path.resolve(cwd, value);
        i += 1;
        break;
      }
      case "-q":
      case "--queries":
        result.envVars.ESPROBER_QUERIES_FILENAME = requireValue(arg, argv[i + 1]);
        i += 1;
        break;
      case "-o":
      case "--output":
        result.envVars.ESPROBER_CSV_FILENAME = requireValue(arg, argv[i + 1]);
        i += 1;
        break;
      case "-e":
      case "--env": {
        const value = argv[i + 1];
        if (!value || !value.includes("=")) {
          throw new Error("Expected KEY=VALUE after --env");
        }
        const [key, ...rest] = value.split("=");
        result.envVars[key] = rest.join("=");
        i += 1;
        break;
      }
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

function printHelp(): void {
  const lines = [
    "Usage: esprober [options]",
    "",
    "Options:",
    "  -c, --config <path>      Load environment variables from the specified .env file",
    "  -q, --queries <path>     Query definition file (sets ESPROBER_QUERIES_FILENAME)",
    "  -o, --output <path>      Result ledger CSV file (sets ESPROBER_CSV_FILENAME)",
    "  -e, --env KEY=VALUE      Inject additional environment variables (repeatable)",
    "  -h, --help               Show this help message",
    "",
    "Examples:",
    "  esprober --queries ./queries.json --output ./results/latency.csv",
    "  esprober --config ./prod.env --env ESPROBER_TEST_DURATION=3600",
    "  esprober --env ESPROBER_QUERY_INTERVAL=5 --env LOG_LEVEL=debug",
  ];

  console.log(lines.join("\n"));
}
