import { loadConfig, type Config } from "./config";
import { createLogger, type AppLogger } from "./logging";
import { CsvResultLedger, readAll } from "./ledger/result-ledger";
import { ProbeLoop, type ProbeClock } from "./probe/loop";
import { loadQuerySpecs } from "./queries/loader";
import type { QuerySpec } from "./schemas/query";
import {
  SearchClientRegistry,
  createElasticsearchTransportFactory,
} from "./search/client-registry";
import { SearchQueryExecutor } from "./search/executor";
import type { QueryExecutor, SearchTransportFactory } from "./search/types";
import { RunningStats } from "./stats/running-stats";

export interface AppContainer {
  config: Config;
  logger: AppLogger;
  queries: readonly QuerySpec[];
  ledger: CsvResultLedger;
  stats: RunningStats;
  clients: SearchClientRegistry;
  executor: QueryExecutor;
  loop: ProbeLoop;
  shutdown: () => Promise<void>;
}

export interface CreateContainerOptions {
  config?: Config;
  logger?: AppLogger;
  transportFactory?: SearchTransportFactory;
  clock?: ProbeClock;
}

/**
 * Loads the query definitions, opens the ledger and seeds the running averages
 * from its history. Any failure here is a startup failure.
 */
export async function createAppContainer(
  options: CreateContainerOptions = {},
): Promise<AppContainer> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);

  const queries = await loadQuerySpecs(config.queriesFile);
  logger.info(
    { queriesFile: config.queriesFile, queries: queries.map((query) => query.name) },
    "Query definitions loaded",
  );

  const stats = await RunningStats.fromResults(readAll(config.ledgerFile));
  logger.info(
    { ledgerFile: config.ledgerFile, history: stats.snapshot() },
    "Running averages seeded from ledger",
  );

  const ledger = await CsvResultLedger.open(config.ledgerFile);
  if (ledger.discardedBytes > 0) {
    logger.warn(
      { ledgerFile: config.ledgerFile, discardedBytes: ledger.discardedBytes },
      "Removed an interrupted trailing row from the ledger",
    );
  }

  const clients = new SearchClientRegistry(
    options.transportFactory ??
      createElasticsearchTransportFactory({
        apiKey: config.endpoint.apiKey,
        requestTimeoutMs: config.probe.requestTimeoutSeconds * 1000,
      }),
  );

  const executor = new SearchQueryExecutor({
    endpoint: config.endpoint.url,
    registry: clients,
  });

  const loop = new ProbeLoop({
    queries,
    executor,
    ledger,
    stats,
    logger,
    intervalSeconds: config.probe.intervalSeconds,
    testDurationSeconds: config.probe.testDurationSeconds,
    clock: options.clock,
  });

  return {
    config,
    logger,
    queries,
    ledger,
    stats,
    clients,
    executor,
    loop,
    shutdown: async () => {
      try {
        await clients.closeAll();
      } finally {
        await ledger.close();
      }
    },
  };
}
