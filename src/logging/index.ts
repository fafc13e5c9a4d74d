import pino, { type Logger, type LoggerOptions } from "pino";
import type { Config } from "../config";

export type AppLogger = Logger;

export interface CreateLoggerOptions extends LoggerOptions {
  /**
   * Override the default log level derived from configuration.
   */
  level?: LoggerOptions["level"];
}

export function createLogger(
  config: Config,
  options: CreateLoggerOptions = {},
): AppLogger {
  const { level, ...rest } = options;

  const loggerOptions: LoggerOptions = {
    level: level ?? config.logLevel,
    base: {
      service: "search-latency-probe",
      environment: config.env,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...rest,
  };

  if (config.logFile) {
    return pino(
      loggerOptions,
      pino.destination({ dest: config.logFile, mkdir: true, sync: true }),
    );
  }

  return pino(loggerOptions);
}
