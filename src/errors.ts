export type ProbeErrorCode = "LOAD" | "STORAGE" | "EXECUTION";

export interface ProbeErrorOptions {
  cause?: unknown;
}

export class ProbeError extends Error {
  readonly code: ProbeErrorCode;

  constructor(message: string, code: ProbeErrorCode, options: ProbeErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ProbeError";
    this.code = code;
  }
}

/**
 * The query definition source is missing, malformed, or defines an invalid query.
 * Always fatal at startup.
 */
export class LoadError extends ProbeError {
  readonly source: string;

  constructor(message: string, source: string, options: ProbeErrorOptions = {}) {
    super(message, "LOAD", options);
    this.name = "LoadError";
    this.source = source;
  }
}

/**
 * The result ledger could not be opened, read, or written.
 */
export class StorageError extends ProbeError {
  readonly filePath: string;

  constructor(message: string, filePath: string, options: ProbeErrorOptions = {}) {
    super(message, "STORAGE", options);
    this.name = "StorageError";
    this.filePath = filePath;
  }
}

/**
 * A single query's round trip failed. Isolated to that probe.
 */
export class ExecutionError extends ProbeError {
  readonly queryName: string;

  constructor(message: string, queryName: string, options: ProbeErrorOptions = {}) {
    super(message, "EXECUTION", options);
    this.name = "ExecutionError";
    this.queryName = queryName;
  }
}

export function isExecutionError(error: unknown): error is ExecutionError {
  return error instanceof ExecutionError;
}

export function toExecutionError(queryName: string, error: unknown): ExecutionError {
  if (error instanceof ExecutionError) {
    return error;
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new ExecutionError(`Query "${queryName}" failed: ${reason}`, queryName, {
    cause: error,
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
