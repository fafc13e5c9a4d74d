import { parse } from "csv-parse";
import { stringify } from "csv-stringify/sync";
import { ensureDir, pathExists } from "fs-extra/esm";
import { createReadStream } from "node:fs";
import { open, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { StorageError, describeError } from "../errors";
import { LEDGER_COLUMNS, LedgerRowSchema, type QueryResult } from "../schemas/result";

export interface ResultWriter {
  append(result: QueryResult): Promise<void>;
}

const TAIL_CHUNK_BYTES = 4096;
const LINE_FEED = 0x0a;

/**
 * Append-only CSV record of probe results.
 *
 * Every row is encoded up front and handed to a single write followed by an
 * fsync. A write that fails or comes up short is truncated away, and `open`
 * cuts an unterminated last line left by a crash, so the file only ever holds
 * complete rows.
 */
export class CsvResultLedger implements ResultWriter {
  #filePath: string;
  #handle: FileHandle | null;
  #discardedBytes: number;

  private constructor(filePath: string, handle: FileHandle, discardedBytes: number) {
    this.#filePath = filePath;
    this.#handle = handle;
    this.#discardedBytes = discardedBytes;
  }

  static async open(filePath: string): Promise<CsvResultLedger> {
    const resolved = path.resolve(filePath);

    try {
      await ensureDir(path.dirname(resolved));
    } catch (error) {
      throw new StorageError(
        `Cannot create ledger directory for "${resolved}": ${describeError(error)}`,
        resolved,
        { cause: error },
      );
    }

    let handle: FileHandle;
    try {
      handle = await open(resolved, "a+");
    } catch (error) {
      throw new StorageError(
        `Cannot open ledger "${resolved}" for append: ${describeError(error)}`,
        resolved,
        { cause: error },
      );
    }

    try {
      const { size } = await handle.stat();
      const complete = await terminatedLength(handle, size);
      if (complete < size) {
        await handle.truncate(complete);
        await handle.sync();
      }

      const ledger = new CsvResultLedger(resolved, handle, size - complete);
      if (complete === 0) {
        await ledger.#writeRecord(encodeRecord(LEDGER_COLUMNS));
      }
      return ledger;
    } catch (error) {
      await handle.close();
      throw toStorageError(error, resolved, "prepare");
    }
  }

  get filePath(): string {
    return this.#filePath;
  }

  /** Bytes of an unterminated trailing line removed when the ledger was opened. */
  get discardedBytes(): number {
    return this.#discardedBytes;
  }

  async append(result: QueryResult): Promise<void> {
    try {
      await this.#writeRecord(
        encodeRecord([result.timestamp, result.name, result.duration]),
      );
    } catch (error) {
      throw toStorageError(error, this.#filePath, "append to");
    }
  }

  async close(): Promise<void> {
    const handle = this.#handle;
    this.#handle = null;
    if (handle) {
      await handle.close();
    }
  }

  async #writeRecord(record: string): Promise<void> {
    const handle = this.#handle;
    if (!handle) {
      throw new StorageError(`Ledger "${this.#filePath}" is closed`, this.#filePath);
    }

    const buffer = Buffer.from(record, "utf8");
    const { size } = await handle.stat();
    try {
      const { bytesWritten } = await handle.write(buffer, 0, buffer.length);
      if (bytesWritten !== buffer.length) {
        throw new StorageError(
          `Short write to ledger "${this.#filePath}" (${bytesWritten} of ${buffer.length} bytes)`,
          this.#filePath,
        );
      }
    } catch (error) {
      await handle.truncate(size);
      throw error;
    }
    await handle.sync();
  }
}

/**
 * Lazily yields every recorded result in write order. Each call reads the file
 * from the start; a missing file yields nothing. A last line without a line
 * terminator is an interrupted append and is not read.
 */
export async function* readAll(filePath: string): AsyncGenerator<QueryResult> {
  const resolved = path.resolve(filePath);
  if (!(await pathExists(resolved))) {
    return;
  }

  let complete: number;
  try {
    complete = await measureTerminatedLength(resolved);
  } catch (error) {
    throw toStorageError(error, resolved, "read");
  }
  if (complete === 0) {
    return;
  }

  const source = createReadStream(resolved, { start: 0, end: complete - 1 });
  const parser = source.pipe(parse({ skip_empty_lines: true, relax_column_count: true }));
  source.on("error", (error) => parser.destroy(error));

  let line = 0;
  try {
    for await (const chunk of parser) {
      const record: unknown = chunk;
      line += 1;
      if (line === 1) {
        assertHeader(record, resolved);
        continue;
      }

      const row = LedgerRowSchema.safeParse(record);
      if (!row.success) {
        const reason = row.error.issues.map((issue) => issue.message).join("; ");
        throw new StorageError(
          `Malformed ledger row ${line} in "${resolved}": ${reason}`,
          resolved,
          { cause: row.error },
        );
      }
      yield row.data;
    }
  } catch (error) {
    throw toStorageError(error, resolved, "read");
  } finally {
    parser.destroy();
    source.destroy();
  }
}

async function measureTerminatedLength(filePath: string): Promise<number> {
  const handle = await open(filePath, "r");
  try {
    const { size } = await handle.stat();
    return await terminatedLength(handle, size);
  } finally {
    await handle.close();
  }
}

/** Length of the file up to and including its last line feed. */
async function terminatedLength(handle: FileHandle, size: number): Promise<number> {
  const buffer = Buffer.alloc(TAIL_CHUNK_BYTES);
  let end = size;
  while (end > 0) {
    const start = Math.max(0, end - TAIL_CHUNK_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, end - start, start);
    const index = buffer.subarray(0, bytesRead).lastIndexOf(LINE_FEED);
    if (index !== -1) {
      return start + index + 1;
    }
    end = start;
  }
  return 0;
}

function assertHeader(record: unknown, filePath: string): void {
  const fields = Array.isArray(record) ? record.map(String) : [];
  const matches =
    fields.length === LEDGER_COLUMNS.length &&
    LEDGER_COLUMNS.every((column, index) => fields[index]?.trim() === column);

  if (!matches) {
    throw new StorageError(
      `Ledger "${filePath}" has an unexpected header: ${fields.join(",")}`,
      filePath,
    );
  }
}

function encodeRecord(fields: ReadonlyArray<string | number>): string {
  return stringify([[...fields]]);
}

function toStorageError(error: unknown, filePath: string, action: string): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(
    `Cannot ${action} ledger "${filePath}": ${describeError(error)}`,
    filePath,
    { cause: error },
  );
}
