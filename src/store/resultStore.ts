import {
  closeSync,
  fsyncSync,
  fstatSync,
  ftruncateSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  writeSync,
} from "fs";
import { dirname, resolve } from "path";
import { z } from "zod";
import { TIME_FIELD_PRECISION } from "../config/constants.js";
import {
  AccessModeSchema,
  COUNTER_COLUMNS,
  type AccessMode,
  type CounterEvent,
} from "../config/types.js";
import { ResultStoreError } from "../errors.js";
import { logger } from "../util/logger.js";
import type { ResultRow } from "../sweep/types.js";

export const FIXED_COLUMNS = [
  "record_size",
  "total_bytes",
  "mode",
  "wall_time_sec",
  "syscall_count",
  "syscall_time_sec",
] as const;

export function resultHeader(counters: readonly CounterEvent[]): string[] {
  return [...FIXED_COLUMNS, ...counters.map((event) => COUNTER_COLUMNS[event])];
}

function formatTime(seconds: number): string {
  return seconds.toFixed(TIME_FIELD_PRECISION);
}

function formatCount(value: number): string {
  return Math.trunc(value).toFixed(0);
}

export function formatResultRow(
  row: ResultRow,
  counters: readonly CounterEvent[],
): string[] {
  return [
    String(row.recordSize),
    String(row.totalBytes),
    row.mode,
    formatTime(row.wallTimeSec),
    formatCount(row.syscallCount),
    formatTime(row.syscallTimeSec),
    ...counters.map((event) => formatCount(row.counters[event])),
  ];
}

function toLine(fields: readonly string[]): string {
  return fields.join(",") + "\n";
}

function readFirstLine(fd: number, size: number): string {
  const buffer = Buffer.alloc(Math.min(size, 4096));
  const bytesRead = readSync(fd, buffer, 0, buffer.length, 0);
  const text = buffer.subarray(0, bytesRead).toString("utf-8");
  const newline = text.indexOf("\n");
  return (newline >= 0 ? text.slice(0, newline) : text).trim();
}

const TAIL_CHUNK_BYTES = 4096;
const NEWLINE_BYTE = 0x0a;

/** Offset just past the last "\n" in the file, or 0 when there is none. */
function endOfLastLine(fd: number, size: number): number {
  const buffer = Buffer.alloc(TAIL_CHUNK_BYTES);
  let end = size;
  while (end > 0) {
    const start = Math.max(0, end - buffer.length);
    const bytesRead = readSync(fd, buffer, 0, end - start, start);
    const newline = buffer.subarray(0, bytesRead).lastIndexOf(NEWLINE_BYTE);
    if (newline >= 0) {
      return start + newline + 1;
    }
    end = start;
  }
  return 0;
}

export interface OpenResultStoreOptions {
  /** Keep existing rows instead of truncating the file. */
  append?: boolean;
}

/**
 * Append-only CSV writer. Each row is written and fsynced before append()
 * returns, so an interrupted sweep leaves every completed row on disk.
 */
export class ResultStoreWriter {
  private fd: number | null;
  private rowsWritten = 0;

  private constructor(
    readonly path: string,
    private readonly counters: readonly CounterEvent[],
    fd: number,
  ) {
    this.fd = fd;
  }

  static open(
    path: string,
    counters: readonly CounterEvent[],
    options: OpenResultStoreOptions = {},
  ): ResultStoreWriter {
    const filePath = resolve(path);
    mkdirSync(dirname(filePath), { recursive: true });

    const header = resultHeader(counters);
    const fd = openSync(filePath, options.append ? "a+" : "w");
    try {
      const size = fstatSync(fd).size;
      if (size === 0) {
        writeSync(fd, toLine(header));
        fsyncSync(fd);
      } else {
        const existing = readFirstLine(fd, size);
        if (existing !== header.join(",")) {
          throw new ResultStoreError(
            `Cannot append to ${filePath}: header "${existing}" does not match "${header.join(",")}"`,
          );
        }
        const complete = endOfLastLine(fd, size);
        if (complete === 0) {
          // Header only, without its newline.
          writeSync(fd, "\n");
          fsyncSync(fd);
        } else if (complete < size) {
          ftruncateSync(fd, complete);
          fsyncSync(fd);
          logger.warn("Dropping incomplete final row before appending", {
            source: filePath,
            bytes: size - complete,
          });
        }
      }
    } catch (error) {
      closeSync(fd);
      throw error;
    }

    return new ResultStoreWriter(filePath, counters, fd);
  }

  get count(): number {
    return this.rowsWritten;
  }

  append(row: ResultRow): void {
    if (this.fd === null) {
      throw new ResultStoreError(`Result store already closed: ${this.path}`);
    }
    writeSync(this.fd, toLine(formatResultRow(row, this.counters)));
    fsyncSync(this.fd);
    this.rowsWritten++;
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}

// ============================================================================
// Reading
// ============================================================================

export interface ResultRecord {
  recordSize: number;
  totalBytes: number;
  mode: AccessMode;
  wallTimeSec: number;
  syscallCount: number;
  syscallTimeSec: number;
  /** Counter values keyed by result column name. */
  counters: Record<string, number>;
}

const integerField = z
  .string()
  .trim()
  .regex(/^\d+$/, "expected a non-negative integer")
  .transform(Number);

const decimalField = z
  .string()
  .trim()
  .regex(/^\d+(?:\.\d+)?$/, "expected a non-negative decimal")
  .transform(Number);

const StoredRowSchema = z.object({
  record_size: integerField,
  total_bytes: integerField,
  mode: z.string().trim().pipe(AccessModeSchema),
  wall_time_sec: decimalField,
  syscall_count: integerField,
  syscall_time_sec: decimalField,
});

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => `${e.path.join(".")}: ${e.message}`)
    .join("; ");
}

export function parseResultStore(text: string, source = "<inline>"): ResultRecord[] {
  const lines = text.split(/\r?\n/);
  const headerIndex = lines.findIndex((line) => line.trim().length > 0);
  if (headerIndex < 0) {
    throw new ResultStoreError(`Result file is empty: ${source}`);
  }

  const header = lines[headerIndex].split(",").map((name) => name.trim());
  const missing = FIXED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new ResultStoreError(
      `Result file ${source} is missing column(s): ${missing.join(", ")}`,
    );
  }
  const fixed = new Set<string>(FIXED_COLUMNS);
  const counterColumns = header.filter((column) => !fixed.has(column));

  // The final element is "" when the file ends with a newline. Anything else
  // there is a row whose write was interrupted.
  const lastIndex = lines.length - 1;
  const records: ResultRecord[] = [];

  for (let i = headerIndex + 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim().length === 0) {
      continue;
    }
    const values = line.split(",");
    const unterminated = i === lastIndex;

    const fields: Record<string, string> = {};
    header.forEach((column, index) => {
      fields[column] = values[index] ?? "";
    });

    const parsed = StoredRowSchema.safeParse(fields);
    const counters: Record<string, number> = {};
    let counterError: string | null = null;
    for (const column of counterColumns) {
      const result = decimalField.safeParse(fields[column]);
      if (result.success) {
        counters[column] = result.data;
      } else {
        counterError = `${column}: ${describeIssues(result.error)}`;
        break;
      }
    }

    const problem =
      values.length !== header.length
        ? `expected ${header.length} fields, found ${values.length}`
        : !parsed.success
          ? describeIssues(parsed.error)
          : counterError;

    if (problem !== null || !parsed.success) {
      if (unterminated) {
        logger.warn("Dropping incomplete final row", { source, line: i + 1 });
        continue;
      }
      throw new ResultStoreError(
        `Invalid row at ${source}:${i + 1}: ${problem ?? "unreadable row"}`,
      );
    }

    records.push({
      recordSize: parsed.data.record_size,
      totalBytes: parsed.data.total_bytes,
      mode: parsed.data.mode,
      wallTimeSec: parsed.data.wall_time_sec,
      syscallCount: parsed.data.syscall_count,
      syscallTimeSec: parsed.data.syscall_time_sec,
      counters,
    });
  }

  return records;
}

export function readResultStore(path: string): ResultRecord[] {
  const filePath = resolve(path);
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ResultStoreError(`Result file not found: ${filePath}`);
    }
    throw err;
  }
  return parseResultStore(text, filePath);
}
