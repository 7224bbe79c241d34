import { SYSCALL_SUMMARY_HEADER_MARKER } from "../config/constants.js";
import {
  foldLines,
  ok,
  parseDecimal,
  parseInteger,
  skip,
  type ParsedLine,
} from "./parsedLine.js";

export interface SyscallSummary {
  callCount: number;
  timeSeconds: number;
}

export interface SyscallSummaryRow {
  syscall: string;
  seconds: number;
  calls: number;
}

export interface SyscallSummaryParse extends SyscallSummary {
  rows: number;
  skippedLines: number;
}

/**
 * Minimum fields in a data row: "% time", seconds, usecs/call, calls, then
 * either the syscall name or errors + name.
 */
const MIN_ROW_FIELDS = 5;

/**
 * Classifies one line of the table body (the caller handles the header
 * marker). The footer "total" row repeats the sum of the data rows and is
 * skipped.
 */
export function parseSyscallSummaryLine(
  rawLine: string,
): ParsedLine<SyscallSummaryRow> {
  const line = rawLine.trim();
  if (line.length === 0) {
    return skip("blank");
  }
  if (line.startsWith("---")) {
    return skip("separator");
  }
  if (line.startsWith("syscall")) {
    return skip("column header");
  }

  const fields = line.split(/\s+/);
  if (fields.length < MIN_ROW_FIELDS) {
    return skip("too few fields");
  }

  const syscall = fields[fields.length - 1];
  if (syscall === "total") {
    return skip("total row");
  }

  const seconds = parseDecimal(fields[1]);
  const calls = parseInteger(fields[3]);
  if (seconds === null || calls === null) {
    return skip("non-numeric seconds or calls");
  }
  if (seconds < 0 || calls < 0) {
    return skip("negative seconds or calls");
  }

  return ok({ syscall, seconds, calls });
}

function* tableLines(text: string): Generator<ParsedLine<SyscallSummaryRow>> {
  let started = false;
  for (const rawLine of text.split(/\r?\n/)) {
    if (!started) {
      started = rawLine.trim().startsWith(SYSCALL_SUMMARY_HEADER_MARKER);
      continue;
    }
    yield parseSyscallSummaryLine(rawLine);
  }
}

export function parseSyscallSummaryDetailed(text: string): SyscallSummaryParse {
  const folded = foldLines<SyscallSummaryRow, SyscallSummary>(
    tableLines(text),
    { callCount: 0, timeSeconds: 0 },
    (acc, row) => ({
      callCount: acc.callCount + row.calls,
      timeSeconds: acc.timeSeconds + row.seconds,
    }),
  );
  return {
    ...folded.value,
    rows: folded.accepted,
    skippedLines: folded.skipped,
  };
}

/**
 * Totals a syscall-tracer summary report (`strace -c` layout): call count and
 * seconds summed over every per-syscall row after the `% time` header.
 */
export function parseSyscallSummary(text: string): SyscallSummary {
  const { callCount, timeSeconds } = parseSyscallSummaryDetailed(text);
  return { callCount, timeSeconds };
}
