import {
  COUNTER_NOT_AVAILABLE_MARKER,
  COUNTER_SUFFIX_SCALE,
} from "../config/constants.js";
import { foldLines, ok, parseDecimal, skip, type ParsedLine } from "./parsedLine.js";

/** Counter event name to value. Missing counters read as 0. */
export type CounterSet = Record<string, number>;

export interface CounterReading {
  event: string;
  value: number;
}

export interface CounterReportParse {
  counters: CounterSet;
  skippedLines: number;
}

/**
 * "12.5M" → 12500000, "42" → 42. Returns null for anything else, including
 * the "<not supported>" sentinel.
 */
export function parseCounterValue(raw: string): number | null {
  const text = raw.trim();
  if (text.length === 0) {
    return null;
  }
  const suffix = text[text.length - 1];
  const scale = Object.hasOwn(COUNTER_SUFFIX_SCALE, suffix)
    ? COUNTER_SUFFIX_SCALE[suffix]
    : undefined;
  if (scale !== undefined) {
    const base = parseDecimal(text.slice(0, -1));
    return base === null ? null : base * scale;
  }
  return parseDecimal(text);
}

/**
 * One CSV record of `perf stat -x ,` output: value, unit, event, then
 * optional run-time columns that are ignored.
 */
export function parseCounterLine(rawLine: string): ParsedLine<CounterReading> {
  const line = rawLine.trim();
  if (line.length === 0) {
    return skip("blank");
  }
  if (line.startsWith("#")) {
    return skip("comment");
  }

  const fields = line.split(",");
  if (fields.length < 3) {
    return skip("too few fields");
  }

  const rawValue = fields[0].trim();
  if (rawValue.includes(COUNTER_NOT_AVAILABLE_MARKER)) {
    return skip("counter not available");
  }

  const value = parseCounterValue(rawValue);
  if (value === null) {
    return skip("unparseable value");
  }
  if (value < 0) {
    return skip("negative value");
  }

  return ok({ event: fields[2].trim(), value });
}

export function parseCounterReportDetailed(text: string): CounterReportParse {
  const folded = foldLines<CounterReading, CounterSet>(
    text.split(/\r?\n/).map(parseCounterLine),
    {},
    (acc, reading) => ({ ...acc, [reading.event]: reading.value }),
  );
  return { counters: folded.value, skippedLines: folded.skipped };
}

export function parseCounterReport(text: string): CounterSet {
  return parseCounterReportDetailed(text).counters;
}

export function counterValue(counters: CounterSet, event: string): number {
  return Object.hasOwn(counters, event) ? counters[event] : 0;
}
