/**
 * Outcome of parsing one line of a tracer report. Skipped lines are an
 * expected outcome (framing, comments, counters the host lacks), not errors.
 */
export type ParsedLine<T> =
  | { kind: "ok"; value: T }
  | { kind: "skip"; reason: string };

export function ok<T>(value: T): ParsedLine<T> {
  return { kind: "ok", value };
}

export function skip<T>(reason: string): ParsedLine<T> {
  return { kind: "skip", reason };
}

export interface FoldResult<A> {
  value: A;
  accepted: number;
  skipped: number;
}

/**
 * Reduces the accepted lines into an accumulator and counts the rest.
 */
export function foldLines<T, A>(
  lines: Iterable<ParsedLine<T>>,
  initial: A,
  step: (acc: A, value: T) => A,
): FoldResult<A> {
  let value = initial;
  let accepted = 0;
  let skipped = 0;
  for (const line of lines) {
    if (line.kind === "ok") {
      value = step(value, line.value);
      accepted++;
    } else {
      skipped++;
    }
  }
  return { value, accepted, skipped };
}

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Number() accepts "", "0x1f" and " 12 "; report fields must be plain
 * decimals.
 */
export function parseDecimal(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function parseInteger(text: string): number | null {
  if (!INTEGER_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}
