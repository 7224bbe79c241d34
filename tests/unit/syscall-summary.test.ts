import { describe, it } from "node:test";
import assert from "node:assert";
import {
  parseSyscallSummary,
  parseSyscallSummaryDetailed,
  parseSyscallSummaryLine,
} from "../../src/parsers/syscallSummary.js";
import { SYSCALL_REPORT } from "../harness/sweepFakes.js";

function assertClose(actual: number, expected: number): void {
  assert.ok(
    Math.abs(actual - expected) < 1e-12,
    `expected ${actual} to be close to ${expected}`,
  );
}

describe("parseSyscallSummaryLine", () => {
  it("reads seconds from field 1 and calls from field 3", () => {
    const line = parseSyscallSummaryLine(" 62.50    0.000250          12        20           read");

    assert.deepStrictEqual(line, {
      kind: "ok",
      value: { syscall: "read", seconds: 0.00025, calls: 20 },
    });
  });

  it("accepts rows that carry an errors column", () => {
    const line = parseSyscallSummaryLine(" 25.00    0.000100          10        10         2 openat");

    assert.deepStrictEqual(line, {
      kind: "ok",
      value: { syscall: "openat", seconds: 0.0001, calls: 10 },
    });
  });

  it("skips framing lines", () => {
    assert.deepStrictEqual(parseSyscallSummaryLine("------ ----------- -----------"), {
      kind: "skip",
      reason: "separator",
    });
    assert.deepStrictEqual(parseSyscallSummaryLine("   "), { kind: "skip", reason: "blank" });
    assert.deepStrictEqual(parseSyscallSummaryLine("syscall"), {
      kind: "skip",
      reason: "column header",
    });
  });

  it("skips the total footer row", () => {
    assert.deepStrictEqual(
      parseSyscallSummaryLine("100.00    0.000400                    40         2 total"),
      { kind: "skip", reason: "total row" },
    );
  });

  it("skips short and non-numeric lines", () => {
    assert.deepStrictEqual(parseSyscallSummaryLine("strace: Process 4242 attached"), {
      kind: "skip",
      reason: "too few fields",
    });
    assert.deepStrictEqual(parseSyscallSummaryLine("12.0 abc 1 xyz write"), {
      kind: "skip",
      reason: "non-numeric seconds or calls",
    });
  });

  it("skips rows with negative seconds or calls", () => {
    assert.deepStrictEqual(parseSyscallSummaryLine(" 10.00   -0.000100           7        20 read"), {
      kind: "skip",
      reason: "negative seconds or calls",
    });
    assert.deepStrictEqual(parseSyscallSummaryLine(" 10.00    0.000100           7        -3 read"), {
      kind: "skip",
      reason: "negative seconds or calls",
    });
  });
});

describe("parseSyscallSummary", () => {
  it("totals every per-syscall row", () => {
    const summary = parseSyscallSummary(SYSCALL_REPORT);

    assert.strictEqual(summary.callCount, 40);
    assertClose(summary.timeSeconds, 0.0004);
  });

  it("ignores numeric-looking lines before the header marker", () => {
    const report = [
      " 99.00    9.000000          1        999           read",
      "% time     seconds  usecs/call     calls    errors syscall",
      "------ ----------- ----------- --------- --------- ----------------",
      " 100.00    0.000010           1         3           write",
    ].join("\n");

    assert.deepStrictEqual(parseSyscallSummary(report), {
      callCount: 3,
      timeSeconds: 0.00001,
    });
  });

  it("returns zeros when there is no summary table", () => {
    assert.deepStrictEqual(parseSyscallSummary("strace: exec: No such file or directory\n"), {
      callCount: 0,
      timeSeconds: 0,
    });
    assert.deepStrictEqual(parseSyscallSummary(""), { callCount: 0, timeSeconds: 0 });
  });

  it("reports how many rows were accepted and skipped", () => {
    const detailed = parseSyscallSummaryDetailed(SYSCALL_REPORT);

    assert.strictEqual(detailed.rows, 3);
    // two separators, the total row and the trailing empty line
    assert.strictEqual(detailed.skippedLines, 4);
  });

  it("handles CRLF line endings", () => {
    const report = SYSCALL_REPORT.replace(/\n/g, "\r\n");

    assert.strictEqual(parseSyscallSummary(report).callCount, 40);
  });
});
