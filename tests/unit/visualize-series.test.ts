import { describe, it } from "node:test";
import assert from "node:assert";
import { prepareSeries } from "../../src/visualize/series.js";
import {
  SYSCALL_COUNT_SERIES,
  TIME_SERIES,
  buildSyscallChartSpec,
  buildTimeChartSpec,
  syscallChartData,
  timeChartData,
} from "../../src/visualize/charts.js";
import type { ResultRecord } from "../../src/store/resultStore.js";

function record(recordSize: number, wallTimeSec: number): ResultRecord {
  return {
    recordSize,
    totalBytes: 8589934592,
    mode: "rand",
    wallTimeSec,
    syscallCount: 8589934592 / recordSize,
    syscallTimeSec: wallTimeSec / 10,
    counters: {},
  };
}

describe("prepareSeries", () => {
  it("sorts by record size and converts to KiB", () => {
    const points = prepareSeries([record(1048576, 1), record(4096, 4), record(65536, 2)]);

    assert.deepStrictEqual(
      points.map((p) => p.recordSizeKiB),
      [4, 64, 1024],
    );
    assert.deepStrictEqual(
      points.map((p) => p.wallTimeSec),
      [4, 2, 1],
    );
    assert.strictEqual(points[0].syscallCount, 2097152);
  });

  it("keeps file order between rows of the same record size", () => {
    const points = prepareSeries([
      record(8192, 3),
      record(4096, 1),
      record(8192, 5),
      record(4096, 2),
    ]);

    assert.deepStrictEqual(
      points.map((p) => [p.recordSizeKiB, p.wallTimeSec]),
      [
        [4, 1],
        [4, 2],
        [8, 3],
        [8, 5],
      ],
    );
  });

  it("returns nothing for no records", () => {
    assert.deepStrictEqual(prepareSeries([]), []);
  });
});

describe("chart data", () => {
  const points = prepareSeries([record(8192, 2), record(4096, 1)]);

  it("plots wall time and syscall time as two series", () => {
    assert.deepStrictEqual(timeChartData(points), [
      { x: 4, y: 1, series: TIME_SERIES.WALL },
      { x: 8, y: 2, series: TIME_SERIES.WALL },
      { x: 4, y: 0.1, series: TIME_SERIES.SYSCALL },
      { x: 8, y: 0.2, series: TIME_SERIES.SYSCALL },
    ]);
  });

  it("plots syscall count as one series", () => {
    assert.deepStrictEqual(syscallChartData(points), [
      { x: 4, y: 2097152, series: SYSCALL_COUNT_SERIES },
      { x: 8, y: 1048576, series: SYSCALL_COUNT_SERIES },
    ]);
  });

  it("uses a base-2 log x scale on both charts", () => {
    for (const spec of [buildTimeChartSpec(points), buildSyscallChartSpec(points)]) {
      const x = spec.scales?.find((scale) => scale.name === "x");
      assert.ok(x);
      assert.strictEqual(x.type, "log");
      assert.ok("base" in x && x.base === 2);
    }
  });
});
