import { describe, it } from "node:test";
import assert from "node:assert";
import {
  buildWorkloadCommand,
  formatCommandLine,
  wrapWithCounterTracer,
  wrapWithSyscallTracer,
} from "../../src/sweep/commands.js";
import { configurationsFromSweep } from "../../src/sweep/types.js";

const configuration = {
  recordSize: 1048576,
  totalBytes: 8589934592,
  mode: "rand" as const,
  seed: 12345,
};

describe("workload command lines", () => {
  const workload = buildWorkloadCommand("./fs_bench", "data.bin", configuration);

  it("passes the configuration as benchmark flags", () => {
    assert.deepStrictEqual(workload, {
      command: "./fs_bench",
      args: [
        "--file",
        "data.bin",
        "--mode",
        "rand",
        "--record-size",
        "1048576",
        "--total-bytes",
        "8589934592",
        "--seed",
        "12345",
      ],
    });
  });

  it("wraps the identical workload in the syscall tracer", () => {
    const traced = wrapWithSyscallTracer("strace", workload);

    assert.strictEqual(traced.command, "strace");
    assert.deepStrictEqual(traced.args.slice(0, 2), ["-c", "--"]);
    assert.deepStrictEqual(traced.args.slice(2), [workload.command, ...workload.args]);
  });

  it("wraps the identical workload in the counter tracer", () => {
    const traced = wrapWithCounterTracer("perf", ["cycles", "cs"], workload);

    assert.strictEqual(
      formatCommandLine(traced),
      "perf stat -x , -e cycles,cs -- ./fs_bench --file data.bin --mode rand " +
        "--record-size 1048576 --total-bytes 8589934592 --seed 12345",
    );
  });
});

describe("configurationsFromSweep", () => {
  it("keeps record-size order and shares the other fields", () => {
    const configurations = configurationsFromSweep({
      recordSizes: [65536, 4096],
      totalBytes: 1024,
      mode: "seq",
      seed: 1,
    });

    assert.deepStrictEqual(configurations, [
      { recordSize: 65536, totalBytes: 1024, mode: "seq", seed: 1 },
      { recordSize: 4096, totalBytes: 1024, mode: "seq", seed: 1 },
    ]);
  });
});
