import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { chmodSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { runSweep } from "../../src/sweep/orchestrator.js";
import { readResultStore } from "../../src/store/resultStore.js";
import { logger } from "../../src/util/logger.js";
import {
  COUNTER_REPORT,
  SYSCALL_REPORT,
  makePlan,
  makeWorkspace,
  type Workspace,
} from "../harness/sweepFakes.js";

// $6 is the value after --record-size.
const BENCH_SCRIPT = `#!/bin/sh
if [ "$6" = "8192" ]; then
  echo "short read at offset 0" >&2
  exit 1
fi
exit 0
`;

function writeScript(path: string, body: string): string {
  writeFileSync(path, body);
  chmodSync(path, 0o755);
  return path;
}

/**
 * Tracer stand-ins: log the wrapped argv, run it, then print a canned report
 * on stderr the way the real tools do.
 */
function writeTracers(ws: Workspace): { strace: string; perf: string; log: string } {
  const log = join(ws.dir, "tracer.log");
  const report = (name: string, text: string): string => {
    const path = join(ws.dir, name);
    writeFileSync(path, text);
    return path;
  };
  const syscallReport = report("syscall-report.txt", SYSCALL_REPORT);
  const counterReport = report("counter-report.txt", COUNTER_REPORT);

  const strace = writeScript(
    join(ws.dir, "fake-strace"),
    `#!/bin/sh
shift 2
echo "strace $*" >> "${log}"
"$@"
cat "${syscallReport}" >&2
`,
  );
  const perf = writeScript(
    join(ws.dir, "fake-perf"),
    `#!/bin/sh
shift 6
echo "perf $*" >> "${log}"
"$@"
cat "${counterReport}" >&2
`,
  );
  return { strace, perf, log };
}

describe("sweep against real processes", () => {
  let ws: Workspace;
  let tracers: { strace: string; perf: string; log: string };

  before(() => {
    logger.setLevel("error");
    ws = makeWorkspace("e2e", BENCH_SCRIPT);
    tracers = writeTracers(ws);
  });

  after(() => {
    logger.setLevel("info");
    rmSync(ws.dir, { recursive: true, force: true });
  });

  it("records the full-size random-access configuration exactly", () => {
    const plan = makePlan(ws, [], {
      tracers: { syscall: tracers.strace, counter: tracers.perf },
      configurations: [
        { recordSize: 1048576, totalBytes: 8589934592, mode: "rand", seed: 12345 },
      ],
      resultsPath: join(ws.dir, "single.csv"),
    });

    const report = runSweep(plan);

    assert.strictEqual(report.succeeded, 1);
    const lines = readFileSync(plan.resultsPath, "utf-8").trim().split("\n");
    assert.strictEqual(lines.length, 2);
    const fields = lines[1].split(",");
    assert.strictEqual(fields[0], "1048576");
    assert.strictEqual(fields[1], "8589934592");
    assert.strictEqual(fields[2], "rand");
    assert.ok(Number(fields[3]) > 0);
    assert.deepStrictEqual(fields.slice(4), ["40", "0.000400", "1200", "800", "1500", "0", "42", "7"]);
  });

  it("keeps rows 1 and 3 when the second configuration fails", () => {
    rmSync(tracers.log, { force: true });
    const plan = makePlan(ws, [4096, 8192, 16384], {
      tracers: { syscall: tracers.strace, counter: tracers.perf },
      resultsPath: join(ws.dir, "isolation.csv"),
    });

    const report = runSweep(plan);

    assert.strictEqual(report.failed, 1);
    const records = readResultStore(plan.resultsPath);
    assert.deepStrictEqual(
      records.map((r) => r.recordSize),
      [4096, 16384],
    );

    const workload = (size: number) =>
      `${ws.executable} --file ${ws.dataFile} --mode seq --record-size ${size} --total-bytes 65536 --seed 7`;
    assert.deepStrictEqual(readFileSync(tracers.log, "utf-8").trim().split("\n"), [
      `strace ${workload(4096)}`,
      `perf ${workload(4096)}`,
      `strace ${workload(16384)}`,
      `perf ${workload(16384)}`,
    ]);
  });

  it("records zero metrics when a tracer is missing", () => {
    const plan = makePlan(ws, [4096], {
      tracers: {
        syscall: join(ws.dir, "no-such-strace"),
        counter: join(ws.dir, "no-such-perf"),
      },
      resultsPath: join(ws.dir, "no-tracers.csv"),
    });

    runSweep(plan);

    const [record] = readResultStore(plan.resultsPath);
    assert.strictEqual(record.syscallCount, 0);
    assert.strictEqual(record.syscallTimeSec, 0);
    assert.deepStrictEqual(record.counters, {
      perf_cycles: 0,
      perf_instructions: 0,
      perf_cache_misses: 0,
      perf_major_faults: 0,
      perf_minor_faults: 0,
      perf_context_switches: 0,
    });
  });
});
