import { describe, it, after } from "node:test";
import assert from "node:assert";
import { chmodSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import {
  checkPreconditions,
  inspectPreconditions,
} from "../../src/sweep/preconditions.js";
import { PreconditionError } from "../../src/errors.js";
import { makeWorkspace } from "../harness/sweepFakes.js";

describe("sweep preconditions", () => {
  const ws = makeWorkspace("preconditions");

  after(() => {
    rmSync(ws.dir, { recursive: true, force: true });
  });

  it("passes for an executable benchmark and an existing data file", () => {
    assert.doesNotThrow(() =>
      checkPreconditions({ executable: ws.executable, dataFile: ws.dataFile }),
    );
  });

  it("rejects a benchmark without the execute bit", () => {
    const plain = join(ws.dir, "not_executable");
    writeFileSync(plain, "#!/bin/sh\n");
    chmodSync(plain, 0o644);

    const [executable] = inspectPreconditions({ executable: plain, dataFile: ws.dataFile });

    assert.strictEqual(executable.ok, false);
    assert.strictEqual(executable.message, `Not executable: ${plain}`);
  });

  it("rejects a directory in place of the benchmark", () => {
    const dir = join(ws.dir, "bench_dir");
    mkdirSync(dir);

    const [executable] = inspectPreconditions({ executable: dir, dataFile: ws.dataFile });

    assert.strictEqual(executable.message, `Not a regular file: ${dir}`);
  });

  it("names every missing requirement", () => {
    const missingBench = join(ws.dir, "no_bench");
    const missingData = join(ws.dir, "no_data.bin");

    assert.throws(
      () => checkPreconditions({ executable: missingBench, dataFile: missingData }),
      (err: Error) =>
        err instanceof PreconditionError &&
        err.message.split("\n").length === 2 &&
        err.message.includes(`Benchmark executable not found: ${missingBench}`) &&
        err.message.includes(`Data file not found: ${missingData}`),
    );
  });
});
