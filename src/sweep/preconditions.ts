import { accessSync, constants, statSync } from "fs";
import { resolve } from "path";
import { PreconditionError } from "../errors.js";
import type { BenchmarkConfig } from "../config/types.js";

export interface PreconditionCheck {
  name: string;
  ok: boolean;
  message: string;
}

function checkExecutable(path: string): PreconditionCheck {
  const name = "Benchmark executable";
  const fullPath = resolve(path);
  try {
    if (!statSync(fullPath).isFile()) {
      return { name, ok: false, message: `Not a regular file: ${fullPath}` };
    }
  } catch {
    return {
      name,
      ok: false,
      message: `Benchmark executable not found: ${fullPath}. Build it first.`,
    };
  }
  try {
    accessSync(fullPath, constants.X_OK);
  } catch {
    return { name, ok: false, message: `Not executable: ${fullPath}` };
  }
  return { name, ok: true, message: fullPath };
}

function checkDataFile(path: string): PreconditionCheck {
  const name = "Benchmark data file";
  const fullPath = resolve(path);
  try {
    statSync(fullPath);
  } catch {
    return {
      name,
      ok: false,
      message: `Data file not found: ${fullPath}. Create it, e.g.: fallocate -l 16G ${path}`,
    };
  }
  return { name, ok: true, message: fullPath };
}

export function inspectPreconditions(
  benchmark: BenchmarkConfig,
): PreconditionCheck[] {
  return [checkExecutable(benchmark.executable), checkDataFile(benchmark.dataFile)];
}

/**
 * Throws PreconditionError naming every unmet requirement.
 */
export function checkPreconditions(benchmark: BenchmarkConfig): void {
  const failures = inspectPreconditions(benchmark).filter((check) => !check.ok);
  if (failures.length > 0) {
    throw new PreconditionError(
      failures.map((check) => check.message).join("\n"),
    );
  }
}
