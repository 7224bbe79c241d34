import type { DoctorOptions } from "../types.js";
import type { AppConfig } from "../../config/types.js";
import { NODE_MIN_MAJOR_VERSION } from "../../config/constants.js";
import { loadConfig, resolveConfigPath } from "../../config/loadConfig.js";
import { runProcess, describeFailure } from "../../runner/process.js";
import { inspectPreconditions } from "../../sweep/preconditions.js";
import { errorMessage } from "../../errors.js";

export interface DoctorResult {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
}

function checkNodeVersion(): DoctorResult {
  const version = process.version;
  const major = parseInt(version.slice(1).split(".")[0], 10);
  const name = "Node.js version";

  if (major >= NODE_MIN_MAJOR_VERSION) {
    return {
      name,
      status: "pass",
      message: `Node.js ${version} (>= ${NODE_MIN_MAJOR_VERSION}.0.0)`,
    };
  }
  return {
    name,
    status: "fail",
    message: `Node.js ${version} (requires >= ${NODE_MIN_MAJOR_VERSION}.0.0)`,
  };
}

/**
 * A missing tracer is a warning: the sweep still runs and records zeros.
 */
function checkTracer(
  name: string,
  command: string,
  versionArgs: string[],
): DoctorResult {
  const result = runProcess(command, versionArgs);
  if (result.exitStatus === 0) {
    const firstLine = (result.stdout || result.stderr).trim().split("\n")[0];
    return { name, status: "pass", message: firstLine || command };
  }
  return {
    name,
    status: "warn",
    message: `${command} unavailable (${describeFailure(result)}); its columns will be zero`,
  };
}

export function runDoctorChecks(config: AppConfig): DoctorResult[] {
  const results: DoctorResult[] = [checkNodeVersion()];

  for (const check of inspectPreconditions(config.benchmark)) {
    results.push({
      name: check.name,
      status: check.ok ? "pass" : "fail",
      message: check.message,
    });
  }

  results.push(checkTracer("Syscall tracer", config.tracers.syscall, ["-V"]));
  results.push(
    checkTracer("Counter tracer", config.tracers.counter, ["--version"]),
  );
  return results;
}

function displayResults(results: DoctorResult[]): void {
  for (const result of results) {
    const icon =
      result.status === "pass" ? "✓" : result.status === "warn" ? "⚠" : "✗";
    console.log(`${icon} ${result.name}: ${result.message}`);
  }
}

export async function doctorCommand(options: DoctorOptions): Promise<number> {
  console.log("Running recsweep environment checks...\n");

  const configPath = resolveConfigPath(options.config);
  let config: AppConfig;
  try {
    config = loadConfig(configPath);
    console.log(`✓ Config: ${configPath}`);
  } catch (error) {
    console.log(`✗ Config: ${errorMessage(error)}`);
    return 1;
  }

  const results = runDoctorChecks(config);
  displayResults(results);

  const failed = results.filter((r) => r.status === "fail").length;
  if (failed > 0) {
    console.log(`\n✗ ${failed} check(s) failed. Please fix the issues above.`);
    return 1;
  }

  const warned = results.filter((r) => r.status === "warn").length;
  if (warned > 0) {
    console.log(`\n⚠ ${warned} warning(s). The sweep will run with limitations.`);
  } else {
    console.log("\n✓ All checks passed!");
  }
  return 0;
}
