import { spawnSync } from "child_process";
import { performance } from "perf_hooks";
import {
  NO_EXIT_STATUS,
  PROCESS_MAX_BUFFER_BYTES,
} from "../config/constants.js";

export interface ProcessResult {
  /** Child exit status, or -1 when it was killed or never started. */
  exitStatus: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  elapsedSeconds: number;
  spawnError?: string;
}

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Anything that can run a command to completion. The sweep takes one so
 * tests can substitute canned reports for real tracers.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
) => ProcessResult;

/**
 * Runs a command synchronously and reports how it ended. Never throws for a
 * failing child: non-zero exits, signals and spawn errors all come back in
 * the result.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {},
): ProcessResult {
  const start = performance.now();
  const proc = spawnSync(command, args, {
    cwd: options.cwd,
    env: options.env,
    encoding: "utf-8",
    maxBuffer: PROCESS_MAX_BUFFER_BYTES,
    stdio: ["ignore", "pipe", "pipe"],
  });
  const elapsedSeconds = (performance.now() - start) / 1000;

  const result: ProcessResult = {
    exitStatus: proc.status ?? NO_EXIT_STATUS,
    signal: proc.signal,
    stdout: proc.stdout ?? "",
    stderr: proc.stderr ?? "",
    elapsedSeconds,
  };

  if (proc.error) {
    result.spawnError = proc.error.message;
    if (result.stderr.length === 0) {
      result.stderr = proc.error.message;
    }
  }

  return result;
}

export function createProcessRunner(
  options: RunProcessOptions = {},
): CommandRunner {
  return (command, args) => runProcess(command, args, options);
}

export function describeFailure(result: ProcessResult): string {
  if (result.spawnError) {
    return `failed to start: ${result.spawnError}`;
  }
  if (result.signal) {
    return `killed by ${result.signal}`;
  }
  return `exit status ${result.exitStatus}`;
}
