import type { CounterEvent } from "../config/types.js";
import type { Configuration } from "./types.js";

export interface CommandLine {
  command: string;
  args: string[];
}

export function buildWorkloadArgs(
  dataFile: string,
  configuration: Configuration,
): string[] {
  return [
    "--file",
    dataFile,
    "--mode",
    configuration.mode,
    "--record-size",
    String(configuration.recordSize),
    "--total-bytes",
    String(configuration.totalBytes),
    "--seed",
    String(configuration.seed),
  ];
}

export function buildWorkloadCommand(
  executable: string,
  dataFile: string,
  configuration: Configuration,
): CommandLine {
  return {
    command: executable,
    args: buildWorkloadArgs(dataFile, configuration),
  };
}

/** `<tracer> -c -- <workload>`: summary table on stderr. */
export function wrapWithSyscallTracer(
  tracer: string,
  workload: CommandLine,
): CommandLine {
  return {
    command: tracer,
    args: ["-c", "--", workload.command, ...workload.args],
  };
}

/** `<tracer> stat -x , -e <events> -- <workload>`: CSV records on stderr. */
export function wrapWithCounterTracer(
  tracer: string,
  events: readonly CounterEvent[],
  workload: CommandLine,
): CommandLine {
  return {
    command: tracer,
    args: [
      "stat",
      "-x",
      ",",
      "-e",
      events.join(","),
      "--",
      workload.command,
      ...workload.args,
    ],
  };
}

export function formatCommandLine(line: CommandLine): string {
  return [line.command, ...line.args].join(" ");
}
