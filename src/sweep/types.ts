import type {
  AccessMode,
  AppConfig,
  CounterEvent,
} from "../config/types.js";

/** One point of the sweep. */
export type Configuration = Readonly<{
  recordSize: number;
  totalBytes: number;
  mode: AccessMode;
  seed: number;
}>;

export interface ResultRow {
  recordSize: number;
  totalBytes: number;
  mode: AccessMode;
  wallTimeSec: number;
  syscallCount: number;
  syscallTimeSec: number;
  /** Keyed by counter event, zero when the host lacks the counter. */
  counters: Record<CounterEvent, number>;
}

export type ConfigurationOutcome =
  | { status: "success"; configuration: Configuration; row: ResultRow }
  | {
      status: "failed";
      configuration: Configuration;
      reason: string;
      stderr: string;
    };

export interface SweepReport {
  resultsPath: string;
  outcomes: ConfigurationOutcome[];
  succeeded: number;
  failed: number;
}

/**
 * Everything a sweep needs, resolved from config and CLI flags. Nothing in
 * the orchestrator reads process-wide state.
 */
export type SweepPlan = Readonly<{
  benchmark: AppConfig["benchmark"];
  tracers: AppConfig["tracers"];
  counters: readonly CounterEvent[];
  configurations: readonly Configuration[];
  resultsPath: string;
  append: boolean;
}>;

export function configurationsFromSweep(
  sweep: AppConfig["sweep"],
): Configuration[] {
  return sweep.recordSizes.map((recordSize) => ({
    recordSize,
    totalBytes: sweep.totalBytes,
    mode: sweep.mode,
    seed: sweep.seed,
  }));
}

export function planFromConfig(config: AppConfig): SweepPlan {
  return {
    benchmark: config.benchmark,
    tracers: config.tracers,
    counters: config.counters,
    configurations: configurationsFromSweep(config.sweep),
    resultsPath: config.output.resultsPath,
    append: config.output.append,
  };
}
