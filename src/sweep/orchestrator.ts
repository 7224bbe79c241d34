import type { CounterEvent } from "../config/types.js";
import { parseCounterReportDetailed, counterValue } from "../parsers/counterReport.js";
import { parseSyscallSummaryDetailed } from "../parsers/syscallSummary.js";
import {
  createProcessRunner,
  describeFailure,
  type CommandRunner,
  type ProcessResult,
} from "../runner/process.js";
import { ResultStoreWriter } from "../store/resultStore.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpanSync } from "../util/tracing.js";
import {
  buildWorkloadCommand,
  formatCommandLine,
  wrapWithCounterTracer,
  wrapWithSyscallTracer,
  type CommandLine,
} from "./commands.js";
import { checkPreconditions } from "./preconditions.js";
import type {
  Configuration,
  ConfigurationOutcome,
  ResultRow,
  SweepPlan,
  SweepReport,
} from "./types.js";

export interface SweepOptions {
  runner?: CommandRunner;
  /** Called after each configuration settles, successful or not. */
  onOutcome?: (outcome: ConfigurationOutcome, index: number) => void;
}

function run(
  runner: CommandRunner,
  spanName: string,
  line: CommandLine,
): ProcessResult {
  return withSpanSync(
    spanName,
    (span) => {
      const result = runner(line.command, line.args);
      setSpanAttributes(span, {
        exitStatus: result.exitStatus,
        elapsedSeconds: result.elapsedSeconds,
      });
      return result;
    },
    { command: line.command },
  );
}

function warnOnTracerFailure(label: string, result: ProcessResult): void {
  if (result.exitStatus !== 0) {
    logger.warn(`${label} ${describeFailure(result)}; parsing its report anyway`, {
      stderr: result.stderr.trim().slice(-500),
    });
  }
}

function zeroCounters(): Record<CounterEvent, number> {
  return {
    cycles: 0,
    instructions: 0,
    "cache-misses": 0,
    "major-faults": 0,
    "minor-faults": 0,
    cs: 0,
  };
}

/**
 * Plain run, then the same workload under the syscall tracer and the counter
 * tracer. A failing plain run ends the configuration; the traced runs only
 * explain its cost.
 */
export function measureConfiguration(
  plan: SweepPlan,
  configuration: Configuration,
  runner: CommandRunner,
): ConfigurationOutcome {
  const workload = buildWorkloadCommand(
    plan.benchmark.executable,
    plan.benchmark.dataFile,
    configuration,
  );
  logger.debug("Workload command", { command: formatCommandLine(workload) });

  const plain = run(runner, SPAN_NAMES.RUN_PLAIN, workload);
  if (plain.exitStatus !== 0) {
    return {
      status: "failed",
      configuration,
      reason: describeFailure(plain),
      stderr: plain.stderr.trim(),
    };
  }

  const syscallRun = run(
    runner,
    SPAN_NAMES.RUN_SYSCALLS,
    wrapWithSyscallTracer(plan.tracers.syscall, workload),
  );
  warnOnTracerFailure("Syscall tracer", syscallRun);
  const syscalls = parseSyscallSummaryDetailed(syscallRun.stderr);
  logger.debug("Parsed syscall summary", {
    rows: syscalls.rows,
    skippedLines: syscalls.skippedLines,
  });

  const counterRun = run(
    runner,
    SPAN_NAMES.RUN_COUNTERS,
    wrapWithCounterTracer(plan.tracers.counter, plan.counters, workload),
  );
  warnOnTracerFailure("Counter tracer", counterRun);
  const counterReport = parseCounterReportDetailed(counterRun.stderr);
  logger.debug("Parsed counter report", {
    counters: Object.keys(counterReport.counters).length,
    skippedLines: counterReport.skippedLines,
  });

  const counters = zeroCounters();
  for (const event of plan.counters) {
    counters[event] = counterValue(counterReport.counters, event);
  }

  const row: ResultRow = {
    recordSize: configuration.recordSize,
    totalBytes: configuration.totalBytes,
    mode: configuration.mode,
    wallTimeSec: plain.elapsedSeconds,
    syscallCount: syscalls.callCount,
    syscallTimeSec: syscalls.timeSeconds,
    counters,
  };

  return { status: "success", configuration, row };
}

function logOutcome(outcome: ConfigurationOutcome): void {
  switch (outcome.status) {
    case "success":
      logger.info(
        `  wall=${outcome.row.wallTimeSec.toFixed(3)}s syscalls=${outcome.row.syscallCount}`,
      );
      return;
    case "failed":
      logger.warn(`  benchmark failed (${outcome.reason}), skipping`, {
        recordSize: outcome.configuration.recordSize,
        stderr: outcome.stderr,
      });
      return;
  }
}

/**
 * Runs every configuration in order, one process at a time. Preconditions
 * are checked before the result file is opened; a failed configuration is
 * logged and leaves no row.
 */
export function runSweep(
  plan: SweepPlan,
  options: SweepOptions = {},
): SweepReport {
  checkPreconditions(plan.benchmark);

  const runner = options.runner ?? createProcessRunner();
  const store = ResultStoreWriter.open(plan.resultsPath, plan.counters, {
    append: plan.append,
  });
  const outcomes: ConfigurationOutcome[] = [];

  try {
    withSpanSync(
      SPAN_NAMES.SWEEP,
      () => {
        plan.configurations.forEach((configuration, index) => {
          logger.info(`Running record_size=${configuration.recordSize} bytes`);

          const outcome = withSpanSync(
            SPAN_NAMES.CONFIGURATION,
            (span) => {
              const result = measureConfiguration(plan, configuration, runner);
              setSpanAttributes(span, { status: result.status });
              return result;
            },
            {
              recordSize: configuration.recordSize,
              totalBytes: configuration.totalBytes,
              mode: configuration.mode,
            },
          );

          if (outcome.status === "success") {
            store.append(outcome.row);
          }
          logOutcome(outcome);
          outcomes.push(outcome);
          options.onOutcome?.(outcome, index);
        });
      },
      { configurations: plan.configurations.length },
    );
  } finally {
    store.close();
  }

  const succeeded = outcomes.filter((o) => o.status === "success").length;
  return {
    resultsPath: store.path,
    outcomes,
    succeeded,
    failed: outcomes.length - succeeded,
  };
}
