export { runProcess, createProcessRunner } from "./runner/process.js";
export type { CommandRunner, ProcessResult } from "./runner/process.js";
export {
  parseSyscallSummary,
  parseSyscallSummaryLine,
} from "./parsers/syscallSummary.js";
export type { SyscallSummary } from "./parsers/syscallSummary.js";
export {
  parseCounterReport,
  parseCounterLine,
  parseCounterValue,
  counterValue,
} from "./parsers/counterReport.js";
export type { CounterSet } from "./parsers/counterReport.js";
export { foldLines, ok, skip } from "./parsers/parsedLine.js";
export type { ParsedLine } from "./parsers/parsedLine.js";
export { runSweep, measureConfiguration } from "./sweep/orchestrator.js";
export { checkPreconditions } from "./sweep/preconditions.js";
export { configurationsFromSweep, planFromConfig } from "./sweep/types.js";
export type {
  Configuration,
  ConfigurationOutcome,
  ResultRow,
  SweepPlan,
  SweepReport,
} from "./sweep/types.js";
export {
  ResultStoreWriter,
  readResultStore,
  resultHeader,
} from "./store/resultStore.js";
export type { ResultRecord } from "./store/resultStore.js";
export { prepareSeries } from "./visualize/series.js";
export { renderCharts } from "./visualize/charts.js";
export { loadConfig, parseConfig } from "./config/loadConfig.js";
export type { AppConfig } from "./config/types.js";
export { ConfigError, PreconditionError, ResultStoreError } from "./errors.js";
