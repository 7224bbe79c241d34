import { AccessModeSchema } from "../config/types.js";
import { isLogFormat, isLogLevel } from "../util/logger.js";
import type { CLIOptions, PlotOptions, SweepOptions } from "./types.js";

export type ParsedOptionValues = Record<string, unknown>;

function parsePositiveInt(flag: string, value: unknown): number {
  const text = String(value).trim();
  const parsed = Number(text);
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got "${text}"`);
  }
  return parsed;
}

function parseInteger(flag: string, value: unknown): number {
  const text = String(value).trim();
  const parsed = Number(text);
  if (!/^-?\d+$/.test(text) || !Number.isSafeInteger(parsed)) {
    throw new Error(`${flag} must be an integer, got "${text}"`);
  }
  return parsed;
}

export function parseRecordSizes(value: unknown): number[] {
  const sizes = String(value)
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => parsePositiveInt("--record-sizes", part));
  if (sizes.length === 0) {
    throw new Error("--record-sizes requires at least one size");
  }
  return sizes;
}

export function parseGlobalOptions(values: ParsedOptionValues): CLIOptions {
  const global: CLIOptions = {};

  if (typeof values.config === "string") {
    global.config = values.config;
  }

  const logLevel = values["log-level"];
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new Error("--log-level must be one of: debug, info, warn, error");
    }
    global.logLevel = logLevel;
  }

  const logFormat = values["log-format"];
  if (logFormat !== undefined) {
    if (!isLogFormat(logFormat)) {
      throw new Error("--log-format must be one of: json, pretty");
    }
    global.logFormat = logFormat;
  }

  return global;
}

export function parseSweepOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): SweepOptions {
  const options: SweepOptions = { ...global };

  if (values["record-sizes"] !== undefined) {
    options.recordSizes = parseRecordSizes(values["record-sizes"]);
  }
  if (values["total-bytes"] !== undefined) {
    options.totalBytes = parsePositiveInt("--total-bytes", values["total-bytes"]);
  }
  if (values.mode !== undefined) {
    const mode = AccessModeSchema.safeParse(values.mode);
    if (!mode.success) {
      throw new Error("--mode must be one of: seq, rand");
    }
    options.mode = mode.data;
  }
  if (values.seed !== undefined) {
    options.seed = parseInteger("--seed", values.seed);
  }
  if (typeof values.benchmark === "string") {
    options.benchmark = values.benchmark;
  }
  if (typeof values["data-file"] === "string") {
    options.dataFile = values["data-file"];
  }
  if (typeof values.output === "string") {
    options.output = values.output;
  }
  if (values.append === true) {
    options.append = true;
  }

  return options;
}

export function parsePlotOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): PlotOptions {
  const options: PlotOptions = { ...global };

  if (args.length > 1) {
    throw new Error("plot takes at most one results file");
  }
  if (args.length === 1) {
    options.resultsPath = args[0];
  }
  if (typeof values["out-dir"] === "string") {
    options.outDir = values["out-dir"];
  }

  return options;
}
