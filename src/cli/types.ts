import type { LogFormat, LogLevel } from "../util/logger.js";
import type { AccessMode } from "../config/types.js";

export type { LogFormat, LogLevel };

export interface CLIOptions {
  config?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

export interface SweepOptions extends CLIOptions {
  recordSizes?: number[];
  totalBytes?: number;
  mode?: AccessMode;
  seed?: number;
  benchmark?: string;
  dataFile?: string;
  output?: string;
  append?: boolean;
}

export interface PlotOptions extends CLIOptions {
  resultsPath?: string;
  outDir?: string;
}

export interface DoctorOptions extends CLIOptions {}

export interface VersionOptions extends CLIOptions {}
