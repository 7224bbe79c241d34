import type { SweepOptions } from "../cli/types.js";
import { parseConfig } from "./loadConfig.js";
import type { AppConfig } from "./types.js";

/**
 * Layers CLI flags over a loaded config. The result is re-validated so a flag
 * cannot produce a config the file itself could not.
 */
export function applySweepOverrides(
  config: AppConfig,
  options: SweepOptions,
): AppConfig {
  return parseConfig(
    {
      ...config,
      benchmark: {
        ...config.benchmark,
        executable: options.benchmark ?? config.benchmark.executable,
        dataFile: options.dataFile ?? config.benchmark.dataFile,
      },
      sweep: {
        recordSizes: options.recordSizes ?? config.sweep.recordSizes,
        totalBytes: options.totalBytes ?? config.sweep.totalBytes,
        mode: options.mode ?? config.sweep.mode,
        seed: options.seed ?? config.sweep.seed,
      },
      output: {
        ...config.output,
        resultsPath: options.output ?? config.output.resultsPath,
        append: options.append ?? config.output.append,
      },
    },
    "command line",
  );
}
