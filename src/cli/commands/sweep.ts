import type { SweepOptions } from "../types.js";
import { loadConfig } from "../../config/loadConfig.js";
import { applySweepOverrides } from "../../config/overrides.js";
import { runSweep } from "../../sweep/orchestrator.js";
import { planFromConfig } from "../../sweep/types.js";
import {
  flushTracing,
  getMemoryExporter,
  initTracing,
  isTracingEnabled,
  shutdownTracing,
} from "../../util/tracing.js";
import { logger } from "../../util/logger.js";

/** Exit status when the sweep ran but no configuration succeeded. */
export const EXIT_ALL_FAILED = 2;

async function reportSpans(): Promise<void> {
  if (!isTracingEnabled()) {
    return;
  }
  await flushTracing();
  const exporter = getMemoryExporter();
  if (exporter) {
    logger.info("Recorded sweep spans", {
      spans: exporter.getFinishedSpans().length,
    });
  }
}

export async function sweepCommand(options: SweepOptions): Promise<number> {
  const config = applySweepOverrides(loadConfig(options.config), options);
  const plan = planFromConfig(config);

  initTracing(config.tracing);
  try {
    console.log(
      `Sweeping ${plan.configurations.length} record size(s), ${config.sweep.totalBytes} bytes each, mode=${config.sweep.mode}`,
    );

    const report = runSweep(plan);
    await reportSpans();

    console.log("");
    console.log(`Results: ${report.resultsPath}`);
    console.log(`  Succeeded: ${report.succeeded}`);
    console.log(`  Failed:    ${report.failed}`);

    if (report.outcomes.length > 0 && report.succeeded === 0) {
      return EXIT_ALL_FAILED;
    }
    return 0;
  } finally {
    await shutdownTracing();
  }
}
