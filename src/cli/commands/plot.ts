import type { PlotOptions } from "../types.js";
import { loadConfig } from "../../config/loadConfig.js";
import { readResultStore } from "../../store/resultStore.js";
import { renderCharts } from "../../visualize/charts.js";

export async function plotCommand(options: PlotOptions): Promise<void> {
  const needsConfig = !options.resultsPath || !options.outDir;
  const output = needsConfig ? loadConfig(options.config).output : undefined;

  const resultsPath = options.resultsPath ?? output?.resultsPath;
  const outDir = options.outDir ?? output?.chartsDir ?? ".";
  if (!resultsPath) {
    throw new Error("No results file given");
  }

  const records = readResultStore(resultsPath);
  const charts = await renderCharts(records, outDir);

  console.log("Saved:");
  console.log(`  ${charts.timeChartPath}`);
  console.log(`  ${charts.syscallChartPath}`);
}
