#!/usr/bin/env node

import { parseArgs } from "util";
import { sweepCommand } from "./commands/sweep.js";
import { plotCommand } from "./commands/plot.js";
import { doctorCommand } from "./commands/doctor.js";
import { versionCommand } from "./commands/version.js";
import {
  parseGlobalOptions,
  parsePlotOptions,
  parseSweepOptions,
} from "./argParsing.js";
import { configureLogger } from "../util/logger.js";
import { errorMessage } from "../errors.js";

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    strict: false,
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      config: { type: "string", short: "c" },
      "log-level": { type: "string" },
      "log-format": { type: "string" },
      "record-sizes": { type: "string" },
      "total-bytes": { type: "string" },
      mode: { type: "string" },
      seed: { type: "string" },
      benchmark: { type: "string" },
      "data-file": { type: "string" },
      output: { type: "string", short: "o" },
      append: { type: "boolean" },
      "out-dir": { type: "string" },
    },
  });

  if (values.help) {
    showHelp();
    process.exit(0);
  }

  if (values.version) {
    await versionCommand({});
    process.exit(0);
  }

  const global = parseGlobalOptions(values);
  configureLogger(global.logLevel ?? "info", global.logFormat ?? "pretty");

  const command = positionals[0];

  if (!command) {
    showHelp();
    process.exit(1);
  }

  switch (command) {
    case "sweep": {
      const exitCode = await sweepCommand(parseSweepOptions(global, values));
      process.exit(exitCode);
    }

    case "plot": {
      await plotCommand(parsePlotOptions(positionals.slice(1), global, values));
      break;
    }

    case "doctor": {
      const exitCode = await doctorCommand({ ...global });
      process.exit(exitCode);
    }

    case "version": {
      await versionCommand({ ...global });
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.error("");
      showHelp();
      process.exit(1);
  }
}

function showHelp(): void {
  console.log(`
recsweep - record-size I/O benchmark sweep

Usage:
  recsweep [global-options] <command> [command-options]

Commands:
  sweep             Run the benchmark at every record size and write results
  plot [FILE]       Render charts from a results file
  doctor            Check the benchmark, data file and tracers
  version           Show version information

Global Options:
  -c, --config PATH     Path to configuration file
  --log-level LEVEL     Log level: debug, info, warn, error (default: info)
  --log-format FORMAT   Log format: json, pretty (default: pretty)
  -h, --help            Show this help message
  -v, --version         Show version

 Sweep Options:
   --record-sizes LIST  Comma-separated record sizes in bytes
   --total-bytes N      Bytes read per run
   --mode MODE          Access mode: seq, rand
   --seed N             Random seed passed to the benchmark
   --benchmark PATH     Benchmark executable
   --data-file PATH     Benchmark data file
   -o, --output PATH    Results file (default: results.csv)
   --append             Keep existing rows in the results file

 Plot Options:
   --out-dir DIR        Directory for the chart files (default: .)

 Examples:
   recsweep doctor
   recsweep sweep --mode seq --record-sizes 1048576,65536,4096
   recsweep plot results.csv --out-dir charts
`);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
