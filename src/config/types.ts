import { z } from "zod";
import {
  DEFAULT_COUNTER_TRACER,
  DEFAULT_RECORD_SIZES,
  DEFAULT_RESULTS_PATH,
  DEFAULT_SEED,
  DEFAULT_SYSCALL_TRACER,
  DEFAULT_TOTAL_BYTES,
} from "./constants.js";

/**
 * Hardware/OS counters the counter tracer is asked for, in result-column
 * order. `cs` is the tracer's short name for context switches.
 */
export const COUNTER_EVENTS = [
  "cycles",
  "instructions",
  "cache-misses",
  "major-faults",
  "minor-faults",
  "cs",
] as const;

export const CounterEventSchema = z.enum(COUNTER_EVENTS);

export type CounterEvent = z.infer<typeof CounterEventSchema>;

export const COUNTER_COLUMNS: Readonly<Record<CounterEvent, string>> = {
  cycles: "perf_cycles",
  instructions: "perf_instructions",
  "cache-misses": "perf_cache_misses",
  "major-faults": "perf_major_faults",
  "minor-faults": "perf_minor_faults",
  cs: "perf_context_switches",
};

export const AccessModeSchema = z.enum(["seq", "rand"]);

export type AccessMode = z.infer<typeof AccessModeSchema>;

const positiveInt = z.number().int().positive();

export const BenchmarkConfigSchema = z.object({
  executable: z.string().min(1).default("./fs_bench"),
  dataFile: z.string().min(1).default("data.bin"),
});

export type BenchmarkConfig = z.infer<typeof BenchmarkConfigSchema>;

export const SweepConfigSchema = z.object({
  recordSizes: z.array(positiveInt).min(1).default(DEFAULT_RECORD_SIZES),
  totalBytes: positiveInt.default(DEFAULT_TOTAL_BYTES),
  mode: AccessModeSchema.default("rand"),
  seed: z.number().int().default(DEFAULT_SEED),
});

export type SweepConfig = z.infer<typeof SweepConfigSchema>;

export const TracersConfigSchema = z.object({
  syscall: z.string().min(1).default(DEFAULT_SYSCALL_TRACER),
  counter: z.string().min(1).default(DEFAULT_COUNTER_TRACER),
});

export type TracersConfig = z.infer<typeof TracersConfigSchema>;

export const OutputConfigSchema = z.object({
  resultsPath: z.string().min(1).default(DEFAULT_RESULTS_PATH),
  chartsDir: z.string().min(1).default("."),
  append: z.boolean().default(false),
});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

export const TracingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  exporterType: z.enum(["console", "memory"]).default("console"),
  serviceName: z.string().min(1).optional(),
});

export type TracingConfig = z.infer<typeof TracingConfigSchema>;

export const AppConfigSchema = z.object({
  benchmark: BenchmarkConfigSchema.default({}),
  sweep: SweepConfigSchema.default({}),
  tracers: TracersConfigSchema.default({}),
  counters: z
    .array(CounterEventSchema)
    .min(1)
    .refine((events) => new Set(events).size === events.length, {
      message: "counters must not repeat an event",
    })
    .default([...COUNTER_EVENTS]),
  output: OutputConfigSchema.default({}),
  tracing: TracingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
