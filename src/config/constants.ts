/**
 * Constants for recsweep
 *
 * Named constants shared by the sweep, the result store and the CLI.
 */

// ============================================================================
// Runtime
// ============================================================================

export const RECSWEEP_VERSION = "0.3.0";

/**
 * Minimum supported Node.js major version.
 */
export const NODE_MIN_MAJOR_VERSION = 20;

export const CONFIG_FILE_NAME = "recsweep.config.json";

export const CONFIG_ENV_VAR = "RECSWEEP_CONFIG";

// ============================================================================
// Process Runner
// ============================================================================

/**
 * Capture buffer for child stdout/stderr. spawnSync kills the child when a
 * stream exceeds maxBuffer, which would surface as a bogus run failure.
 */
export const PROCESS_MAX_BUFFER_BYTES = 64 * 1024 * 1024;

/**
 * Exit status reported when the child never produced one (spawn failure or
 * death by signal).
 */
export const NO_EXIT_STATUS = -1;

// ============================================================================
// Sweep defaults
// ============================================================================

export const DEFAULT_TOTAL_BYTES = 8 * 1024 ** 3;

/** Large to small, 1 MiB down to 4 KiB. */
export const DEFAULT_RECORD_SIZES = [
  1024 * 1024,
  256 * 1024,
  64 * 1024,
  16 * 1024,
  4 * 1024,
];

export const DEFAULT_SEED = 12345;

export const DEFAULT_SYSCALL_TRACER = "strace";

export const DEFAULT_COUNTER_TRACER = "perf";

export const DEFAULT_RESULTS_PATH = "results.csv";

// ============================================================================
// Report formats
// ============================================================================

/** Marks the start of the syscall summary table. */
export const SYSCALL_SUMMARY_HEADER_MARKER = "% time";

/** Prefix shared by "<not supported>" and "<not counted>". */
export const COUNTER_NOT_AVAILABLE_MARKER = "<not";

export const COUNTER_SUFFIX_SCALE: Readonly<Record<string, number>> = {
  K: 1e3,
  M: 1e6,
  G: 1e9,
};

/** Decimal places used for time columns in the result file. */
export const TIME_FIELD_PRECISION = 6;

// ============================================================================
// Charts
// ============================================================================

export const TIME_CHART_FILE_NAME = "time_vs_record_size.svg";

export const SYSCALL_CHART_FILE_NAME = "syscalls_vs_record_size.svg";

export const CHART_WIDTH = 640;

export const CHART_HEIGHT = 400;

export const BYTES_PER_KIB = 1024;
