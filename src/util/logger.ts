export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogSink = (line: string) => void;

const writeToStderr: LogSink = (msg) => {
  process.stderr.write(msg + "\n");
};

function safeStringify(obj: Record<string, unknown>): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return "[circular or unstringifiable]";
  }
}

function extractErrorMeta(
  meta?: Record<string, unknown>,
): Record<string, unknown> | undefined {
  if (!meta) return undefined;
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value instanceof Error) {
      result[key] = value.message;
      if (value.stack) {
        result[`${key}Stack`] = value.stack;
      }
    } else {
      result[key] = value;
    }
  }
  return result;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((l) => l === value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === "json" || value === "pretty";
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private sink: LogSink;

  constructor(
    level: LogLevel = "info",
    format: LogFormat = "pretty",
    sink: LogSink = writeToStderr,
  ) {
    this.level = level;
    this.format = format;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  private write(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const processed = extractErrorMeta(meta);

    if (this.format === "json") {
      this.sink(
        safeStringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...processed,
        }),
      );
      return;
    }

    const metaStr = processed ? " " + safeStringify(processed) : "";
    this.sink(`[${level.toUpperCase()}] ${message}${metaStr}`);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write("error", message, meta);
  }
}

export const logger = new Logger();

export function configureLogger(level: LogLevel, format: LogFormat): void {
  logger.setLevel(level);
  logger.setFormat(format);
}
