export enum ErrorCode {
  CONFIG_ERROR = "CONFIG_ERROR",
  PRECONDITION_ERROR = "PRECONDITION_ERROR",
  RESULT_STORE_ERROR = "RESULT_STORE_ERROR",
}

export class ConfigError extends Error {
  readonly code = ErrorCode.CONFIG_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A sweep cannot start: the benchmark executable or its data file is
 * missing. Raised before the result file is touched.
 */
export class PreconditionError extends Error {
  readonly code = ErrorCode.PRECONDITION_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export class ResultStoreError extends Error {
  readonly code = ErrorCode.RESULT_STORE_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ResultStoreError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
