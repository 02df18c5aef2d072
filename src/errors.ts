export class ConfigError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
    this.details = details;
  }
}

export class InvalidSpecError extends ConfigError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "InvalidSpecError";
  }
}

export class UnsupportedTypeError extends ConfigError {
  readonly outputType: string;
  constructor(outputType: string, supported: string[]) {
    super(
      "config_type_unsupported",
      `Output type "${outputType}" is not supported`,
      { type: outputType, supported }
    );
    this.name = "UnsupportedTypeError";
    this.outputType = outputType;
  }
}

/**
 * Failure of a single export. Returned inside an `ExecuteResult` rather than
 * thrown, so one failing output never stops the rest of the batch.
 */
export class ExecutionError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ExecutionError";
    this.code = code;
    this.details = details;
  }
}

export class LaunchError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "LaunchError";
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
