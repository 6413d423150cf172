export type ErrorCode =
  | "UNKNOWN_MODE"
  | "MISSING_CREDENTIAL"
  | "INVALID_CONFIG"
  | "TRANSPORT"
  | "PROVIDER"
  | "DECODE"
  | "PROCESS_FAILED"
  | "SPAWN_FAILED"
  | "HYBRID_FAILED"
  | "TIMEOUT"
  | "UNIT_CRASHED";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

export type ConfigErrorCode = Extract<ErrorCode, "UNKNOWN_MODE" | "MISSING_CREDENTIAL" | "INVALID_CONFIG">;

export class ConfigError extends OrchestratorError {
  /** The backend mode the error concerns, when there is one. */
  readonly mode?: string;

  constructor(code: ConfigErrorCode, message: string, opts?: { mode?: string; cause?: unknown }) {
    super(code, message, { cause: opts?.cause });
    this.name = "ConfigError";
    this.mode = opts?.mode;
  }

  static unknownMode(mode: string): ConfigError {
    return new ConfigError(
      "UNKNOWN_MODE",
      `Invalid backend mode "${mode}". Must be "api", "claude-code", "hybrid", or "agent-teams".`,
      { mode },
    );
  }

  static missingCredential(mode: string): ConfigError {
    return new ConfigError(
      "MISSING_CREDENTIAL",
      `ANTHROPIC_API_KEY is required when the backend mode is "${mode}"`,
      { mode },
    );
  }
}

export type BackendErrorCode = Extract<
  ErrorCode,
  "TRANSPORT" | "PROVIDER" | "DECODE" | "PROCESS_FAILED" | "SPAWN_FAILED" | "HYBRID_FAILED"
>;

export type BackendErrorDetails = {
  /** HTTP status of a rejected provider request. */
  status?: number;
  /** Response body of a rejected provider request. */
  body?: string;
  /** Exit code, or terminating signal name, of a failed child process. */
  exitStatus?: number | string;
  detail?: string;
  /** The Direct leg's failure when a Hybrid call fails on both legs. */
  directError?: Error;
  cause?: unknown;
};

export class BackendError extends OrchestratorError {
  readonly status?: number;
  readonly body?: string;
  readonly exitStatus?: number | string;
  readonly detail?: string;
  readonly directError?: Error;

  constructor(code: BackendErrorCode, message: string, details: BackendErrorDetails = {}) {
    super(code, message, { cause: details.cause });
    this.name = "BackendError";
    this.status = details.status;
    this.body = details.body;
    this.exitStatus = details.exitStatus;
    this.detail = details.detail;
    this.directError = details.directError;
  }
}

export class TimeoutError extends OrchestratorError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super("TIMEOUT", `Timed out after ${timeoutSeconds}s`);
    this.name = "TimeoutError";
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class ExecutionUnitFault extends OrchestratorError {
  constructor(reason: unknown) {
    super("UNIT_CRASHED", `Execution unit crashed: ${errorMessage(reason)}`, { cause: reason });
    this.name = "ExecutionUnitFault";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
