export class PilotError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = "PilotError";
  }
}

/** The device rejected or failed a single operation. */
export class DeviceError extends PilotError {
  constructor(message: string, cause?: unknown, code = "DEVICE_ERROR") {
    super(message, code, cause);
    this.name = "DeviceError";
  }
}

/** The device link itself is gone (offline, unplugged, adb server down). */
export class DeviceConnectionError extends DeviceError {
  constructor(message: string, cause?: unknown) {
    super(message, cause, "DEVICE_CONNECTION_ERROR");
    this.name = "DeviceConnectionError";
  }
}

export class ReasoningError extends PilotError {
  public readonly retryable = true;
  public readonly attempts: number;

  constructor(message: string, cause?: unknown, attempts = 1) {
    super(message, "REASONING_ERROR", cause);
    this.name = "ReasoningError";
    this.attempts = attempts;
  }
}

export class DecisionParseError extends PilotError {
  public readonly rawText: string;

  constructor(message: string, rawText: string, cause?: unknown) {
    super(message, "DECISION_PARSE_ERROR", cause);
    this.name = "DecisionParseError";
    this.rawText = rawText;
  }
}

export class TimeoutError extends PilotError {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, "TIMEOUT_ERROR");
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends PilotError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isConnectionError(error: unknown): error is DeviceConnectionError {
  return error instanceof DeviceConnectionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
