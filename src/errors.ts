export type ErrorCode =
  | "PARSE_FAILED"
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "CONFIG_MISSING"
  | "UPSTREAM_FAILED"
  | "TIMEOUT"
  | "CANCELLED";

/** Base class for errors raised by the engine and its service clients. */
export class EngineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toJSON(): { code: ErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

/** Model or upstream output that could not be parsed. */
export class ParseError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
  }
}

export class ValidationError extends EngineError {
  constructor(code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION", message: string) {
    super(code, message);
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super("CONFIG_MISSING", message);
  }
}

export class TimeoutError extends EngineError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("TIMEOUT", `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** A remote API answered with a failure status or unusable body. */
export class UpstreamError extends EngineError {
  /** HTTP status, when the failure came with one. */
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("UPSTREAM_FAILED", message, options);
    this.status = options?.status;
  }

  /** 5xx, 429 and transport failures are worth another attempt; other 4xx are not. */
  get retryable(): boolean {
    return this.status === undefined || this.status >= 500 || this.status === 429;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
