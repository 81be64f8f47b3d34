/**
 * Base application error. All domain-specific errors extend this class.
 *
 * - `code`          short machine-readable identifier (e.g. "HTTP_ERROR")
 * - `statusCode`    HTTP-compatible status code, kept for log correlation
 * - `isOperational` true = expected/recoverable, false = programmer error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: string,
    statusCode = 500,
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.timestamp = new Date().toISOString();

    // Maintains proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      timestamp: this.timestamp,
      ...(process.env['NODE_ENV'] !== 'production' ? { stack: this.stack } : {}),
    };
  }
}

/**
 * An outbound HTTP request that failed: bad status, unparsable body,
 * timeout or transport error.
 */
export class HttpRequestError extends AppError {
  public readonly url: string;
  /** Upstream status, or null when no response was received. */
  public readonly status: number | null;

  constructor(
    message: string,
    code: string,
    url: string,
    status: number | null = null,
  ) {
    super(message, code, 502);
    this.url = url;
    this.status = status;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
      status: this.status,
    };
  }
}

/**
 * A single source adapter could not fetch or parse its origin.
 * Recovered inside the adapter and reported as a run note.
 */
export class SourceFetchError extends AppError {
  public readonly source: string;

  constructor(
    message: string,
    code: string,
    source: string,
    statusCode = 502,
  ) {
    super(message, code, statusCode);
    this.source = source;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      source: this.source,
    };
  }
}

/**
 * Structural failure of a pipeline run. Fatal to that run only; the
 * history cache is left untouched.
 */
export class PipelineRunError extends AppError {
  public readonly runId: string;

  constructor(message: string, runId: string, cause?: unknown) {
    super(message, 'PIPELINE_RUN_FAILED', 500, false);
    this.runId = runId;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      runId: this.runId,
    };
  }
}

export class ConfigError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message, 'CONFIG_INVALID', 500, false);
    this.issues = issues;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }
}

/**
 * Type guard to distinguish operational errors (expected) from
 * programmer errors (bugs). Used by top-level error handlers to
 * decide whether to keep the process alive.
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
