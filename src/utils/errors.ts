/**
 * Error taxonomy shared by the pipeline and the HTTP layer.
 * Errors carrying a `status` are mapped to that HTTP status by the error handler.
 */

export class HttpError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * Missing or placeholder credentials, invalid settings. Fatal at startup.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A news provider request that failed for one category (timeout, transport, bad payload, error status).
 */
export class UpstreamError extends Error {
  readonly kind: 'timeout' | 'transport' | 'status' | 'malformed';

  constructor(kind: UpstreamError['kind'], message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamError';
    this.kind = kind;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class DimensionMismatchError extends HttpError {
  constructor(expected: number, actual: number) {
    super(`Embedding dimension mismatch: index holds ${expected}-d vectors, got ${actual}-d`, 500);
  }
}

export class ModelInvocationError extends HttpError {
  constructor(operation: 'embedding' | 'completion', cause: unknown) {
    super(`Model ${operation} failed: ${errorMessage(cause)}`, 502);
    this.cause = cause;
  }
}

export class RequestTimeoutError extends HttpError {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, 503);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
