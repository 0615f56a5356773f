/**
 * ServiceNow Error Types
 *
 * Domain-specific error types for ServiceNow CRUD operations. Every error
 * carries an `errorType` so callers can tell "try again shortly" apart
 * from "don't retry" without parsing messages.
 */

export type ServiceNowErrorType =
  | "validation_error"
  | "table_not_allowed"
  | "auth_error"
  | "rate_limit"
  | "timeout"
  | "connection_error"
  | "client_error"
  | "configuration_error"
  | "unknown_error";

const RETRYABLE_ERROR_TYPES: ReadonlySet<ServiceNowErrorType> = new Set([
  "rate_limit",
  "timeout",
  "connection_error",
]);

export function isRetryableErrorType(errorType: ServiceNowErrorType): boolean {
  return RETRYABLE_ERROR_TYPES.has(errorType);
}

/**
 * Base error class for all ServiceNow-related errors
 */
export class ServiceNowError extends Error {
  readonly errorType: ServiceNowErrorType = "unknown_error";

  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ServiceNowError";

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ServiceNowError);
    }
  }

  get retryable(): boolean {
    return isRetryableErrorType(this.errorType);
  }
}

/**
 * Malformed table, field, value, identifier or payload. Raised before any network call.
 */
export class ServiceNowValidationError extends ServiceNowError {
  override readonly errorType: ServiceNowErrorType = "validation_error";

  constructor(message: string, endpoint?: string) {
    super(message, undefined, endpoint);
    this.name = "ServiceNowValidationError";
  }
}

/**
 * Error thrown when ServiceNow authentication fails (HTTP 401 or a missing token)
 */
export class ServiceNowAuthError extends ServiceNowError {
  override readonly errorType: ServiceNowErrorType = "auth_error";

  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message, 401, endpoint, cause);
    this.name = "ServiceNowAuthError";
  }
}

/**
 * Error thrown when ServiceNow rate limit is exceeded
 */
export class ServiceNowRateLimitError extends ServiceNowError {
  override readonly errorType: ServiceNowErrorType = "rate_limit";

  constructor(
    message: string,
    public retryAfter?: number,
    endpoint?: string,
  ) {
    super(message, 429, endpoint);
    this.name = "ServiceNowRateLimitError";
  }
}

/**
 * Error thrown when ServiceNow request times out (HTTP 408 or the per-attempt timer)
 */
export class ServiceNowTimeoutError extends ServiceNowError {
  override readonly errorType: ServiceNowErrorType = "timeout";

  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message, 408, endpoint, cause);
    this.name = "ServiceNowTimeoutError";
  }
}

/**
 * Transport-level failure: connection refused, DNS failure, reset, or a closed client
 */
export class ServiceNowConnectionError extends ServiceNowError {
  override readonly errorType: ServiceNowErrorType = "connection_error";

  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message, undefined, endpoint, cause);
    this.name = "ServiceNowConnectionError";
  }
}

/**
 * Any other unexpected HTTP status. Carries the response body for diagnosis.
 */
export class ServiceNowClientError extends ServiceNowError {
  override readonly errorType: ServiceNowErrorType = "client_error";

  constructor(
    message: string,
    statusCode: number,
    public responseBody?: string,
    endpoint?: string,
  ) {
    super(message, statusCode, endpoint);
    this.name = "ServiceNowClientError";
  }
}

/**
 * Error thrown when ServiceNow configuration is invalid or missing
 */
export class ServiceNowConfigError extends ServiceNowError {
  override readonly errorType: ServiceNowErrorType = "configuration_error";

  constructor(message: string, cause?: Error) {
    super(message, undefined, undefined, cause);
    this.name = "ServiceNowConfigError";
  }
}

const MAX_ERROR_BODY_LENGTH = 500;

/**
 * Map a non-expected HTTP response to the error taxonomy
 */
export function parseServiceNowError(
  response: Response,
  endpoint: string,
  operation: string,
  body?: string,
): ServiceNowError {
  const statusCode = response.status;

  switch (statusCode) {
    case 401:
      return new ServiceNowAuthError(`Authentication failed for ${operation} operation`, endpoint);

    case 429: {
      const retryAfter = response.headers.get("Retry-After");
      const parsed = retryAfter ? Number.parseInt(retryAfter, 10) : Number.NaN;
      return new ServiceNowRateLimitError(
        `Rate limit exceeded for ${operation} operation`,
        Number.isFinite(parsed) ? parsed : undefined,
        endpoint,
      );
    }

    case 408:
      return new ServiceNowTimeoutError(`Request timeout for ${operation} operation`, endpoint);

    default: {
      const trimmed = body ? body.slice(0, MAX_ERROR_BODY_LENGTH) : "";
      const suffix = trimmed ? `: ${trimmed}` : "";
      return new ServiceNowClientError(
        `HTTP ${statusCode} error for ${operation}${suffix}`,
        statusCode,
        trimmed || undefined,
        endpoint,
      );
    }
  }
}

/**
 * Classify any thrown value into an error type
 */
export function classifyServiceNowError(error: unknown): ServiceNowErrorType {
  if (error instanceof ServiceNowError) {
    return error.errorType;
  }
  return "unknown_error";
}
