/**
 * Error classes
 *
 * Every failure the bridge reports maps to one of these classes, and each
 * class maps to one HTTP status.
 */

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Bad or missing form input. Raised before any external call.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; "));
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Login rejected, or stored tokens refused by the remote service.
 */
export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthenticationError";
  }
}

export type RemoteFailureKind = "rejected" | "unreachable";

export interface RemoteServiceErrorOptions {
  status?: number;
  kind: RemoteFailureKind;
}

/**
 * Network failure or a non-successful response from the remote service.
 */
export class RemoteServiceError extends Error {
  /** HTTP status returned by the service, if it answered at all */
  readonly status: number | null;
  readonly kind: RemoteFailureKind;

  constructor(message: string, options: RemoteServiceErrorOptions) {
    super(message);
    this.name = "RemoteServiceError";
    this.status = options.status ?? null;
    this.kind = options.kind;
  }
}

/**
 * Rate limit error (429)
 */
export class RateLimitError extends RemoteServiceError {
  /** Seconds to wait before retrying */
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message?: string) {
    super(
      message ?? `Rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`,
      { status: 429, kind: "rejected" }
    );
    this.name = "RateLimitError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Missing or invalid environment configuration. Fatal at startup.
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

// =============================================================================
// HTTP mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 429 | 500 | 502 | 504;

/**
 * HTTP status answered for an error raised while handling a request.
 */
export function httpStatusFor(error: unknown): ErrorStatus {
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof AuthenticationError) {
    return 401;
  }
  if (error instanceof RateLimitError) {
    return 429;
  }
  if (error instanceof RemoteServiceError) {
    return error.kind === "unreachable" ? 504 : 502;
  }
  return 500;
}

/**
 * Message shown to the user for an error.
 */
export function userMessageFor(error: unknown): string {
  if (error instanceof ValidationError) {
    return `Invalid input: ${error.message}`;
  }
  if (error instanceof AuthenticationError) {
    return "Authentication failed. Please check your credentials.";
  }
  if (error instanceof RateLimitError) {
    return "Too many requests. Please wait a moment and try again.";
  }
  if (error instanceof RemoteServiceError) {
    return error.kind === "unreachable"
      ? "Could not reach Garmin Connect. Please check your internet connection."
      : `Garmin Connect error: ${error.message}`;
  }
  return "An unexpected error occurred.";
}

/**
 * Describe an unknown thrown value for logs.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
