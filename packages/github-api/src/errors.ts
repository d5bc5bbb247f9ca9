/**
 * Standardized Error Codes for the GitHub aggregation engine
 *
 * Maps descriptive error names to HTTP-like status codes.
 * Same HTTP code can mean different things by context.
 */

export const ErrorCodes = {
  // Configuration (raised before any network call)
  INVALID_CONFIG: 400,
  INVALID_QUERY: 400,
  TOKEN_MISSING: 401,

  // Authorization (terminal, never retried)
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,

  // Quota
  RATE_LIMITED: 429,

  // Network & Retry errors
  NETWORK_ERROR: 502,
  MAX_RETRIES_EXCEEDED: 503,
  SEARCH_FAILED: 502,

  // Response parsing errors
  INVALID_RESPONSE: 500,

  // Cancelled by the caller
  ABORTED: 499,
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

/**
 * Custom error class for GitHub API and pipeline errors.
 */
export class GithubApiError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly httpStatus: number;
  public readonly context?: Record<string, unknown>;

  constructor(errorCode: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(`${errorCode}: ${message}`);
    this.name = "GithubApiError";
    this.errorCode = errorCode;
    this.httpStatus = ErrorCodes[errorCode];
    this.context = context;

    Error.captureStackTrace?.(this, GithubApiError);
  }

  /**
   * Check if error matches a specific error code
   */
  is(code: ErrorCode): boolean {
    return this.errorCode === code;
  }

  /**
   * Convert to JSON for logging
   */
  toJSON() {
    return {
      name: this.name,
      errorCode: this.errorCode,
      httpStatus: this.httpStatus,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * 401/403 from GitHub: the credential is invalid or lacks scope.
 */
export function isAuthorizationError(error: unknown): error is GithubApiError {
  return error instanceof GithubApiError && (error.is("UNAUTHORIZED") || error.is("FORBIDDEN"));
}

export function isAbortError(error: unknown): error is GithubApiError {
  return error instanceof GithubApiError && error.is("ABORTED");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
