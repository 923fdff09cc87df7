export type ErrorCode =
  | "authentication_failed"
  | "session_expired"
  | "refresh_failed"
  | "token_rejected"
  | "authorization_denied"
  | "unknown_tool"
  | "invalid_argument"
  | "engine_timeout"
  | "engine_execution_failed"
  | "invocation_cancelled"
  | "operation_timeout"
  | "identity_provider_error"
  | "upstream_error";

export class AnalyticsError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly retriable = false,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad credentials. Shown to the user; never retried. */
export class AuthenticationError extends AnalyticsError {
  constructor(message = "Invalid username or password", options?: ErrorOptions) {
    super(message, "authentication_failed", false, options);
  }
}

/** The refresh token is no longer accepted. The user must log in again. */
export class SessionExpiredError extends AnalyticsError {
  constructor(message = "Session expired; please log in again", options?: ErrorOptions) {
    super(message, "session_expired", false, options);
  }
}

/** Transient failure while renewing tokens. */
export class RefreshError extends AnalyticsError {
  constructor(message = "Token refresh failed", options?: ErrorOptions) {
    super(message, "refresh_failed", true, options);
  }
}

/** A hop refused the bearer token (bad signature, expired, wrong issuer). */
export class TokenRejectedError extends AnalyticsError {
  constructor(message = "Access token was rejected", options?: ErrorOptions) {
    super(message, "token_rejected", false, options);
  }
}

/** Valid identity, insufficient role. */
export class AuthorizationError extends AnalyticsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "authorization_denied", false, options);
  }
}

export class UnknownToolError extends AnalyticsError {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`, "unknown_tool");
  }
}

export class InvalidArgumentError extends AnalyticsError {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message, "invalid_argument");
  }

  static forTool(toolName: string, issues: readonly string[]): InvalidArgumentError {
    return new InvalidArgumentError(
      `Invalid arguments for ${toolName}: ${issues.join("; ")}`,
      issues,
    );
  }
}

export class EngineTimeoutError extends AnalyticsError {
  constructor(readonly timeoutMs: number, options?: ErrorOptions) {
    super(`Data engine did not answer within ${timeoutMs}ms`, "engine_timeout", true, options);
  }
}

export type EngineFailureReason =
  | "permission_denied"
  | "malformed_query"
  | "malformed_result"
  | "not_found"
  | "engine_error";

export class EngineExecutionError extends AnalyticsError {
  constructor(
    readonly reason: EngineFailureReason,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, "engine_execution_failed", false, options);
  }
}

/** User-initiated stop. Not a failure. */
export class InvocationCancelled extends AnalyticsError {
  constructor(message = "Invocation cancelled") {
    super(message, "invocation_cancelled");
  }
}

export type TimedOperation = "login" | "refresh" | "revoke" | "invoke" | "tool_call" | "execute";

export class OperationTimeoutError extends AnalyticsError {
  constructor(
    readonly operation: TimedOperation,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, "operation_timeout", true);
  }
}

export class IdentityProviderError extends AnalyticsError {
  constructor(
    readonly kind: "rejected" | "unavailable",
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, "identity_provider_error", kind === "unavailable", options);
  }
}

/** Non-2xx answer from another hop that has no more specific mapping. */
export class UpstreamError extends AnalyticsError {
  constructor(
    readonly service: string,
    readonly status: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, "upstream_error", status >= 500 || status === 0, options);
  }
}

export interface ErrorBody {
  readonly error: {
    readonly code: string;
    readonly message: string;
  };
}

export function errorBody(err: unknown): ErrorBody {
  if (err instanceof AnalyticsError) {
    return { error: { code: err.code, message: err.message } };
  }
  return { error: { code: "internal_error", message: "Internal error" } };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 502 | 504 | 500;

export function httpStatusFor(err: unknown): ErrorStatus {
  if (err instanceof TokenRejectedError || err instanceof SessionExpiredError) return 401;
  if (err instanceof AuthenticationError) return 401;
  if (err instanceof AuthorizationError) return 403;
  if (err instanceof UnknownToolError) return 404;
  if (err instanceof InvalidArgumentError) return 400;
  if (err instanceof OperationTimeoutError || err instanceof EngineTimeoutError) return 504;
  if (err instanceof UpstreamError || err instanceof IdentityProviderError) return 502;
  return 500;
}
