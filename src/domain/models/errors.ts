/**
 * Stable error codes surfaced to tool callers
 */
export type ToolErrorCode =
  | "MISSING_CREDENTIAL" // No API key configured, or upstream demanded one (503)
  | "INVALID_CONFIGURATION" // Environment failed validation (503)
  | "INVALID_ARGUMENT" // Caller arguments rejected (400)
  | "UPSTREAM_UNAUTHORIZED" // Upstream rejected the configured key (401)
  | "UPSTREAM_RATE_LIMITED" // Retries exhausted on 429 (429)
  | "UPSTREAM_UNAVAILABLE" // Retries exhausted on 5xx, network or timeout (503)
  | "MALFORMED_UPSTREAM_RESPONSE" // Upstream body unusable (502)
  | "CANCELLED" // Caller aborted the request (499)
  | "INTERNAL_ERROR"; // Unexpected failure (500)

export interface ToolErrorDetails {
  readonly issues?: ReadonlyArray<string>;
  readonly attempts?: number;
  readonly upstreamStatus?: number;
}

export interface ToolError {
  readonly code: ToolErrorCode;
  readonly message: string;
  readonly details?: ToolErrorDetails;
}

export function getErrorStatusCode(error: ToolError | { code: string }): number {
  switch (error.code) {
    case "INVALID_ARGUMENT":
      return 400;
    case "UPSTREAM_UNAUTHORIZED":
      return 401;
    case "UPSTREAM_RATE_LIMITED":
      return 429;
    case "CANCELLED":
      return 499;
    case "MALFORMED_UPSTREAM_RESPONSE":
      return 502;
    case "MISSING_CREDENTIAL":
    case "INVALID_CONFIGURATION":
    case "UPSTREAM_UNAVAILABLE":
      return 503;
    case "INTERNAL_ERROR":
    default:
      return 500;
  }
}

export function createToolError(
  code: ToolErrorCode,
  message: string,
  details?: ToolErrorDetails,
): ToolError {
  return details ? { code, message, details } : { code, message };
}
