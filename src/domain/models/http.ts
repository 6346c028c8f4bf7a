/**
 * Fully resolved outbound request
 */
export interface HttpRequestSpec {
  readonly method: "GET";
  readonly url: string;
  readonly params: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
}

/**
 * Successful upstream response with its JSON body parsed but not yet validated
 */
export interface RawResponse {
  readonly status: number;
  readonly body: unknown;
}

/**
 * Failures a later attempt may recover from
 */
export type RetryableFailure =
  | { type: "network"; message: string }
  | { type: "timeout"; timeoutMs: number }
  | { type: "rateLimit"; status: 429; retryAfterMs?: number }
  | { type: "server"; status: number };

export type HttpError =
  | { type: "unauthorized"; status: number; message: string }
  | { type: "badRequest"; status: number; message: string }
  | { type: "malformedResponse"; message: string }
  | { type: "exhausted"; attempts: number; lastCause: RetryableFailure; message: string }
  | { type: "cancelled"; message: string };

/**
 * Per-request retry bookkeeping
 */
export interface RetryState {
  attempt: number;
  lastFailure?: RetryableFailure;
  nextDelayMs?: number;
}

export function isRetryableFailure(
  failure: RetryableFailure | HttpError,
): failure is RetryableFailure {
  switch (failure.type) {
    case "network":
    case "timeout":
    case "rateLimit":
    case "server":
      return true;
    default:
      return false;
  }
}

export function describeFailure(failure: RetryableFailure): string {
  switch (failure.type) {
    case "network":
      return `network error: ${failure.message}`;
    case "timeout":
      return `timed out after ${failure.timeoutMs}ms`;
    case "rateLimit":
      return "rate limited (429)";
    case "server":
      return `server error (${failure.status})`;
  }
}
