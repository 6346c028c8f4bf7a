import { err, fromThrowable, ok, Result, ResultAsync } from "neverthrow";
import { debug, warn } from "../../../config/logger.ts";
import {
  describeFailure,
  HttpError,
  HttpRequestSpec,
  isRetryableFailure,
  RawResponse,
  RetryableFailure,
  RetryState,
} from "../../../domain/models/http.ts";
import { RetryPolicy } from "./RetryPolicy.ts";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Waits for ms milliseconds. Resolves false when the signal aborts first.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export interface HttpClientOptions {
  readonly fetchImpl?: FetchLike;
  readonly sleep?: Sleeper;
}

type AttemptOutcome = Result<RawResponse, RetryableFailure | HttpError>;

const CANCELLED: HttpError = { type: "cancelled", message: "Request was cancelled" };

export const waitFor: Sleeper = (ms, signal) => {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - Date.now());
}

const parseJson = fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e) => e instanceof Error ? e.message : "Invalid JSON",
);

/**
 * GET client that retries rate limits, 5xx, network errors and timeouts.
 * Every call keeps its own RetryState; nothing is shared between calls.
 */
export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleeper;

  constructor(
    private readonly policy: RetryPolicy = new RetryPolicy(),
    options: HttpClientOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? waitFor;
  }

  async execute(
    spec: HttpRequestSpec,
    signal?: AbortSignal,
  ): Promise<Result<RawResponse, HttpError>> {
    const state: RetryState = { attempt: 0 };

    while (true) {
      if (signal?.aborted) return err(CANCELLED);

      state.attempt += 1;
      const outcome = await this.attemptOnce(spec, signal);
      if (outcome.isOk()) {
        debug("Upstream request succeeded", { attempt: state.attempt, status: outcome.value.status });
        return ok(outcome.value);
      }

      const failure = outcome.error;
      if (!isRetryableFailure(failure)) {
        return err(failure);
      }

      state.lastFailure = failure;
      if (!this.policy.shouldRetry(failure, state.attempt)) {
        warn("Upstream retries exhausted", { attempts: state.attempt, cause: describeFailure(failure) });
        return err({
          type: "exhausted",
          attempts: state.attempt,
          lastCause: failure,
          message: `Gave up after ${state.attempt} attempt(s): ${describeFailure(failure)}`,
        });
      }

      state.nextDelayMs = this.policy.delayFor(state.attempt, failure);
      warn("Upstream request failed, retrying", {
        attempt: state.attempt,
        maxAttempts: this.policy.maxAttempts,
        delayMs: state.nextDelayMs,
        cause: describeFailure(failure),
      });

      const elapsed = await this.sleep(state.nextDelayMs, signal);
      if (!elapsed) return err(CANCELLED);
    }
  }

  private async attemptOnce(spec: HttpRequestSpec, signal?: AbortSignal): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, spec.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    const classifyThrown = (e: unknown): RetryableFailure | HttpError => {
      if (signal?.aborted) return CANCELLED;
      if (timedOut) return { type: "timeout", timeoutMs: spec.timeoutMs };
      return { type: "network", message: e instanceof Error ? e.message : "Unknown error" };
    };

    try {
      return await ResultAsync.fromPromise(
        this.fetchImpl(spec.url, {
          method: spec.method,
          headers: spec.headers,
          signal: controller.signal,
        }),
        classifyThrown,
      )
        .andThen((response) =>
          ResultAsync.fromPromise(response.text(), classifyThrown)
            .andThen((text) => classifyResponse(response, text))
        );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

function classifyResponse(response: Response, text: string): AttemptOutcome {
  const status = response.status;

  if (status === 429) {
    return err({
      type: "rateLimit",
      status: 429,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    });
  }

  if (status >= 500) {
    return err({ type: "server", status });
  }

  if (status === 401 || status === 403) {
    return err({
      type: "unauthorized",
      status,
      message: `API key authentication error: ${status}`,
    });
  }

  if (status >= 400) {
    return err({
      type: "badRequest",
      status,
      message: `Upstream rejected the request: ${status}`,
    });
  }

  if (status < 200 || status >= 300) {
    return err({ type: "malformedResponse", message: `Unexpected upstream status ${status}` });
  }

  if (text.trim() === "") {
    return err({ type: "malformedResponse", message: "Upstream returned an empty body" });
  }

  return parseJson(text)
    .map((body): RawResponse => ({ status, body }))
    .mapErr((message): HttpError => ({
      type: "malformedResponse",
      message: `Failed to parse API response: ${message}`,
    }));
}
