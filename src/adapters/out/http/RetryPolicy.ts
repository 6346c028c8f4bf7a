import type { RetrySettings } from "../../../domain/models/config.ts";
import { isRetryableFailure, RetryableFailure } from "../../../domain/models/http.ts";

export interface RetryPolicyOptions extends RetrySettings {
  /** Source of jitter in [0, 1) */
  readonly random?: () => number;
  readonly isRetryable?: (failure: RetryableFailure) => boolean;
}

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterRatio: 0.3,
};

/**
 * Exponential backoff with proportional jitter:
 * attempt n (1-based, already failed) waits base * 2^(n-1) plus up to
 * jitterRatio of that, never less than a server-provided Retry-After and
 * never more than maxDelayMs.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitterRatio: number;
  private readonly random: () => number;
  private readonly retryable: (failure: RetryableFailure) => boolean;

  constructor(options: RetryPolicyOptions = DEFAULT_RETRY_SETTINGS) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.maxDelayMs = Math.max(0, options.maxDelayMs);
    this.jitterRatio = Math.max(0, options.jitterRatio);
    this.random = options.random ?? Math.random;
    this.retryable = options.isRetryable ?? isRetryableFailure;
  }

  static fromSettings(settings: RetrySettings): RetryPolicy {
    return new RetryPolicy(settings);
  }

  shouldRetry(failure: RetryableFailure, attempt: number): boolean {
    return attempt < this.maxAttempts && this.retryable(failure);
  }

  delayFor(attempt: number, failure?: RetryableFailure): number {
    const exponential = this.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    const jitter = this.random() * this.jitterRatio * exponential;
    const computed = exponential + jitter;
    const floor = failure?.type === "rateLimit" ? failure.retryAfterMs ?? 0 : 0;

    return Math.round(Math.min(this.maxDelayMs, Math.max(computed, floor)));
  }
}
