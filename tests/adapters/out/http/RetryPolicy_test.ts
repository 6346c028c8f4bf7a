import { expect, test } from "vitest";
import { DEFAULT_RETRY_SETTINGS, RetryPolicy } from "../../../../src/adapters/out/http/RetryPolicy.ts";

const noJitter = () => 0;
const fullJitter = () => 1;

test("delayFor doubles the base delay per attempt", () => {
  const policy = new RetryPolicy({ ...DEFAULT_RETRY_SETTINGS, random: noJitter });
  expect(policy.delayFor(1)).toBe(1000);
  expect(policy.delayFor(2)).toBe(2000);
  expect(policy.delayFor(3)).toBe(4000);
});

test("delayFor adds up to jitterRatio of the exponential delay", () => {
  const policy = new RetryPolicy({ ...DEFAULT_RETRY_SETTINGS, random: fullJitter });
  expect(policy.delayFor(1)).toBe(1300);
  expect(policy.delayFor(2)).toBe(2600);

  const half = new RetryPolicy({ ...DEFAULT_RETRY_SETTINGS, random: () => 0.5 });
  expect(half.delayFor(1)).toBe(1150);
});

test("delayFor never exceeds maxDelayMs", () => {
  const policy = new RetryPolicy({ ...DEFAULT_RETRY_SETTINGS, maxDelayMs: 3000, random: fullJitter });
  expect(policy.delayFor(2)).toBe(2600);
  expect(policy.delayFor(3)).toBe(3000);
  expect(policy.delayFor(10)).toBe(3000);
});

test("delayFor waits at least as long as Retry-After", () => {
  const policy = new RetryPolicy({ ...DEFAULT_RETRY_SETTINGS, random: noJitter });
  expect(policy.delayFor(1, { type: "rateLimit", status: 429, retryAfterMs: 5000 })).toBe(5000);
  expect(policy.delayFor(1, { type: "rateLimit", status: 429, retryAfterMs: 200 })).toBe(1000);
  expect(policy.delayFor(1, { type: "server", status: 503 })).toBe(1000);
});

test("shouldRetry stops at maxAttempts", () => {
  const policy = new RetryPolicy(DEFAULT_RETRY_SETTINGS);
  const failure = { type: "server", status: 500 } as const;
  expect(policy.shouldRetry(failure, 1)).toBe(true);
  expect(policy.shouldRetry(failure, 2)).toBe(true);
  expect(policy.shouldRetry(failure, 3)).toBe(false);
});

test("shouldRetry consults the retryable predicate", () => {
  const policy = new RetryPolicy({
    ...DEFAULT_RETRY_SETTINGS,
    isRetryable: (failure) => failure.type !== "timeout",
  });
  expect(policy.shouldRetry({ type: "timeout", timeoutMs: 100 }, 1)).toBe(false);
  expect(policy.shouldRetry({ type: "network", message: "reset" }, 1)).toBe(true);
});

test("fromSettings keeps at least one attempt", () => {
  const policy = RetryPolicy.fromSettings({ ...DEFAULT_RETRY_SETTINGS, maxAttempts: 0 });
  expect(policy.maxAttempts).toBe(1);
});
