import test from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError, ConnectionError, RpcError } from "../errors.js";
import { computeRetryDecision, isRetryableReportError } from "./retry-policy.js";

test("retry policy doubles the delay and stops at max attempts", () => {
  const first = computeRetryDecision({ attempt: 1, maxAttempts: 3, baseDelayMs: 100, jitterRatio: 0 });
  const second = computeRetryDecision({ attempt: 2, maxAttempts: 3, baseDelayMs: 100, jitterRatio: 0 });
  const exhausted = computeRetryDecision({ attempt: 3, maxAttempts: 3, baseDelayMs: 100, jitterRatio: 0 });

  assert.deepEqual(first, { retry: true, delayMs: 100 });
  assert.deepEqual(second, { retry: true, delayMs: 200 });
  assert.deepEqual(exhausted, { retry: false, delayMs: 0 });
});

test("delay is capped and jitter is added on top", () => {
  const capped = computeRetryDecision({ attempt: 8, maxAttempts: 10, baseDelayMs: 100, maxDelayMs: 1_000 });
  assert.deepEqual(capped, { retry: true, delayMs: 1_100 });
});

test("defaults allow three attempts starting at 250ms", () => {
  assert.deepEqual(computeRetryDecision({ attempt: 1 }), { retry: true, delayMs: 275 });
  assert.equal(computeRetryDecision({ attempt: 3 }).retry, false);
});

test("only transport failures and 5xx are retryable", () => {
  assert.equal(isRetryableReportError(new ConnectionError("coordinator_unreachable", "down")), true);
  assert.equal(isRetryableReportError(new RpcError("coordinator_http_error", "x", { status: 502 })), true);
  assert.equal(isRetryableReportError(new RpcError("coordinator_http_error", "x", { status: 404 })), false);
  assert.equal(isRetryableReportError(new ConfigurationError("invalid_config", "x")), false);
  assert.equal(isRetryableReportError(new Error("boom")), false);
});
