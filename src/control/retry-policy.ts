import { ConnectionError, RpcError } from "../errors.js";

export type RetryDecision = {
  retry: boolean;
  delayMs: number;
};

export interface ReportRetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterRatio?: number;
}

export function computeRetryDecision(input: ReportRetryOptions & { attempt: number }): RetryDecision {
  const maxAttempts = Math.max(1, input.maxAttempts ?? 3);
  const base = Math.max(1, input.baseDelayMs ?? 250);
  const maxDelay = Math.max(base, input.maxDelayMs ?? 5_000);
  const jitterRatio = Math.max(0, Math.min(0.5, input.jitterRatio ?? 0.1));

  if (input.attempt >= maxAttempts) {
    return { retry: false, delayMs: 0 };
  }

  const exp = Math.min(maxDelay, base * 2 ** Math.max(0, input.attempt - 1));
  const jitter = Math.round(exp * jitterRatio);
  return { retry: true, delayMs: exp + jitter };
}

/** Transport failures and coordinator 5xx are worth another try; 4xx are not. */
export function isRetryableReportError(err: unknown): boolean {
  if (err instanceof ConnectionError) return true;
  if (err instanceof RpcError) return err.status >= 500;
  return false;
}
