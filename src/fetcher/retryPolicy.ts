import { errorMessage, type ErrorCode, StatusCheckError } from "../core/errors";
import type { SleepFn } from "../core/sleep";

export const BACKOFF_FACTOR = 1.5;

export type AttemptOutcome<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable"; errorKind: ErrorCode; message: string; error: unknown }
  | { kind: "fatal"; message: string; error: unknown };

export interface RetryAttempt {
  attempt: number;
  errorKind: ErrorCode;
  backoffMs: number;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; errorMessage: string; error: unknown; fatal: boolean };

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep: SleepFn;
  onRetry?: (retry: RetryAttempt) => void;
}

/** Delay after failed attempt `attempt` (1-based): base × 1.5^attempt. */
export function computeBackoffMs(attempt: number, baseDelayMs: number): number {
  return Math.round(baseDelayMs * BACKOFF_FACTOR ** attempt);
}

export function classifyError<T>(error: unknown): AttemptOutcome<T> {
  if (error instanceof StatusCheckError && error.retryable) {
    return { kind: "retryable", errorKind: error.code, message: error.message, error };
  }
  return { kind: "fatal", message: errorMessage(error), error };
}

export async function runAttempt<T>(operation: () => Promise<T>): Promise<AttemptOutcome<T>> {
  try {
    return { kind: "success", value: await operation() };
  } catch (error) {
    return classifyError<T>(error);
  }
}

/**
 * Runs `operation` until it succeeds, fails fatally, or `maxAttempts` is spent.
 * No delay follows the last attempt.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  let last: Extract<AttemptOutcome<T>, { kind: "retryable" }> | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const outcome = await runAttempt(() => operation(attempt));
    if (outcome.kind === "success") {
      return { ok: true, value: outcome.value, attempts: attempt };
    }
    if (outcome.kind === "fatal") {
      return {
        ok: false,
        attempts: attempt,
        errorMessage: `Unexpected error: ${outcome.message}`,
        error: outcome.error,
        fatal: true,
      };
    }

    last = outcome;
    if (attempt < maxAttempts) {
      const backoffMs = computeBackoffMs(attempt, options.baseDelayMs);
      options.onRetry?.({ attempt, errorKind: outcome.errorKind, backoffMs });
      await options.sleep(backoffMs);
    }
  }

  return {
    ok: false,
    attempts: maxAttempts,
    errorMessage: `Attempt ${maxAttempts}: ${last?.message ?? "no attempt made"}`,
    error: last?.error,
    fatal: false,
  };
}
