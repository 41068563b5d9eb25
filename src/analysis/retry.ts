import { EvaluationFailure, RunCancelled, describeError } from "../errors.js";

export type RetryPolicy = {
  /** Total attempts, first call included. */
  maxAttempts: number;
  /** Wait before attempt n+1 is backoffBaseMs * 2^(n-1). */
  backoffBaseMs: number;
  /** Per-attempt limit. */
  timeoutMs: number;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: EvaluationFailure | RunCancelled; attempts: number };

export function backoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  return policy.backoffBaseMs * 2 ** (failedAttempt - 1);
}

/** Resolves after `ms`, or rejects with `RunCancelled` as soon as `signal` aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new RunCancelled());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelled());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `fn` with its own AbortSignal that fires when `timeoutMs` elapses
 * (reason: `EvaluationFailure("timeout")`) or when `parent` aborts (reason:
 * `RunCancelled`). The returned promise rejects with that reason even if `fn`
 * ignores its signal.
 */
export async function callWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal
): Promise<T> {
  if (parent.aborted) throw new RunCancelled();

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(new RunCancelled());
  parent.addEventListener("abort", onParentAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new EvaluationFailure("timeout", `Evaluation timed out after ${timeoutMs}ms`)),
    timeoutMs
  );
  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Attempts `fn` up to `policy.maxAttempts` times with exponential backoff.
 * Cancellation ends the loop at once and is never retried; any other error is
 * reported as an `EvaluationFailure`.
 */
export async function runWithRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  signal: AbortSignal,
  onRetry?: (info: { attempt: number; delayMs: number; error: EvaluationFailure }) => void
): Promise<RetryOutcome<T>> {
  let attempts = 0;
  let lastError: EvaluationFailure = new EvaluationFailure("error", "Evaluation was not attempted");

  while (attempts < policy.maxAttempts) {
    if (signal.aborted) return { ok: false, error: new RunCancelled(), attempts };
    attempts += 1;
    try {
      const value = await callWithTimeout(fn, policy.timeoutMs, signal);
      return { ok: true, value, attempts };
    } catch (err) {
      if (err instanceof RunCancelled || signal.aborted) {
        return { ok: false, error: err instanceof RunCancelled ? err : new RunCancelled(), attempts };
      }
      lastError =
        err instanceof EvaluationFailure
          ? err
          : new EvaluationFailure("error", describeError(err).message, { cause: err });
    }

    if (attempts < policy.maxAttempts) {
      const delayMs = backoffDelay(policy, attempts);
      onRetry?.({ attempt: attempts, delayMs, error: lastError });
      try {
        await sleep(delayMs, signal);
      } catch {
        return { ok: false, error: new RunCancelled(), attempts };
      }
    }
  }

  return { ok: false, error: lastError, attempts };
}
