import { describe, expect, it } from "vitest";
import { EvaluationFailure, RunCancelled } from "../errors.js";
import { backoffDelay, callWithTimeout, runWithRetry, sleep, type RetryPolicy } from "./retry.js";

const policy = (over: Partial<RetryPolicy> = {}): RetryPolicy => ({
  maxAttempts: 3,
  backoffBaseMs: 1,
  timeoutMs: 1000,
  ...over,
});

const never = <T>() => new Promise<T>(() => undefined);

describe("backoffDelay", () => {
  it("doubles per failed attempt", () => {
    const p = policy({ backoffBaseMs: 1000 });
    expect([1, 2, 3].map((n) => backoffDelay(p, n))).toEqual([1000, 2000, 4000]);
  });
});

describe("sleep", () => {
  it("rejects with RunCancelled when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(RunCancelled);
  });
});

describe("callWithTimeout", () => {
  it("rejects with a timeout failure and aborts the call's signal", async () => {
    const seen: AbortSignal[] = [];
    const pending = callWithTimeout(
      (signal) => {
        seen.push(signal);
        return never<string>();
      },
      10,
      new AbortController().signal
    );

    await expect(pending).rejects.toMatchObject({ reason: "timeout", message: "Evaluation timed out after 10ms" });
    expect(seen).toHaveLength(1);
    expect(seen[0].aborted).toBe(true);
  });

  it("resolves with the call's value", async () => {
    await expect(callWithTimeout(async () => 42, 1000, new AbortController().signal)).resolves.toBe(42);
  });
});

describe("runWithRetry", () => {
  it("retries failures with growing delays until one succeeds", async () => {
    let calls = 0;
    const delays: number[] = [];
    const outcome = await runWithRetry(
      async () => {
        calls += 1;
        if (calls < 3) throw new EvaluationFailure("error", `failure ${calls}`);
        return "ok";
      },
      policy(),
      new AbortController().signal,
      ({ delayMs }) => delays.push(delayMs)
    );

    expect(outcome).toEqual({ ok: true, value: "ok", attempts: 3 });
    expect(delays).toEqual([1, 2]);
  });

  it("reports the last failure after the final attempt", async () => {
    let calls = 0;
    const outcome = await runWithRetry(
      async () => {
        calls += 1;
        throw new EvaluationFailure("malformed", `bad reply ${calls}`);
      },
      policy(),
      new AbortController().signal
    );

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(3);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(EvaluationFailure);
      expect(outcome.error.message).toBe("bad reply 3");
    }
  });

  it("wraps foreign errors as evaluation failures", async () => {
    const outcome = await runWithRetry(
      async () => {
        throw new Error("boom");
      },
      policy({ maxAttempts: 1 }),
      new AbortController().signal
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(EvaluationFailure);
      expect(outcome.error).toMatchObject({ reason: "error", message: "boom" });
    }
  });

  it("treats a timeout as a retryable failure", async () => {
    const outcome = await runWithRetry(() => never<string>(), policy({ maxAttempts: 2, timeoutMs: 10 }), new AbortController().signal);

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(2);
    if (!outcome.ok) expect(outcome.error).toMatchObject({ reason: "timeout" });
  });

  it("stops at once when the run is cancelled mid-call", async () => {
    const controller = new AbortController();
    let calls = 0;
    const outcome = await runWithRetry(
      (signal) => {
        calls += 1;
        setTimeout(() => controller.abort(), 5);
        return new Promise<string>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(signal.reason), { once: true });
        });
      },
      policy(),
      controller.signal
    );

    expect(calls).toBe(1);
    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(1);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(RunCancelled);
  });

  it("makes no attempt when the run is already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    const outcome = await runWithRetry(
      async () => {
        calls += 1;
        return "never";
      },
      policy(),
      controller.signal
    );

    expect(calls).toBe(0);
    expect(outcome).toMatchObject({ ok: false, attempts: 0 });
  });
});
