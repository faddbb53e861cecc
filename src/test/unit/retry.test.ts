import assert from "node:assert/strict";
import test, { describe, mock } from "node:test";

import { AbortError } from "../../rag/errors.js";
import { TimeoutError, delayWithAbort, runWithRetry, withTimeout } from "../../rag/retry.js";

class Flaky extends Error {}

describe("runWithRetry", () => {
  test("retries until a step succeeds", async () => {
    let calls = 0;
    const delays: number[] = [];
    const result = await runWithRetry({
      runStep: async (attempt) => {
        calls++;
        if (attempt < 3) throw new Flaky("not yet");
        return "done";
      },
      isRetryableError: (err) => err instanceof Flaky,
      maxAttempts: 4,
      baseDelayMs: 50,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    assert.equal(result, "done");
    assert.equal(calls, 3);
    assert.deepEqual(delays, [50, 100]);
  });

  test("rethrows non-retryable errors immediately", async () => {
    const runStep = mock.fn(async () => {
      throw new Error("fatal");
    });
    await assert.rejects(
      runWithRetry({
        runStep,
        isRetryableError: (err) => err instanceof Flaky,
        maxAttempts: 4,
        baseDelayMs: 1,
        sleep: async () => undefined,
      }),
      { message: "fatal" },
    );
    assert.equal(runStep.mock.calls.length, 1);
  });

  test("rethrows the last error once attempts run out", async () => {
    const onRetry = mock.fn();
    const runStep = mock.fn(async (attempt: number) => {
      throw new Flaky(`attempt ${attempt}`);
    });
    await assert.rejects(
      runWithRetry({
        runStep,
        isRetryableError: () => true,
        maxAttempts: 3,
        baseDelayMs: 1,
        sleep: async () => undefined,
        onRetry,
      }),
      { message: "attempt 3" },
    );
    assert.equal(runStep.mock.calls.length, 3);
    assert.equal(onRetry.mock.calls.length, 2);
  });

  test("stops retrying on abort", async () => {
    const controller = new AbortController();
    const runStep = mock.fn(async () => {
      throw new Flaky("busy");
    });

    await assert.rejects(
      runWithRetry({
        runStep,
        isRetryableError: () => true,
        maxAttempts: 5,
        baseDelayMs: 1,
        signal: controller.signal,
        sleep: async () => undefined,
        onRetry: () => controller.abort(),
      }),
      AbortError,
    );
    assert.equal(runStep.mock.calls.length, 1);
  });
});

test("delayWithAbort rejects when the signal fires", async () => {
  const controller = new AbortController();
  const pending = delayWithAbort(10_000, controller.signal);
  controller.abort();
  await assert.rejects(pending, AbortError);
});

describe("withTimeout", () => {
  const hang = (signal: AbortSignal) =>
    new Promise<string>((_resolve, reject) => {
      signal.addEventListener("abort", () => reject(new Error("signal aborted")));
    });

  test("returns the result when it arrives in time", async () => {
    assert.equal(await withTimeout(1000, undefined, async () => "ok"), "ok");
  });

  test("surfaces an expired deadline as TimeoutError", async () => {
    await assert.rejects(withTimeout(5, undefined, hang), (err: unknown) => {
      assert.ok(err instanceof TimeoutError);
      assert.equal(err.message, "timed out after 5ms");
      return true;
    });
  });

  test("surfaces a parent abort as AbortError", async () => {
    const controller = new AbortController();
    const pending = withTimeout(10_000, controller.signal, hang);
    controller.abort();
    await assert.rejects(pending, AbortError);
  });
});
