import { describe, expect, it } from "vitest";
import { RunControl } from "../src/core/run-control.js";
import { exponentialBackoff, fixedBackoff } from "../src/core/retry-policy.js";
import { withTimeout } from "../src/utils/timeout.js";
import { TimeoutError } from "../src/utils/errors.js";

describe("RunControl", () => {
  it("blocks a paused loop until resumed", async () => {
    const control = new RunControl({ maxSteps: 5 });
    control.pause();
    expect(control.isPaused()).toBe(true);

    let released = false;
    const waiting = control.waitIfPaused().then(() => {
      released = true;
    });
    await Promise.resolve();
    expect(released).toBe(false);

    control.resume();
    await waiting;
    expect(released).toBe(true);
    expect(control.snapshot().status).toBe("running");
  });

  it("releases a paused loop on stop", async () => {
    const control = new RunControl({ maxSteps: 5 });
    control.pause();
    const waiting = control.waitIfPaused();
    control.stop();
    await waiting;
    expect(control.shouldStop()).toBe(true);
  });

  it("stops when the abort signal fires", () => {
    const abort = new AbortController();
    const control = new RunControl({ maxSteps: 5, abortSignal: abort.signal });
    expect(control.shouldStop()).toBe(false);
    abort.abort();
    expect(control.shouldStop()).toBe(true);
  });

  it("wakes a paused loop whose budget is already spent", () => {
    const control = new RunControl({ maxSteps: 5, startStep: 3 });
    control.pause();
    control.updateMaxSteps(3);
    expect(control.snapshot()).toEqual({ status: "running", maxSteps: 3, currentStep: 3 });
  });

  it("ignores resume when not paused", () => {
    const control = new RunControl({ maxSteps: 5 });
    control.stop();
    control.resume();
    expect(control.snapshot().status).toBe("stopping");
  });
});

describe("retry policies", () => {
  it("fixedBackoff returns the same delay for every attempt", () => {
    const policy = fixedBackoff(5000, 5);
    expect(policy.maxAttempts).toBe(5);
    expect([1, 2, 5].map((n) => policy.delayMs(n))).toEqual([5000, 5000, 5000]);
    expect(fixedBackoff(-10, 2.7)).toMatchObject({ maxAttempts: 2 });
    expect(fixedBackoff(-10, 2).delayMs(1)).toBe(0);
  });

  it("exponentialBackoff doubles up to the cap", () => {
    const policy = exponentialBackoff({ baseDelayMs: 100, maxDelayMs: 500, maxAttempts: 4 });
    expect([1, 2, 3, 4].map((n) => policy.delayMs(n))).toEqual([100, 200, 400, 500]);
  });
});

describe("withTimeout", () => {
  it("returns the operation result when it settles in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 1000, "dump")).resolves.toBe("ok");
  });

  it("rejects with a TimeoutError when the operation hangs", async () => {
    const hang = new Promise<string>(() => {});
    const result = withTimeout(hang, 5, "dump");
    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow("dump timed out after 5ms");
  });

  it("skips the timer for non-positive limits", async () => {
    await expect(withTimeout(Promise.resolve(1), 0, "dump")).resolves.toBe(1);
  });
});
