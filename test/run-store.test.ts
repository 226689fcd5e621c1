import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TaskResult } from "../src/core/types.js";
import { RunStore } from "../src/server/run-store.js";

const result = (overrides: Partial<TaskResult> = {}): TaskResult => ({
  success: false,
  instruction: "go home",
  state: "failed",
  cancelled: false,
  stepsExecuted: 2,
  iterations: 3,
  durationMs: 1200,
  steps: [],
  ...overrides,
});

describe("RunStore", () => {
  let dir: string;
  let store: RunStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "pilot-runs-"));
    store = new RunStore(dir);
  });

  afterEach(async () => {
    vi.useRealTimers();
    await rm(dir, { recursive: true, force: true });
  });

  it("creates a running run named after its instruction", async () => {
    const run = await store.createRun({ instruction: "  go home  ", planner: "rules", maxSteps: 5 });
    expect(run).toMatchObject({ name: "go home", planner: "rules", maxSteps: 5, status: "running", events: [] });
    expect(await store.getRun(run.id)).toEqual(run);
  });

  it("keeps concurrent event appends in call order", async () => {
    const run = await store.createRun({ instruction: "go home", planner: "rules", maxSteps: 5 });
    await Promise.all([
      store.appendEvent(run.id, { type: "init", instruction: "go home", maxSteps: 5, maxIterations: 15 }),
      store.appendEvent(run.id, { type: "state", state: "planning", iteration: 1 }),
      store.appendEvent(run.id, { type: "warning", iteration: 1, message: "slow" }),
    ]);
    const stored = await store.getRun(run.id);
    expect(stored?.events.map((e) => e.type)).toEqual(["init", "state", "warning"]);
    expect(stored?.events[2]).toMatchObject({ type: "warning", iteration: 1, message: "slow" });
  });

  it("records how a run ended", async () => {
    const cancelled = await store.createRun({ instruction: "a", planner: "llm", maxSteps: 5 });
    const finished = await store.markFinished(cancelled.id, result({ cancelled: true, error: "Cancelled before completion" }));
    expect(finished).toMatchObject({
      status: "failed",
      endedReason: "cancelled",
      result: {
        success: false,
        cancelled: true,
        stepsExecuted: 2,
        iterations: 3,
        durationMs: 1200,
        error: "Cancelled before completion",
      },
    });

    const done = await store.createRun({ instruction: "b", planner: "llm", maxSteps: 5 });
    const completed = await store.markFinished(
      done.id,
      result({ success: true, state: "completed", completionReason: "Home screen showing" })
    );
    expect(completed).toMatchObject({ status: "completed", endedReason: "Home screen showing" });

    const crashed = await store.createRun({ instruction: "c", planner: "llm", maxSteps: 5 });
    expect(await store.markError(crashed.id, "adb missing")).toMatchObject({
      status: "error",
      errorMessage: "adb missing",
    });
  });

  it("returns null for missing and unreadable runs", async () => {
    expect(await store.getRun("missing")).toBeNull();
    expect(await store.updateStatus("missing", "paused")).toBeNull();
    await writeFile(path.join(dir, "broken.json"), "{not json", "utf-8");
    expect(await store.getRun("broken")).toBeNull();
  });

  it("lists runs newest first without their events", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-01T10:00:00Z"));
    const older = await store.createRun({ instruction: "older", planner: "rules", maxSteps: 5 });
    vi.setSystemTime(new Date("2026-01-01T11:00:00Z"));
    const newer = await store.createRun({ instruction: "newer", planner: "rules", maxSteps: 5 });

    const runs = await store.listRuns();

    expect(runs.map((r) => r.id)).toEqual([newer.id, older.id]);
    expect(runs[0]).not.toHaveProperty("events");
  });

  it("lists nothing when the directory does not exist", async () => {
    expect(await new RunStore(path.join(dir, "absent")).listRuns()).toEqual([]);
  });
});
