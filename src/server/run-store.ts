import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { PLANNER_MODES, type PlannerMode } from "../config/env.js";
import type { PilotEvent, TaskResult } from "../core/types.js";
import { errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";

export const RUN_STATUSES = ["running", "paused", "stopping", "completed", "failed", "error"] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

const StoredEventSchema = z.object({ type: z.string(), timestamp: z.string() }).passthrough();

const ResultSummarySchema = z.object({
  success: z.boolean(),
  cancelled: z.boolean(),
  stepsExecuted: z.number(),
  iterations: z.number(),
  durationMs: z.number(),
  error: z.string().optional(),
  completionReason: z.string().optional(),
});

const StoredRunSchema = z.object({
  id: z.string(),
  name: z.string(),
  instruction: z.string(),
  planner: z.enum(PLANNER_MODES),
  maxSteps: z.number(),
  status: z.enum(RUN_STATUSES),
  createdAt: z.string(),
  updatedAt: z.string(),
  endedReason: z.string().optional(),
  errorMessage: z.string().optional(),
  result: ResultSummarySchema.optional(),
  events: z.array(StoredEventSchema).default([]),
});

export type StoredRunEvent = z.infer<typeof StoredEventSchema>;
export type RunResultSummary = z.infer<typeof ResultSummarySchema>;
export type StoredRun = z.infer<typeof StoredRunSchema>;
export type RunSummary = Omit<StoredRun, "events">;

export type CreateRunOptions = {
  instruction: string;
  planner: PlannerMode;
  maxSteps: number;
  name?: string;
};

const serialize = (value: unknown) => JSON.stringify(value, null, 2);

export function summarizeResult(result: TaskResult): RunResultSummary {
  const summary: RunResultSummary = {
    success: result.success,
    cancelled: result.cancelled,
    stepsExecuted: result.stepsExecuted,
    iterations: result.iterations,
    durationMs: result.durationMs,
  };
  if (result.error) summary.error = result.error;
  if (result.completionReason) summary.completionReason = result.completionReason;
  return summary;
}

/**
 * One JSON file per run. Writes to the same run are serialized through a
 * per-run promise chain so concurrent event appends never interleave.
 */
export class RunStore {
  private readonly baseDir: string;
  private readonly logger: PilotLogger;
  private readonly runLocks = new Map<string, Promise<void>>();

  constructor(baseDir: string, logger: PilotLogger = silentLogger) {
    this.baseDir = baseDir;
    this.logger = logger;
  }

  private async ensureDir() {
    await mkdir(this.baseDir, { recursive: true });
  }

  private filePath(id: string) {
    return path.join(this.baseDir, `${id}.json`);
  }

  private async readRunFile(id: string): Promise<StoredRun | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(id), "utf-8");
    } catch (error) {
      this.logger.debug("Run file not readable", { id, error: errorMessage(error) });
      return null;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("Run file is not valid JSON", { id, error: errorMessage(error) });
      return null;
    }
    const parsed = StoredRunSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn("Run file does not match the run schema", { id, issues: parsed.error.issues });
      return null;
    }
    return parsed.data;
  }

  private async writeRunFile(run: StoredRun) {
    await this.ensureDir();
    await writeFile(this.filePath(run.id), serialize(run), "utf-8");
  }

  private async withRunLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.runLocks.get(id) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.runLocks.set(id, tail);
    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.runLocks.get(id) === tail) {
        this.runLocks.delete(id);
      }
    }
  }

  private async update(id: string, mutate: (run: StoredRun) => void): Promise<StoredRun | null> {
    return this.withRunLock(id, async () => {
      const run = await this.readRunFile(id);
      if (!run) return null;
      mutate(run);
      run.updatedAt = new Date().toISOString();
      await this.writeRunFile(run);
      return run;
    });
  }

  async createRun(opts: CreateRunOptions): Promise<StoredRun> {
    const id = randomUUID();
    const now = new Date().toISOString();
    const run: StoredRun = {
      id,
      name: opts.name?.trim() || opts.instruction.trim().slice(0, 60) || `Run ${now}`,
      instruction: opts.instruction,
      planner: opts.planner,
      maxSteps: opts.maxSteps,
      status: "running",
      createdAt: now,
      updatedAt: now,
      events: [],
    };
    await this.writeRunFile(run);
    return run;
  }

  async appendEvent(id: string, event: PilotEvent) {
    await this.update(id, (run) => {
      run.events.push({ ...event, timestamp: new Date().toISOString() });
    });
  }

  async updateStatus(id: string, status: RunStatus) {
    return this.update(id, (run) => {
      run.status = status;
    });
  }

  async updateMaxSteps(id: string, maxSteps: number) {
    return this.update(id, (run) => {
      run.maxSteps = maxSteps;
    });
  }

  async markFinished(id: string, result: TaskResult) {
    return this.update(id, (run) => {
      run.status = result.success ? "completed" : "failed";
      run.result = summarizeResult(result);
      run.endedReason = result.cancelled
        ? "cancelled"
        : result.success
          ? result.completionReason ?? "completed"
          : result.error;
    });
  }

  async markError(id: string, message: string) {
    return this.update(id, (run) => {
      run.status = "error";
      run.errorMessage = message;
    });
  }

  async getRun(id: string): Promise<StoredRun | null> {
    return this.withRunLock(id, () => this.readRunFile(id));
  }

  async listRuns(): Promise<RunSummary[]> {
    let files: string[];
    try {
      files = await readdir(this.baseDir);
    } catch (error) {
      this.logger.debug("Run directory not readable", { error: errorMessage(error) });
      return [];
    }
    const runs: RunSummary[] = [];
    for (const file of files) {
      if (!file.endsWith(".json")) continue;
      const id = path.basename(file, ".json");
      const run = await this.getRun(id);
      if (run) {
        const { events: _events, ...summary } = run;
        runs.push(summary);
      }
    }
    return runs.sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
  }
}
