import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { PLANNER_MODES } from "../config/env.js";
import { errorMessage } from "../utils/errors.js";
import { deviceKey, launchRunExecution, type ServerContext } from "./run-launcher.js";
import { handleRunStop } from "./run-stop.js";
import { handleRunStream } from "./run-stream.js";

const StartRunSchema = z.object({
  instruction: z.string().trim().min(1),
  maxSteps: z.coerce.number().int().positive().optional(),
  planner: z.enum(PLANNER_MODES).optional(),
  name: z.string().optional(),
});

const BudgetSchema = z.object({
  maxSteps: z.coerce.number().int().positive(),
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncRoute =
  (handler: AsyncHandler): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

export function setupRoutes(app: Express, ctx: ServerContext) {
  const { store, registry, runtime, logger } = ctx;

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.post(
    "/api/runs",
    asyncRoute(async (req, res) => {
      const parsed = StartRunSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: "Invalid run request", issues: parsed.error.issues });
        return;
      }
      const { instruction, name } = parsed.data;
      const maxSteps = parsed.data.maxSteps ?? runtime.config.maxSteps;
      const planner = parsed.data.planner ?? runtime.config.planner;

      const owner = registry.deviceOwner(deviceKey(ctx));
      if (owner) {
        res.status(409).json({ error: "Device is busy with another run", runId: owner });
        return;
      }

      const run = await store.createRun({ instruction, maxSteps, planner, name });
      if (!registry.claimDevice(deviceKey(ctx), run.id)) {
        await store.markError(run.id, "Device is busy with another run");
        res.status(409).json({ error: "Device is busy with another run" });
        return;
      }

      res.status(202).json({ runId: run.id, status: run.status });
      launchRunExecution(ctx, { runId: run.id, instruction, maxSteps, planner }).catch((error: unknown) => {
        logger.error("Run launch failed", { runId: run.id, error: errorMessage(error) });
      });
    })
  );

  app.get(
    "/api/runs",
    asyncRoute(async (_req, res) => {
      res.json({ runs: await store.listRuns() });
    })
  );

  app.get(
    "/api/runs/:id",
    asyncRoute(async (req, res) => {
      const run = await store.getRun(req.params.id ?? "");
      if (!run) {
        res.status(404).json({ error: `Run ${req.params.id} not found` });
        return;
      }
      res.json(run);
    })
  );

  app.get("/api/runs/:id/stream", asyncRoute(handleRunStream(ctx)));
  app.post("/api/runs/:id/stop", asyncRoute(handleRunStop(ctx)));

  app.post(
    "/api/runs/:id/pause",
    asyncRoute(async (req, res) => {
      const runId = req.params.id ?? "";
      const run = await store.getRun(runId);
      if (!run) {
        res.status(404).json({ error: `Run ${runId} not found` });
        return;
      }
      if (run.status !== "running") {
        res.status(400).json({ error: "Run is not running" });
        return;
      }
      if (!registry.pause(runId)) {
        res.status(409).json({ error: "Run controller not available" });
        return;
      }
      await store.updateStatus(runId, "paused");
      res.json({ status: "paused" });
    })
  );

  app.post(
    "/api/runs/:id/resume",
    asyncRoute(async (req, res) => {
      const runId = req.params.id ?? "";
      const run = await store.getRun(runId);
      if (!run) {
        res.status(404).json({ error: `Run ${runId} not found` });
        return;
      }
      if (run.status !== "paused") {
        res.status(400).json({ error: "Run is not paused" });
        return;
      }
      if (!registry.resume(runId)) {
        res.status(409).json({ error: "Run controller not available" });
        return;
      }
      await store.updateStatus(runId, "running");
      res.json({ status: "running" });
    })
  );

  app.post(
    "/api/runs/:id/budget",
    asyncRoute(async (req, res) => {
      const runId = req.params.id ?? "";
      const parsed = BudgetSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: "Invalid maxSteps" });
        return;
      }
      const { maxSteps } = parsed.data;
      if (!registry.setBudget(runId, maxSteps)) {
        res.status(404).json({ error: "Run controller not available" });
        return;
      }
      await store.updateMaxSteps(runId, maxSteps);
      res.json({ runId, maxSteps });
    })
  );

  app.get(
    "/api/elements",
    asyncRoute(async (_req, res) => {
      const orchestrator = runtime.createOrchestrator({ planner: "rules" });
      const snapshot = await orchestrator.captureSnapshot(false);
      res.json({
        count: snapshot.size,
        elements: snapshot.indexed.map((entry) => ({
          index: entry.index,
          name: entry.displayName,
          className: entry.element.className,
          clickable: entry.element.clickable,
          center: entry.element.center,
          bounds: entry.element.bounds,
        })),
      });
    })
  );
}
