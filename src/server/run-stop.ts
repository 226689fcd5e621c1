import type { Request, Response } from "express";
import type { ServerContext } from "./run-launcher.js";

const ACTIVE_STATUSES = new Set(["running", "paused", "stopping"]);

export function handleRunStop(ctx: ServerContext) {
  return async (req: Request, res: Response) => {
    const runId = req.params.id ?? "";
    const run = await ctx.store.getRun(runId);
    if (!run) {
      res.status(404).json({ error: `Run ${runId} not found` });
      return;
    }
    if (!ACTIVE_STATUSES.has(run.status)) {
      res.json({
        status: run.status,
        message: "Run already finished",
        endedReason: run.endedReason,
        errorMessage: run.errorMessage,
      });
      return;
    }

    if (!ctx.registry.abort(runId)) {
      res.status(409).json({ error: "Run controller not available" });
      return;
    }
    if (run.status !== "stopping") {
      await ctx.store.updateStatus(runId, "stopping");
    }
    res.json({ status: "stopping" });
  };
}
