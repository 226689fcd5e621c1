import type { Request, Response } from "express";
import type { ServerContext } from "./run-launcher.js";

const writeSse = (res: Response, event: string, data: unknown) => {
  res.write(`event: ${event}\n`);
  res.write(`data: ${JSON.stringify(data)}\n\n`);
};

export function handleRunStream(ctx: ServerContext) {
  return async (req: Request, res: Response) => {
    const runId = req.params.id ?? "";
    const run = await ctx.store.getRun(runId);

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");

    if (!run) {
      writeSse(res, "error", { type: "error", message: `Run ${runId} not found`, runId });
      res.end();
      return;
    }

    if (!ctx.registry.isActive(runId)) {
      writeSse(res, "error", { type: "error", message: `Run ${runId} is not running`, runId });
      res.end();
      return;
    }

    writeSse(res, "stream_open", { runId });

    const unsubscribe = ctx.registry.subscribe(runId, (event) => {
      writeSse(res, event.type, event);
      if (event.type === "done" || event.type === "error") {
        unsubscribe();
        res.end();
      }
    });

    res.on("close", () => {
      unsubscribe();
    });
  };
}
