import "dotenv/config";
import { realpathSync } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { loadConfig } from "../config/env.js";
import { createRuntime, type PilotRuntime } from "../runtime.js";
import { errorMessage } from "../utils/errors.js";
import { consoleLogger, type PilotLogger } from "../utils/logger.js";
import type { ServerContext } from "./run-launcher.js";
import { RunRegistry } from "./run-events.js";
import { RunStore } from "./run-store.js";
import { setupRoutes } from "./routes.js";

export type CreateAppOptions = {
  runtime: PilotRuntime;
  store?: RunStore;
  registry?: RunRegistry;
  logger?: PilotLogger;
  runLogs?: boolean;
};

export function createApp(opts: CreateAppOptions): { app: Express; context: ServerContext } {
  const logger = opts.logger ?? opts.runtime.logger;
  const context: ServerContext = {
    runtime: opts.runtime,
    store: opts.store ?? new RunStore(path.resolve(process.cwd(), opts.runtime.config.runDir), logger),
    registry: opts.registry ?? new RunRegistry(),
    logger,
    runLogs: opts.runLogs ?? false,
  };

  const app = express();
  app.use(
    cors({
      origin: opts.runtime.config.corsOrigin,
      credentials: true,
    })
  );
  app.use(express.json());

  setupRoutes(app, context);

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("Request failed", { error: errorMessage(error) });
    res.status(500).json({ error: errorMessage(error) });
  });

  return { app, context };
}

async function main() {
  const config = loadConfig();
  const runtime = createRuntime(config);
  const { app } = createApp({ runtime, runLogs: true });

  const server = app.listen(config.apiPort, () => {
    consoleLogger.info(`mobipilot API listening on http://localhost:${config.apiPort}`, {
      health: `/health`,
      allowedOrigin: config.corsOrigin,
    });
  });

  const shutdown = (signal: string) => {
    consoleLogger.info(`${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main().catch((error: unknown) => {
    consoleLogger.error("Server failed to start", { error: errorMessage(error) });
    process.exit(1);
  });
}
