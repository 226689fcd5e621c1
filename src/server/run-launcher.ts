import type { PlannerMode } from "../config/env.js";
import { RunControl } from "../core/run-control.js";
import type { PilotEvent, TaskResult } from "../core/types.js";
import type { PilotRuntime } from "../runtime.js";
import { errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { initRunLogger } from "../utils/logger.js";
import type { RunRegistry } from "./run-events.js";
import type { RunStore } from "./run-store.js";

export type ServerContext = {
  runtime: PilotRuntime;
  store: RunStore;
  registry: RunRegistry;
  logger: PilotLogger;
  /** Write a JSONL log per run under the configured log directory. */
  runLogs?: boolean;
};

export type LaunchRunOptions = {
  runId: string;
  instruction: string;
  maxSteps: number;
  planner: PlannerMode;
};

export function deviceKey(ctx: ServerContext) {
  return ctx.runtime.config.adbSerial ?? "default";
}

/**
 * Runs one task to completion on behalf of the API. The caller must have
 * claimed the device for `runId`; it is released here when the run ends.
 */
export async function launchRunExecution(
  ctx: ServerContext,
  options: LaunchRunOptions
): Promise<TaskResult | null> {
  const { runId, instruction, maxSteps, planner } = options;
  const { store, registry } = ctx;

  const controller = new AbortController();
  const control = new RunControl({ maxSteps, abortSignal: controller.signal });
  registry.register(runId, controller, control);

  const fileLogger = ctx.runLogs
    ? initRunLogger({ logDir: ctx.runtime.config.logDir, runLabel: runId, mirror: ctx.logger })
    : null;
  const runLogger = fileLogger ?? ctx.logger;

  const forwardEvent = (event: PilotEvent) => {
    store.appendEvent(runId, event).catch((error: unknown) => {
      ctx.logger.warn("Failed to persist run event", { runId, type: event.type, error: errorMessage(error) });
    });
    registry.emit(runId, event);
  };

  try {
    const orchestrator = ctx.runtime.createOrchestrator({ planner, logger: runLogger });
    const result = await orchestrator.runTask(instruction, {
      runId,
      maxSteps,
      control,
      onEvent: forwardEvent,
    });
    await store.markFinished(runId, result);
    return result;
  } catch (error) {
    const message = errorMessage(error);
    ctx.logger.error("Run crashed", { runId, error });
    await store.markError(runId, message);
    registry.emit(runId, { type: "error", message });
    return null;
  } finally {
    registry.release(runId);
    fileLogger?.close();
  }
}
