import { HeuristicPlanner } from "./agents/heuristic-planner.js";
import { DynamicPlanner, type Planner } from "./agents/planner.js";
import { RecoveryEngine } from "./agents/recovery.js";
import type { PilotConfig, PlannerMode } from "./config/env.js";
import { Orchestrator } from "./core/orchestrator.js";
import type { Clock } from "./core/retry-policy.js";
import { fixedBackoff, systemClock } from "./core/retry-policy.js";
import { AdbDevice } from "./device/adb-device.js";
import type { DeviceCapability } from "./device/types.js";
import { ActionExecutor } from "./executor/executor.js";
import { createPilotMastra } from "./mastra/index.js";
import { MastraReasoner, fromMastraAgent } from "./reasoning/mastra-reasoner.js";
import type { ReasoningCapability, ReasoningTransport } from "./reasoning/types.js";
import { ActionResolver } from "./resolver/resolver.js";
import type { PilotLogger } from "./utils/logger.js";
import { consoleLogger } from "./utils/logger.js";

export type ReasoningSet = {
  planner: ReasoningCapability;
  taskPlan: ReasoningCapability;
  recovery: ReasoningCapability;
};

export type RuntimeOverrides = {
  device?: DeviceCapability;
  reasoning?: ReasoningSet;
  clock?: Clock;
  logger?: PilotLogger;
};

export type OrchestratorOverrides = {
  planner?: PlannerMode;
  visionEnabled?: boolean;
  planFirst?: boolean;
  logger?: PilotLogger;
};

export type PilotRuntime = {
  config: PilotConfig;
  device: DeviceCapability;
  logger: PilotLogger;
  createOrchestrator(overrides?: OrchestratorOverrides): Orchestrator;
};

/**
 * Wires configuration into concrete components. Mastra agents are only built
 * the first time an LLM-backed orchestrator is requested.
 */
export function createRuntime(config: PilotConfig, overrides: RuntimeOverrides = {}): PilotRuntime {
  const logger = overrides.logger ?? consoleLogger;
  const clock = overrides.clock ?? systemClock;
  const device =
    overrides.device ??
    new AdbDevice({
      serial: config.adbSerial,
      adbPath: config.adbPath,
      commandTimeoutMs: config.timeouts.actionMs,
      logger,
    });

  let reasoning = overrides.reasoning;
  const reasoningSet = (): ReasoningSet => {
    if (!reasoning) {
      const mastra = createPilotMastra(config.model);
      const wrap = (label: string, transport: ReasoningTransport) =>
        new MastraReasoner(transport, {
          timeoutMs: config.timeouts.reasoningMs,
          retryPolicy: fixedBackoff(2000, config.reasoningRetries),
          clock,
          logger,
          label,
        });
      reasoning = {
        planner: wrap("planner", fromMastraAgent(mastra.getAgent("plannerAgent"))),
        taskPlan: wrap("task plan", fromMastraAgent(mastra.getAgent("taskPlanAgent"))),
        recovery: wrap("recovery", fromMastraAgent(mastra.getAgent("recoveryAgent"))),
      };
    }
    return reasoning;
  };

  const createOrchestrator = (opts: OrchestratorOverrides = {}) => {
    const runLogger = opts.logger ?? logger;
    const mode = opts.planner ?? config.planner;
    const visionEnabled = opts.visionEnabled ?? config.visionEnabled;
    const llm = mode === "llm" ? reasoningSet() : undefined;

    const planner: Planner = llm
      ? new DynamicPlanner({
          reasoning: llm.planner,
          visionEnabled,
          homeScreenMarkers: config.homeScreenMarkers,
          logger: runLogger,
        })
      : new HeuristicPlanner({ homeScreenMarkers: config.homeScreenMarkers });

    const executor = new ActionExecutor({
      clock,
      settleDelayMs: config.settleDelayMs,
      timeoutMs: config.timeouts.actionMs,
      logger: runLogger,
    });

    const recovery = config.recovery.enabled
      ? new RecoveryEngine({
          executor,
          reasoning: llm?.recovery,
          useReasoning: config.recovery.useReasoning,
          maxAttemptsPerTarget: config.recovery.maxAttemptsPerTarget,
          logger: runLogger,
        })
      : undefined;

    return new Orchestrator({
      device,
      planner,
      resolver: new ActionResolver({ safeTopMargin: config.safeTopMargin }),
      executor,
      recovery,
      reasoning: llm?.taskPlan,
      retryPolicy: fixedBackoff(config.plannerBackoffMs, config.plannerMaxRetries),
      clock,
      logger: runLogger,
      config: {
        maxSteps: config.maxSteps,
        maxIterations: config.maxIterations,
        captureTimeoutMs: config.timeouts.captureMs,
        batchSettleDelayMs: config.batchSettleDelayMs,
        postBatchDelayMs: config.settleDelayMs,
        visionEnabled,
        planFirst: opts.planFirst ?? (llm ? config.planFirst : false),
        overlayDenylist: config.overlayDenylist,
      },
    });
  };

  return { config, device, logger, createOrchestrator };
}
