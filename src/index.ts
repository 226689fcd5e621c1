// Control loop
export {
  Orchestrator,
  DEFAULT_ORCHESTRATOR_CONFIG,
  type OrchestratorConfig,
  type OrchestratorDeps,
  type RunTaskOptions,
} from "./core/orchestrator.js";
export { RunControl, type RunControlState } from "./core/run-control.js";
export {
  fixedBackoff,
  exponentialBackoff,
  systemClock,
  sleep,
  type Clock,
  type RetryPolicy,
} from "./core/retry-policy.js";
export { collapseDigitBatch, correctStuckScroll } from "./core/transforms.js";

// Screen model and history
export { UISnapshot, buildIndex, type IndexedElement, type SnapshotOptions } from "./core/snapshot.js";
export { StepLedger, auditEntries, type Anomaly, type AuditEntry } from "./core/ledger.js";

// Type exports
export type {
  ActionKind,
  ActionOutcome,
  ActionParameters,
  CompletedStep,
  NextStepDecision,
  PilotEvent,
  PilotEventCallback,
  ProgressSink,
  ProgressUpdate,
  ProposedAction,
  RawElementRecord,
  ResolvedCommand,
  ScreenInfo,
  TaskPlan,
  TaskResult,
  UIElement,
} from "./core/types.js";

// Planning
export { DynamicPlanner, type Planner, type TaskContext } from "./agents/planner.js";
export { HeuristicPlanner } from "./agents/heuristic-planner.js";
export { parseDecision } from "./agents/decision.js";
export { buildPlannerPrompt } from "./agents/prompts.js";
export { generateTaskPlan } from "./agents/task-plan.js";
export { RecoveryEngine, type RecoveryOutcome } from "./agents/recovery.js";

// Resolution and execution
export { ActionResolver, type Resolution } from "./resolver/resolver.js";
export { KeywordMatchScorer, type MatchScorer } from "./resolver/matcher.js";
export { ActionExecutor, swipeVector } from "./executor/executor.js";

// Device and reasoning
export type { DeviceCapability } from "./device/types.js";
export { AdbDevice, listAdbDevices, type CommandRunner } from "./device/adb-device.js";
export { parseHierarchyXml } from "./device/hierarchy.js";
export type { ReasoningCapability, ReasoningTransport } from "./reasoning/types.js";
export { MastraReasoner, fromMastraAgent } from "./reasoning/mastra-reasoner.js";
export { createPilotAgents, createPilotMastra } from "./mastra/index.js";

// Wiring
export { loadConfig, type PilotConfig } from "./config/env.js";
export { createRuntime, type PilotRuntime } from "./runtime.js";

// Utility exports
export {
  initRunLogger,
  createConsoleLogger,
  consoleLogger,
  silentLogger,
  type PilotLogger,
} from "./utils/logger.js";
export * from "./utils/errors.js";
