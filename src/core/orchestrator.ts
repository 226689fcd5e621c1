import { randomUUID } from "node:crypto";
import type { Planner } from "../agents/planner.js";
import type { RecoveryEngine } from "../agents/recovery.js";
import { generateTaskPlan } from "../agents/task-plan.js";
import type { DeviceCapability } from "../device/types.js";
import { ActionExecutor } from "../executor/executor.js";
import type { ReasoningCapability } from "../reasoning/types.js";
import { ActionResolver, describeTarget } from "../resolver/resolver.js";
import { errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { StepLedger, type StepInput } from "./ledger.js";
import type { Clock, RetryPolicy } from "./retry-policy.js";
import { fixedBackoff, systemClock } from "./retry-policy.js";
import type { RunControl } from "./run-control.js";
import { DEFAULT_OVERLAY_DENYLIST, UISnapshot } from "./snapshot.js";
import { collapseDigitBatch, correctStuckScroll, withSwipeDirections } from "./transforms.js";
import type {
  ActionOutcome,
  PilotEvent,
  PilotEventCallback,
  ProgressSink,
  ProgressUpdate,
  ProposedAction,
  RawElementRecord,
  ResolvedCommand,
  RunState,
  ScreenInfo,
  TaskPlan,
  TaskResult,
} from "./types.js";
import { decisionActions } from "./types.js";

export type OrchestratorConfig = {
  maxSteps: number;
  maxIterations: number;
  maxConsecutiveFailures: number;
  noChangeWarningThreshold: number;
  captureTimeoutMs: number;
  batchSettleDelayMs: number;
  postBatchDelayMs: number;
  visionEnabled: boolean;
  planFirst: boolean;
  overlayDenylist: readonly string[];
};

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxSteps: 20,
  maxIterations: 60,
  maxConsecutiveFailures: 3,
  noChangeWarningThreshold: 3,
  captureTimeoutMs: 5000,
  batchSettleDelayMs: 100,
  postBatchDelayMs: 300,
  visionEnabled: true,
  planFirst: false,
  overlayDenylist: DEFAULT_OVERLAY_DENYLIST,
};

export type OrchestratorDeps = {
  device: DeviceCapability;
  planner: Planner;
  resolver?: ActionResolver;
  executor?: ActionExecutor;
  recovery?: RecoveryEngine;
  /** Only used for the optional up-front task plan. */
  reasoning?: ReasoningCapability;
  /** Backoff after a confidence-0 planner result. */
  retryPolicy?: RetryPolicy;
  /** Backoff when the device link drops mid-action. */
  actionRetryPolicy?: RetryPolicy;
  clock?: Clock;
  logger?: PilotLogger;
  config?: Partial<OrchestratorConfig>;
};

export type RunTaskOptions = {
  runId?: string;
  maxSteps?: number;
  planFirst?: boolean;
  taskPlan?: TaskPlan;
  /** Polled once at the top of every iteration. */
  shouldStop?: () => boolean;
  control?: RunControl;
  onEvent?: PilotEventCallback;
  progress?: ProgressSink;
};

export type TaskRun = {
  id: string;
  instruction: string;
  taskPlan?: TaskPlan;
  ledger: StepLedger;
  state: RunState;
  stepCount: number;
  iterations: number;
};

type PendingStep = { -readonly [K in keyof Omit<StepInput, "uiAfter" | "uiChanged">]: Omit<StepInput, "uiAfter" | "uiChanged">[K] };

type Finish = {
  success: boolean;
  error?: string;
  cancelled?: boolean;
  completionReason?: string;
};

const sameNames = (a: readonly string[], b: readonly string[]) => {
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return b.every((name) => set.has(name));
};

/**
 * Drives one instruction to completion: snapshot → plan → resolve → execute →
 * record → evaluate, re-planning after every executed batch. Every failure in
 * the loop body ends as a failed {@link TaskResult}; nothing is thrown.
 */
export class Orchestrator {
  private readonly device: DeviceCapability;
  private readonly planner: Planner;
  private readonly resolver: ActionResolver;
  private readonly executor: ActionExecutor;
  private readonly recovery?: RecoveryEngine;
  private readonly reasoning?: ReasoningCapability;
  private readonly retryPolicy: RetryPolicy;
  private readonly actionRetryPolicy: RetryPolicy;
  private readonly clock: Clock;
  private readonly logger: PilotLogger;
  private readonly config: OrchestratorConfig;
  private screenCache?: ScreenInfo;

  constructor(deps: OrchestratorDeps) {
    this.device = deps.device;
    this.planner = deps.planner;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
    this.resolver = deps.resolver ?? new ActionResolver();
    this.executor = deps.executor ?? new ActionExecutor({ clock: this.clock, logger: this.logger });
    this.recovery = deps.recovery;
    this.reasoning = deps.reasoning;
    this.retryPolicy = deps.retryPolicy ?? fixedBackoff(5000, 5);
    this.actionRetryPolicy = deps.actionRetryPolicy ?? fixedBackoff(1000, 2);
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...deps.config };
  }

  async runTask(instruction: string, options: RunTaskOptions = {}): Promise<TaskResult> {
    const startedAt = this.clock.now();
    const run: TaskRun = {
      id: options.runId ?? randomUUID(),
      instruction,
      taskPlan: options.taskPlan,
      ledger: new StepLedger(),
      state: "idle",
      stepCount: 0,
      iterations: 0,
    };
    const { control, onEvent, progress } = options;
    const emit = (event: PilotEvent) => this.emit(onEvent, event);
    const setState = (state: RunState) => {
      run.state = state;
      emit({ type: "state", state, iteration: run.iterations });
    };
    const budget = () => control?.getMaxSteps() ?? options.maxSteps ?? this.config.maxSteps;

    const finish = (outcome: Finish): TaskResult => {
      run.state = outcome.success ? "completed" : "failed";
      const result: TaskResult = {
        success: outcome.success,
        instruction,
        state: outcome.success ? "completed" : "failed",
        cancelled: outcome.cancelled ?? false,
        stepsExecuted: run.stepCount,
        iterations: run.iterations,
        durationMs: this.clock.now() - startedAt,
        steps: [...run.ledger.all()],
        taskPlan: run.taskPlan,
      };
      if (outcome.error) result.error = outcome.error;
      if (outcome.completionReason) result.completionReason = outcome.completionReason;
      const summary = {
        runId: run.id,
        cancelled: result.cancelled,
        stepsExecuted: result.stepsExecuted,
        iterations: result.iterations,
        error: result.error,
      };
      if (outcome.success) this.logger.info("Task completed", summary);
      else this.logger.warn("Task failed", summary);
      emit({ type: "done", result });
      return result;
    };

    this.logger.info("Task started", { runId: run.id, instruction, maxSteps: budget() });
    emit({ type: "init", instruction, maxSteps: budget(), maxIterations: this.config.maxIterations });
    this.recovery?.reset();

    let reasoningFailures = 0;

    try {
      const planFirst = options.planFirst ?? this.config.planFirst;
      if (planFirst && !run.taskPlan && this.reasoning) {
        setState("planning");
        const initial = await this.captureSnapshot(false);
        run.taskPlan = await generateTaskPlan(this.reasoning, instruction, initial, this.logger);
        emit({ type: "task_plan", plan: run.taskPlan });
      }

      while (true) {
        if (this.stopRequested(options)) {
          return finish({ success: false, cancelled: true, error: "Cancelled before completion" });
        }
        if (control?.isPaused()) {
          this.logger.info("Run paused", { runId: run.id });
          await control.waitIfPaused();
          if (this.stopRequested(options)) {
            return finish({ success: false, cancelled: true, error: "Cancelled before completion" });
          }
        }

        const maxSteps = budget();
        if (run.stepCount >= maxSteps) {
          return finish({ success: false, error: `Step budget exhausted (${maxSteps} steps)` });
        }
        if (run.iterations >= this.config.maxIterations) {
          return finish({
            success: false,
            error: `Iteration budget exhausted (${this.config.maxIterations} iterations)`,
          });
        }
        run.iterations += 1;
        const iteration = run.iterations;

        setState("planning");
        const snapshot = await this.captureSnapshot(this.config.visionEnabled);
        emit({ type: "snapshot", iteration, elementCount: snapshot.size, names: snapshot.elementNames() });

        const decision = await this.planner.plan(
          { instruction, taskPlan: run.taskPlan },
          snapshot,
          run.ledger
        );
        emit({ type: "decision", iteration, decision });

        if (decision.type === "task_complete") {
          return finish({ success: true, completionReason: decision.reason });
        }

        if (decision.type === "no_op") {
          if (decision.confidence === 0) {
            reasoningFailures += 1;
            if (reasoningFailures > this.retryPolicy.maxAttempts) {
              return finish({
                success: false,
                error: `Planner failed ${reasoningFailures} times in a row: ${decision.reason}`,
              });
            }
            const delayMs = this.retryPolicy.delayMs(reasoningFailures);
            this.logger.warn("Planner could not decide, backing off", {
              attempt: reasoningFailures,
              delayMs,
              reason: decision.reason,
            });
            emit({ type: "backoff", iteration, attempt: reasoningFailures, delayMs, reason: decision.reason });
            await this.clock.sleep(delayMs);
          } else {
            reasoningFailures = 0;
            this.logger.info("Planner proposed no action", { reason: decision.reason });
          }
          continue;
        }
        reasoningFailures = 0;

        let actions = withSwipeDirections(decisionActions(decision));
        const collapsed = collapseDigitBatch(actions, snapshot, run.ledger);
        if (collapsed.collapsedDigits !== null) {
          this.logger.info("Digit taps collapsed into text input", { digits: collapsed.collapsedDigits });
          actions = collapsed.actions;
        }
        const scroll = correctStuckScroll(actions, run.ledger);
        if (scroll.correction) {
          this.logger.warn("Stuck scroll detected, forcing opposite direction", scroll.correction);
          emit({
            type: "warning",
            iteration,
            message: `Scrolling ${scroll.correction.stuck} had no effect; forcing ${scroll.correction.forced}`,
          });
          actions = scroll.actions;
        }

        setState("executing");
        const namesBefore = snapshot.elementNames();
        const pending = await this.executeBatch(actions, snapshot, run, {
          instruction,
          maxSteps,
          progress,
          emit,
          iteration,
        });

        await this.clock.sleep(this.config.postBatchDelayMs);
        const namesAfter = await this.captureNames(namesBefore);
        const uiChanged = !sameNames(namesBefore, namesAfter);

        setState("recording");
        for (const step of pending) {
          const record = run.ledger.append({ ...step, uiAfter: namesAfter, uiChanged });
          emit({ type: "step", step: record });
        }
        control?.setCurrentStep(run.stepCount);

        const failures = run.ledger.consecutiveFailures();
        if (failures >= this.config.maxConsecutiveFailures) {
          const reasons = run.ledger.lastFailureReasons(this.config.maxConsecutiveFailures);
          return finish({
            success: false,
            error: `${failures} consecutive failed steps: ${reasons.join("; ")}`,
          });
        }

        const unchanged = run.ledger.consecutiveNoChange();
        if (unchanged >= this.config.noChangeWarningThreshold) {
          const message = `${unchanged} consecutive steps left the screen unchanged`;
          this.logger.warn(message, { runId: run.id });
          emit({ type: "warning", iteration, message });
        }
      }
    } catch (error) {
      this.logger.error("Task loop crashed", { runId: run.id, error });
      emit({ type: "error", message: errorMessage(error) });
      return finish({ success: false, error: `Unexpected error: ${errorMessage(error)}` });
    }
  }

  /** Fresh snapshot; each device call has its own timeout and a failure only empties that part. */
  async captureSnapshot(includeScreenshot = this.config.visionEnabled): Promise<UISnapshot> {
    const timeoutMs = this.config.captureTimeoutMs;
    let records: RawElementRecord[] = [];
    try {
      records = await withTimeout(this.device.dumpUIHierarchy(), timeoutMs, "UI hierarchy dump");
    } catch (error) {
      this.logger.warn("UI hierarchy capture failed, continuing with an empty snapshot", {
        error: errorMessage(error),
      });
    }

    try {
      this.screenCache = await withTimeout(this.device.screenInfo(), timeoutMs, "screen info");
    } catch (error) {
      this.logger.warn("Screen info unavailable", { error: errorMessage(error) });
    }

    let screenshot: Uint8Array | undefined;
    if (includeScreenshot) {
      try {
        screenshot = await withTimeout(this.device.screenshot(), timeoutMs, "screenshot");
      } catch (error) {
        this.logger.warn("Screenshot capture failed", { error: errorMessage(error) });
      }
    }

    return UISnapshot.capture(records, {
      overlayDenylist: this.config.overlayDenylist,
      screenshot,
      screen: this.screenCache,
      capturedAt: this.clock.now(),
    });
  }

  private async captureNames(fallback: string[]): Promise<string[]> {
    try {
      const records = await withTimeout(
        this.device.dumpUIHierarchy(),
        this.config.captureTimeoutMs,
        "UI hierarchy dump"
      );
      return UISnapshot.capture(records, { overlayDenylist: this.config.overlayDenylist }).elementNames();
    } catch (error) {
      this.logger.warn("Post-action capture failed; treating the screen as unchanged", {
        error: errorMessage(error),
      });
      return fallback;
    }
  }

  private async executeBatch(
    actions: ProposedAction[],
    snapshot: UISnapshot,
    run: TaskRun,
    ctx: {
      instruction: string;
      maxSteps: number;
      iteration: number;
      progress?: ProgressSink;
      emit: (event: PilotEvent) => void;
    }
  ): Promise<PendingStep[]> {
    const pending: PendingStep[] = [];
    const namesBefore = snapshot.elementNames();

    for (const [position, action] of actions.entries()) {
      if (run.stepCount >= ctx.maxSteps) {
        this.logger.warn("Step budget reached inside a batch", { skipped: actions.length - position });
        break;
      }

      this.notifyProgress(ctx.progress, {
        stepIndex: run.stepCount + 1,
        totalSteps: ctx.maxSteps,
        action: action.kind,
        description: action.description,
        target: describeTarget(action),
      });

      const startedAt = this.clock.now();
      const resolution = this.resolver.resolve(action, snapshot);
      let outcome: ActionOutcome;
      let retryCount = 0;
      if (resolution.ok) {
        ({ outcome, retryCount } = await this.executeWithRetry(resolution.command, snapshot.screen));
      } else {
        outcome = { success: false, error: resolution.reason, needsRecovery: true, errorKind: "resolution" };
      }
      run.stepCount += 1;

      const step: PendingStep = {
        action: action.kind,
        target: resolution.target,
        description: action.description,
        parameters: action.parameters,
        success: outcome.success,
        uiBefore: namesBefore,
        retryCount,
        durationMs: this.clock.now() - startedAt,
        recovery: false,
      };
      if (outcome.error) step.error = outcome.error;
      pending.push(step);

      if (outcome.success) {
        if (position < actions.length - 1) {
          await this.clock.sleep(this.config.batchSettleDelayMs);
        }
        continue;
      }

      this.logger.warn("Step failed", { action: action.kind, target: resolution.target, error: outcome.error });
      if (outcome.needsRecovery && this.recovery) {
        const recovered = await this.recovery.recover(
          {
            instruction: ctx.instruction,
            target: resolution.target,
            action: action.kind,
            description: action.description,
            error: outcome.error ?? "unknown error",
          },
          snapshot,
          this.device
        );
        ctx.emit({
          type: "recovery",
          iteration: ctx.iteration,
          target: resolution.target,
          strategy: recovered.strategy,
          recovered: recovered.state === "recovered",
          reason: recovered.reason,
        });
        if (recovered.state === "exhausted") {
          step.error = `${step.error ?? "failed"} (recovery exhausted: ${recovered.reason})`;
        }
        for (const maneuver of recovered.maneuvers) {
          const entry: PendingStep = {
            action: maneuver.action,
            target: maneuver.target,
            description: `Recovery ${recovered.strategy} for ${resolution.target}`,
            parameters: maneuver.parameters,
            success: maneuver.outcome.success,
            uiBefore: namesBefore,
            retryCount: 0,
            durationMs: 0,
            recovery: true,
          };
          if (maneuver.outcome.error) entry.error = maneuver.outcome.error;
          pending.push(entry);
        }
      }
      // The rest of the batch was planned against a screen that no longer holds.
      break;
    }

    return pending;
  }

  private async executeWithRetry(
    command: ResolvedCommand,
    screen: ScreenInfo | undefined
  ): Promise<{ outcome: ActionOutcome; retryCount: number }> {
    let retryCount = 0;
    let outcome = await this.executor.execute(command, this.device, screen);
    while (
      !outcome.success &&
      outcome.errorKind === "transport" &&
      retryCount < this.actionRetryPolicy.maxAttempts
    ) {
      retryCount += 1;
      const delayMs = this.actionRetryPolicy.delayMs(retryCount);
      this.logger.warn("Device link failed mid-action, retrying", { command, retryCount, delayMs });
      await this.clock.sleep(delayMs);
      outcome = await this.executor.execute(command, this.device, screen);
    }
    return { outcome, retryCount };
  }

  private stopRequested(options: RunTaskOptions) {
    if (options.control?.shouldStop()) return true;
    if (!options.shouldStop) return false;
    try {
      return options.shouldStop();
    } catch (error) {
      this.logger.warn("Stop predicate threw; continuing", { error: errorMessage(error) });
      return false;
    }
  }

  private notifyProgress(sink: ProgressSink | undefined, update: ProgressUpdate) {
    if (!sink) return;
    try {
      const pending = sink.notify(update);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => {
          this.logger.debug("Progress sink rejected", { error: errorMessage(error) });
        });
      }
    } catch (error) {
      this.logger.debug("Progress sink threw", { error: errorMessage(error) });
    }
  }

  private emit(onEvent: PilotEventCallback | undefined, event: PilotEvent) {
    if (!onEvent) return;
    try {
      const pending = onEvent(event);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => {
          this.logger.warn("Event listener rejected", { type: event.type, error: errorMessage(error) });
        });
      }
    } catch (error) {
      this.logger.warn("Event listener threw", { type: event.type, error: errorMessage(error) });
    }
  }
}
