import { z } from "zod";
import type { UISnapshot } from "../core/snapshot.js";
import { labelOf } from "../core/snapshot.js";
import type {
  ActionKind,
  ActionOutcome,
  ActionParameters,
  RecoveryStrategy,
  ResolvedCommand,
} from "../core/types.js";
import type { DeviceCapability } from "../device/types.js";
import type { ActionExecutor } from "../executor/executor.js";
import type { ReasoningCapability } from "../reasoning/types.js";
import { errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { extractJsonObject } from "./decision.js";
import { renderElements } from "./prompts.js";

export type RecoveryState = "idle" | "deciding" | "acting" | "recovered" | "exhausted";

/** Fixed order used when no reasoning capability is available or it cannot decide. */
export const RULE_SEQUENCE: RecoveryStrategy[] = ["scroll_down", "scroll_up", "go_back"];

export const RECOVERY_STRATEGIES = [
  "scroll_down",
  "scroll_up",
  "swipe_left",
  "swipe_right",
  "go_back",
  "close_popup",
  "tap_alternative",
  "wait",
  "give_up",
] as const satisfies readonly RecoveryStrategy[];

export const CLOSE_KEYWORDS = ["close", "cancel", "skip", "dismiss", "not now", "关闭", "取消", "跳过", "×", "✕"];

const RECOVERY_WAIT_MS = 2000;

const RecoveryReplySchema = z.object({
  strategy: z.enum(RECOVERY_STRATEGIES),
  element_index: z.coerce.number().int().positive().nullish(),
  reason: z.string().default(""),
});

export type RecoveryRequest = {
  instruction: string;
  /** Stable key of the thing that could not be reached; attempts are counted per key. */
  target: string;
  action: ActionKind;
  description: string;
  error: string;
};

/** Device-level maneuver the engine performed, ready to be recorded as a step. */
export type RecoveryManeuver = {
  action: ActionKind;
  target: string;
  parameters: ActionParameters;
  command: ResolvedCommand;
  outcome: ActionOutcome;
};

export type RecoveryOutcome = {
  state: "recovered" | "exhausted";
  strategy: RecoveryStrategy;
  reason: string;
  attempt: number;
  transitions: RecoveryState[];
  maneuvers: RecoveryManeuver[];
};

type Plan = { strategy: RecoveryStrategy; elementIndex?: number; reason: string; reasoned: boolean };

type ActResult = { recovered: boolean; reason: string; maneuver?: RecoveryManeuver };

export type RecoveryEngineOptions = {
  executor: ActionExecutor;
  reasoning?: ReasoningCapability;
  useReasoning?: boolean;
  maxAttemptsPerTarget?: number;
  logger?: PilotLogger;
};

/**
 * Bounded remediation after a failed step: idle → deciding → acting →
 * recovered | exhausted. It never writes history; the caller records the
 * returned maneuvers.
 */
export class RecoveryEngine {
  private readonly executor: ActionExecutor;
  private readonly reasoning?: ReasoningCapability;
  private readonly useReasoning: boolean;
  private readonly maxAttempts: number;
  private readonly logger: PilotLogger;
  private readonly attempts = new Map<string, number>();

  constructor(opts: RecoveryEngineOptions) {
    this.executor = opts.executor;
    this.reasoning = opts.reasoning;
    this.useReasoning = opts.useReasoning ?? true;
    this.maxAttempts = opts.maxAttemptsPerTarget ?? 3;
    this.logger = opts.logger ?? silentLogger;
  }

  attemptsFor(target: string) {
    return this.attempts.get(target) ?? 0;
  }

  reset() {
    this.attempts.clear();
  }

  async recover(
    request: RecoveryRequest,
    snapshot: UISnapshot,
    device: DeviceCapability
  ): Promise<RecoveryOutcome> {
    const transitions: RecoveryState[] = ["idle"];
    const attempt = this.attemptsFor(request.target) + 1;

    if (attempt > this.maxAttempts) {
      transitions.push("exhausted");
      return {
        state: "exhausted",
        strategy: "give_up",
        reason: `Recovery attempts exhausted for ${request.target} (${this.maxAttempts})`,
        attempt: attempt - 1,
        transitions,
        maneuvers: [],
      };
    }
    this.attempts.set(request.target, attempt);

    transitions.push("deciding");
    const rule = RULE_SEQUENCE[(attempt - 1) % RULE_SEQUENCE.length] ?? "go_back";
    const reasoned = await this.decideWithReasoning(request, snapshot, attempt);
    const plan: Plan = reasoned ?? { strategy: rule, reason: `Fixed recovery order, attempt ${attempt}`, reasoned: false };
    this.logger.info("Recovery strategy chosen", { target: request.target, attempt, plan });

    if (plan.strategy === "give_up") {
      transitions.push("exhausted");
      return {
        state: "exhausted",
        strategy: "give_up",
        reason: plan.reason || "Recovery judged hopeless",
        attempt,
        transitions,
        maneuvers: [],
      };
    }

    transitions.push("acting");
    const maneuvers: RecoveryManeuver[] = [];
    let strategy: RecoveryStrategy = plan.strategy;
    let result = await this.act(plan, snapshot, device);
    if (result.maneuver) maneuvers.push(result.maneuver);

    if (!result.recovered && plan.reasoned && rule !== plan.strategy) {
      this.logger.warn("Reasoned recovery did not work, using fixed order", {
        strategy: plan.strategy,
        fallback: rule,
      });
      strategy = rule;
      result = await this.act({ strategy: rule, reason: "Fallback", reasoned: false }, snapshot, device);
      if (result.maneuver) maneuvers.push(result.maneuver);
    }

    transitions.push(result.recovered ? "recovered" : "exhausted");
    return {
      state: result.recovered ? "recovered" : "exhausted",
      strategy,
      reason: result.reason,
      attempt,
      transitions,
      maneuvers,
    };
  }

  private async decideWithReasoning(
    request: RecoveryRequest,
    snapshot: UISnapshot,
    attempt: number
  ): Promise<Plan | null> {
    if (!this.reasoning || !this.useReasoning) return null;

    const prompt = [
      "A step of a phone automation task failed. Choose one recovery maneuver.",
      `Task: ${request.instruction}`,
      `Failed step: [${request.action}] ${request.description} (target: ${request.target})`,
      `Error: ${request.error}`,
      `Recovery attempt ${attempt} of ${this.maxAttempts}`,
      "Current screen:",
      renderElements(snapshot, 60),
      `Strategies: ${RECOVERY_STRATEGIES.join(", ")}`,
      "scroll_down reveals content further down; close_popup dismisses a dialog; tap_alternative needs element_index.",
      'Reply with JSON only: {"strategy": "scroll_down", "element_index": null, "reason": "..."}',
    ].join("\n");

    try {
      const text = await this.reasoning.generateText(prompt);
      const parsed = RecoveryReplySchema.safeParse(extractJsonObject(text));
      if (!parsed.success) {
        this.logger.warn("Recovery reply did not match schema", { issues: parsed.error.issues });
        return null;
      }
      return {
        strategy: parsed.data.strategy,
        elementIndex: parsed.data.element_index ?? undefined,
        reason: parsed.data.reason,
        reasoned: true,
      };
    } catch (error) {
      this.logger.warn("Recovery reasoning failed", { error: errorMessage(error) });
      return null;
    }
  }

  private async act(plan: Plan, snapshot: UISnapshot, device: DeviceCapability): Promise<ActResult> {
    const swipe = (direction: "up" | "down" | "left" | "right") =>
      this.run(
        { type: "swipe", direction, durationMs: 500 },
        { action: "swipe", target: direction, parameters: { direction } },
        snapshot,
        device,
        plan.reason
      );

    switch (plan.strategy) {
      case "scroll_down":
        return swipe("up");
      case "scroll_up":
        return swipe("down");
      case "swipe_left":
        return swipe("left");
      case "swipe_right":
        return swipe("right");
      case "go_back":
        return this.run(
          { type: "key", key: "BACK" },
          { action: "back", target: "BACK", parameters: {} },
          snapshot,
          device,
          plan.reason
        );
      case "wait":
        return this.run(
          { type: "wait", durationMs: RECOVERY_WAIT_MS },
          { action: "wait", target: "wait", parameters: { durationMs: RECOVERY_WAIT_MS } },
          snapshot,
          device,
          plan.reason
        );
      case "close_popup": {
        const control = snapshot.indexed.find((entry) => {
          const name = labelOf(entry.element).toLowerCase();
          return name.length > 0 && CLOSE_KEYWORDS.some((keyword) => name === keyword || name.includes(keyword));
        });
        if (!control) {
          return { recovered: false, reason: "No close control on screen" };
        }
        return this.run(
          { type: "tap", point: control.element.center },
          { action: "tap", target: control.displayName, parameters: {} },
          snapshot,
          device,
          plan.reason
        );
      }
      case "tap_alternative": {
        const entry = plan.elementIndex !== undefined ? snapshot.lookupByIndex(plan.elementIndex) : null;
        if (!entry) {
          return { recovered: false, reason: `No element at index ${plan.elementIndex ?? "?"}` };
        }
        return this.run(
          { type: "tap", point: entry.element.center },
          { action: "tap", target: entry.displayName, parameters: {} },
          snapshot,
          device,
          plan.reason
        );
      }
      case "give_up":
        return { recovered: false, reason: plan.reason };
    }
  }

  private async run(
    command: ResolvedCommand,
    meta: Pick<RecoveryManeuver, "action" | "target" | "parameters">,
    snapshot: UISnapshot,
    device: DeviceCapability,
    reason: string
  ): Promise<ActResult> {
    const outcome = await this.executor.execute(command, device, snapshot.screen);
    return {
      recovered: outcome.success,
      reason: outcome.success ? reason : outcome.error ?? "maneuver failed",
      maneuver: { ...meta, command, outcome },
    };
  }
}
