import type { StepLedger } from "../core/ledger.js";
import type { UISnapshot } from "../core/snapshot.js";
import type { NextStepDecision, TaskPlan } from "../core/types.js";
import type { ReasoningCapability } from "../reasoning/types.js";
import { errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { parseDecision } from "./decision.js";
import { buildPlannerPrompt } from "./prompts.js";

export type TaskContext = {
  instruction: string;
  taskPlan?: TaskPlan;
};

/** Produces exactly one decision per call for the current screen. */
export interface Planner {
  plan(task: TaskContext, snapshot: UISnapshot, ledger: StepLedger): Promise<NextStepDecision>;
}

export type DynamicPlannerOptions = {
  reasoning: ReasoningCapability;
  visionEnabled?: boolean;
  homeScreenMarkers?: readonly string[];
  logger?: PilotLogger;
};

/**
 * Re-plans from scratch every step: renders the screen and history into a
 * prompt, asks the reasoning capability once and decodes the reply.
 * Both transport and parse failures come back as a confidence-0 no-op.
 */
export class DynamicPlanner implements Planner {
  private readonly reasoning: ReasoningCapability;
  private readonly visionEnabled: boolean;
  private readonly homeScreenMarkers: readonly string[];
  private readonly logger: PilotLogger;

  constructor(opts: DynamicPlannerOptions) {
    this.reasoning = opts.reasoning;
    this.visionEnabled = opts.visionEnabled ?? true;
    this.homeScreenMarkers = opts.homeScreenMarkers ?? [];
    this.logger = opts.logger ?? silentLogger;
  }

  async plan(task: TaskContext, snapshot: UISnapshot, ledger: StepLedger): Promise<NextStepDecision> {
    const prompt = buildPlannerPrompt({
      instruction: task.instruction,
      taskPlan: task.taskPlan,
      snapshot,
      ledger,
      homeScreenMarkers: this.homeScreenMarkers,
    });
    this.logger.debug("Planner prompt built", { length: prompt.length, elements: snapshot.size });

    let text: string;
    try {
      text =
        this.visionEnabled && snapshot.screenshot
          ? await this.reasoning.generateFromImageAndText(snapshot.screenshot, prompt)
          : await this.reasoning.generateText(prompt);
    } catch (error) {
      this.logger.warn("Planner reasoning call failed", { error: errorMessage(error) });
      return { type: "no_op", reason: `Reasoning unavailable: ${errorMessage(error)}`, confidence: 0 };
    }

    try {
      const decision = parseDecision(text);
      this.logger.info("Planner decision", { decision });
      return decision;
    } catch (error) {
      this.logger.warn("Planner reply could not be parsed", {
        error: errorMessage(error),
        reply: text.slice(0, 500),
      });
      return { type: "no_op", reason: `Unparseable reply: ${errorMessage(error)}`, confidence: 0 };
    }
  }
}
