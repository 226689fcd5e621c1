import { z } from "zod";
import type { UISnapshot } from "../core/snapshot.js";
import type { TaskPlan } from "../core/types.js";
import type { ReasoningCapability } from "../reasoning/types.js";
import { errorMessage } from "../utils/errors.js";
import type { PilotLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { extractJsonObject, normalizeConfidence } from "./decision.js";
import { renderElements } from "./prompts.js";

const DEFAULT_ESTIMATED_STEPS = 5;

const StepEntrySchema = z.union([
  z.string(),
  z.object({ description: z.string() }).passthrough(),
]);

const TaskPlanSchema = z.object({
  summary: z.string().default(""),
  steps: z.array(StepEntrySchema).default([]),
  potential_issues: z.array(z.string()).nullish(),
  risks: z.array(z.string()).nullish(),
  success_criteria: z.union([z.string(), z.array(z.string())]).nullish(),
  estimated_steps: z.coerce.number().int().positive().nullish(),
  confidence: z.coerce.number().nullish(),
});

export function basicTaskPlan(instruction: string, confidence: number): TaskPlan {
  return {
    instruction,
    summary: instruction,
    steps: [instruction],
    risks: [],
    successCriteria: "The screen shows the requested outcome",
    estimatedSteps: DEFAULT_ESTIMATED_STEPS,
    confidence,
  };
}

function buildTaskPlanPrompt(instruction: string, snapshot?: UISnapshot) {
  const lines = [
    "Plan how to carry out this task on an Android phone.",
    `Task: ${instruction}`,
  ];
  if (snapshot) {
    lines.push("Current screen:", renderElements(snapshot, 40));
  }
  lines.push(
    "Reply with JSON only:",
    '{"summary": "...", "steps": ["..."], "potential_issues": ["..."], "success_criteria": "...", "estimated_steps": 4, "confidence": 0.8}'
  );
  return lines.join("\n");
}

/**
 * Optional up-front outline of the task. It only informs the planner's
 * prompt; the loop still re-plans every step.
 */
export async function generateTaskPlan(
  reasoning: ReasoningCapability,
  instruction: string,
  snapshot?: UISnapshot,
  logger: PilotLogger = silentLogger
): Promise<TaskPlan> {
  let text: string;
  try {
    text = await reasoning.generateText(buildTaskPlanPrompt(instruction, snapshot));
  } catch (error) {
    logger.warn("Task plan generation failed", { error: errorMessage(error) });
    return basicTaskPlan(instruction, 0.5);
  }

  try {
    const parsed = TaskPlanSchema.safeParse(extractJsonObject(text));
    if (!parsed.success) {
      throw parsed.error;
    }
    const raw = parsed.data;
    const steps = raw.steps.map((step) => (typeof step === "string" ? step : step.description));
    const criteria = Array.isArray(raw.success_criteria)
      ? raw.success_criteria.join("; ")
      : raw.success_criteria ?? "";
    const plan: TaskPlan = {
      instruction,
      summary: raw.summary || instruction,
      steps,
      risks: raw.potential_issues ?? raw.risks ?? [],
      successCriteria: criteria,
      estimatedSteps: raw.estimated_steps ?? Math.max(steps.length, 1),
      confidence: normalizeConfidence(raw.confidence, 0.8),
    };
    logger.info("Task plan generated", { plan });
    return plan;
  } catch (error) {
    logger.warn("Task plan reply could not be parsed", { error: errorMessage(error) });
    return basicTaskPlan(instruction, 0.6);
  }
}
