import { z } from "zod";
import type { ActionKind, ActionParameters, NextStepDecision, ProposedAction } from "../core/types.js";
import { isActionKind, isSwipeDirection } from "../core/types.js";
import { DecisionParseError } from "../utils/errors.js";

const ACTION_ALIASES: Record<string, ActionKind> = {
  press: "tap",
  type: "input",
  type_text: "input",
  enter_text: "input",
  text: "input",
  key: "press_key",
  keyevent: "press_key",
  go_back: "back",
  go_home: "home",
  sleep: "wait",
  launch: "launch_app",
  open_app: "launch_app",
};

const looseNumber = z.union([z.number(), z.string()]);

const RawStepSchema = z
  .object({
    action: z.string().min(1),
    target: looseNumber.nullish(),
    target_name: z.string().nullish(),
    element_index: looseNumber.nullish(),
    target_index: looseNumber.nullish(),
    index: looseNumber.nullish(),
    description: z.string().nullish(),
    parameters: z.record(z.unknown()).nullish(),
    direction: z.string().nullish(),
    text: z.string().nullish(),
    key: z.string().nullish(),
    package: z.string().nullish(),
  })
  .passthrough();

const RawDecisionSchema = z.object({
  task_complete: z.boolean().nullish(),
  next_step: RawStepSchema.nullish(),
  next_steps: z.array(RawStepSchema).nullish(),
  reason: z.string().nullish(),
  confidence: z.coerce.number().nullish(),
});

type RawStep = z.infer<typeof RawStepSchema>;

/** Pulls the first JSON object out of free text, fenced or bare. */
export function extractJsonObject(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const candidates: string[] = [];
  if (fenced?.[1]) candidates.push(fenced[1].trim());
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first !== -1 && last > first) candidates.push(text.slice(first, last + 1));

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  throw new DecisionParseError("No JSON object found in reasoning output", text);
}

export function normalizeConfidence(value: number | null | undefined, fallback: number) {
  if (value === null || value === undefined || !Number.isFinite(value)) return fallback;
  const scaled = value > 1 ? value / 100 : value;
  return Math.min(1, Math.max(0, scaled));
}

function asIndex(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  const n = typeof value === "number" ? value : value.trim() === "" ? NaN : Number(value.trim());
  return Number.isInteger(n) ? n : undefined;
}

function str(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim().length > 0) return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function num(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

export function normalizeActionKind(raw: string): ActionKind | null {
  const key = raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (isActionKind(key)) return key;
  return ACTION_ALIASES[key] ?? null;
}

function toProposedAction(raw: RawStep, position: number, rawText: string): ProposedAction {
  const kind = normalizeActionKind(raw.action);
  if (!kind) {
    throw new DecisionParseError(`Unknown action "${raw.action}" in step ${position}`, rawText);
  }

  const params = raw.parameters ?? {};
  // A numeric `target` is an element index; names travel in `target_name` or a non-numeric target.
  const targetIndex =
    asIndex(raw.element_index) ?? asIndex(raw.target_index) ?? asIndex(raw.index) ?? asIndex(raw.target);
  const targetText = str(raw.target_name) ?? (targetIndex === undefined ? str(raw.target) : undefined);

  const parameters: ActionParameters = {};
  const direction = (str(params.direction) ?? str(raw.direction))?.toLowerCase();
  if (direction && isSwipeDirection(direction)) {
    parameters.direction = direction;
  }
  const text = str(params.text) ?? str(raw.text);
  if (text !== undefined) parameters.text = text;
  const key = str(params.key) ?? str(raw.key);
  if (key !== undefined) parameters.key = key;
  const durationMs = num(params.duration_ms) ?? num(params.duration);
  if (durationMs !== undefined) parameters.durationMs = durationMs;
  const packageId = str(params.package) ?? str(params.package_name) ?? str(raw.package);
  if (packageId !== undefined) parameters.packageId = packageId;

  let targetName = targetText;
  if (targetText) {
    if ((kind === "swipe" || kind === "scroll") && !parameters.direction) {
      const lowered = targetText.toLowerCase();
      if (isSwipeDirection(lowered)) {
        parameters.direction = lowered;
        targetName = undefined;
      }
    } else if (kind === "press_key" && !parameters.key) {
      parameters.key = targetText;
    } else if (kind === "launch_app" && !parameters.packageId) {
      parameters.packageId = targetText;
    }
  }

  const x = num(params.x);
  const y = num(params.y);
  const action: ProposedAction = {
    kind,
    parameters,
    description: str(raw.description) ?? `${kind} ${targetName ?? targetIndex ?? ""}`.trim(),
  };
  if (targetIndex !== undefined) action.targetIndex = targetIndex;
  if (targetName !== undefined) action.targetName = targetName;
  if (x !== undefined && y !== undefined) action.coordinate = { x: Math.round(x), y: Math.round(y) };
  return action;
}

/**
 * Decodes the planner's JSON reply into a {@link NextStepDecision}.
 * Throws {@link DecisionParseError} on anything that does not fit.
 */
export function parseDecision(text: string): NextStepDecision {
  const json = extractJsonObject(text);
  const parsed = RawDecisionSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new DecisionParseError(`Malformed decision: ${issues}`, text, parsed.error);
  }

  const raw = parsed.data;
  const reason = raw.reason?.trim() ?? "";

  if (raw.task_complete) {
    return { type: "task_complete", reason, confidence: normalizeConfidence(raw.confidence, 0.8) };
  }

  const confidence = normalizeConfidence(raw.confidence, 0.5);
  const steps =
    raw.next_steps && raw.next_steps.length > 0 ? raw.next_steps : raw.next_step ? [raw.next_step] : [];
  const actions = steps.map((step, i) => toProposedAction(step, i + 1, text));

  const [only] = actions;
  if (actions.length === 1 && only) {
    return { type: "single_step", action: only, reason, confidence };
  }
  if (actions.length > 1) {
    return { type: "batch_steps", actions, reason, confidence };
  }
  return { type: "no_op", reason: reason || "No action proposed", confidence };
}
