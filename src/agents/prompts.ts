import type { StepLedger } from "../core/ledger.js";
import { isScrollLike, uiDelta } from "../core/ledger.js";
import type { UISnapshot } from "../core/snapshot.js";
import { isTextInput } from "../core/snapshot.js";
import type { TaskPlan } from "../core/types.js";

export const PLANNER_RULES = [
  "You operate an Android phone on behalf of a user, one decision at a time.",
  "Each turn you see the task, what has been done so far and the elements on screen.",
  "Refer to elements by their [index] from the current element list only. Never invent indices.",
  "Prefer elements marked ★ (clickable).",
  "Declare the task complete only when the screen shows it is done.",
].join("\n");

const RESPONSE_FORMAT = `Reply with JSON only, in this shape:
{"task_complete": false, "next_step": {"action": "tap", "target": 3, "parameters": {}, "description": "Tap search box: Search"}, "reason": "...", "confidence": 0.9}
Use "next_steps": [ ... ] instead of "next_step" to send several actions at once (for example every digit of a PIN).
When the task is finished: {"task_complete": true, "reason": "...", "confidence": 0.9}
Actions:
- tap: target = element index
- input: parameters.text = text to type; target = index of the field (optional when it already has focus)
- swipe: parameters.direction = up | down | left | right ("up" reveals content further down)
- press_key: parameters.key = ENTER | BACK | HOME | DEL | ...
- back, home: no parameters
- wait: parameters.duration_ms
- launch_app: parameters.package = Android package name
Describe tap targets as "<what>: <element name>" so the name can be checked against the index.`;

const KEYPAD_KEYWORDS = ["password", "passcode", "pin code", "密码", "验证码"];
const QUOTED_TERMS = /["“「『]([^"”」』]+)["”」』]/g;
const MAX_ELEMENTS = 120;
const MAX_DELTA_NAMES = 8;

export type PlannerPromptInput = {
  instruction: string;
  snapshot: UISnapshot;
  ledger: StepLedger;
  taskPlan?: TaskPlan;
  homeScreenMarkers?: readonly string[];
};

export function quotedTerms(instruction: string): string[] {
  return Array.from(instruction.matchAll(QUOTED_TERMS), (m) => (m[1] ?? "").trim()).filter(
    (term) => term.length > 0
  );
}

export function looksLikeKeypad(snapshot: UISnapshot, instruction: string) {
  const digitKeys = snapshot.indexed.filter((entry) => /^\d$/.test(entry.displayName)).length;
  if (digitKeys >= 6) return true;
  const haystack = `${instruction} ${snapshot.elementNames().join(" ")}`.toLowerCase();
  return KEYPAD_KEYWORDS.some((keyword) => haystack.includes(keyword));
}

function renderTaskPlan(plan: TaskPlan) {
  const lines = [`## Task plan`, `Summary: ${plan.summary}`];
  if (plan.steps.length > 0) {
    lines.push("Expected steps:");
    plan.steps.forEach((step, i) => lines.push(`  ${i + 1}. ${step}`));
  }
  if (plan.risks.length > 0) {
    lines.push(`Known risks: ${plan.risks.join("; ")}`);
  }
  if (plan.successCriteria) {
    lines.push(`Success criteria: ${plan.successCriteria}`);
  }
  lines.push(`Estimated steps: ${plan.estimatedSteps}`);
  return lines.join("\n");
}

export function renderElements(snapshot: UISnapshot, limit = MAX_ELEMENTS) {
  if (snapshot.isEmpty()) {
    return "(no elements detected; the screen may still be loading)";
  }
  const rows = snapshot.indexed.slice(0, limit).map((entry) => {
    const marker = entry.element.clickable ? "★" : "";
    const tags: string[] = [];
    if (isTextInput(entry.element)) tags.push("input");
    if (entry.element.scrollable) tags.push("scrollable");
    if (!entry.element.enabled) tags.push("disabled");
    const suffix = tags.length > 0 ? ` (${tags.join(", ")})` : "";
    return `[${entry.index}]${marker} ${entry.displayName}${suffix}`;
  });
  if (snapshot.size > limit) {
    rows.push(`... ${snapshot.size - limit} more elements not shown`);
  }
  return rows.join("\n");
}

function renderWarnings(ledger: StepLedger) {
  const lines: string[] = [];
  const lastPrimary = ledger.lastPrimary();
  for (const anomaly of ledger.detectAnomalies()) {
    switch (anomaly.kind) {
      case "stuck_scroll":
      case "repetition":
        lines.push(`⚠ ${anomaly.message}`);
        break;
      case "oscillation":
        lines.push(`⚠ ${anomaly.message} The toggle is looping.`);
        break;
      case "no_progress":
        if (anomaly.severity === "warning") {
          lines.push(`⚠ ${anomaly.message} Check whether the task is already complete.`);
        } else if (lastPrimary && isScrollLike(lastPrimary.action)) {
          lines.push(`⚠ ${anomaly.message} Try swiping the opposite way.`);
        } else {
          lines.push(`⚠ ${anomaly.message} Try a different element or go back.`);
        }
        break;
    }
  }
  return lines;
}

/** Builds the per-step planner prompt from the live screen and the run's history. */
export function buildPlannerPrompt(input: PlannerPromptInput): string {
  const { instruction, snapshot, ledger, taskPlan, homeScreenMarkers = [] } = input;
  const sections: string[] = [PLANNER_RULES, `## Task\n${instruction}`];

  const terms = quotedTerms(instruction);
  if (terms.length > 0) {
    sections.push(
      `## Search keywords\nWhen typing into a search field, enter exactly: ${terms.join(", ")}`
    );
  }

  if (taskPlan) {
    sections.push(renderTaskPlan(taskPlan));
  }

  const history = ledger.render();
  sections.push(`## Completed steps\n${history.length > 0 ? history.join("\n") : "(none yet)"}`);

  const failures = ledger.recentFailures(5);
  if (failures.length > 0) {
    sections.push(
      `## Recent failures\n${failures
        .map((step) => `- [${step.action}:${step.target}] ${step.error ?? "unknown error"}`)
        .join("\n")}\nDo not repeat a failed action unchanged.`
    );
  }

  const noChange = ledger.recentNoChange(3);
  if (noChange.length > 0) {
    sections.push(
      `## Steps with no visible effect\n${noChange
        .map((step) => `- [${step.action}] ${step.description}`)
        .join("\n")}`
    );
  }

  const warnings = renderWarnings(ledger);
  if (warnings.length > 0) {
    sections.push(`## Warnings\n${warnings.join("\n")}`);
  }

  const home = snapshot.isHomeScreen(homeScreenMarkers);
  sections.push(
    `## Current screen\nHome screen: ${home ? "yes" : "no"}\nElements: ${snapshot.size}\n${renderElements(snapshot)}`
  );

  const last = ledger.last();
  if (last) {
    const { added, removed } = uiDelta(last.uiBefore, snapshot.elementNames());
    if (added.length > 0 || removed.length > 0) {
      const lines = ["## Changes since the last step"];
      if (added.length > 0) lines.push(`+ ${added.slice(0, MAX_DELTA_NAMES).join(", ")}`);
      if (removed.length > 0) lines.push(`- ${removed.slice(0, MAX_DELTA_NAMES).join(", ")}`);
      sections.push(lines.join("\n"));
    }
  }

  if (looksLikeKeypad(snapshot, instruction)) {
    sections.push(
      "## Keypad\nA numeric keypad or code entry is on screen. Send every digit in one next_steps batch."
    );
  }

  sections.push(`## Response\n${RESPONSE_FORMAT}`);
  return sections.join("\n\n");
}
