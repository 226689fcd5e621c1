import type { ActionKind, CompletedStep, SwipeDirection } from "./types.js";

export type StepInput = Omit<CompletedStep, "index">;

export type Anomaly =
  | { kind: "stuck_scroll"; direction: SwipeDirection; suggested: SwipeDirection; message: string }
  | { kind: "repetition"; action: ActionKind; target: string; message: string }
  | { kind: "oscillation"; count: number; keywords: string[]; message: string }
  | { kind: "no_progress"; count: number; severity: "escalate" | "warning"; message: string };

export type AuditEntry = {
  action: ActionKind;
  target: string;
  description: string;
  success: boolean;
  error: string | null;
  durationMs: number;
};

export const DEFAULT_TOGGLE_KEYWORDS = ["pause", "play", "暂停", "播放"];

const OSCILLATION_WINDOW = 6;
const OSCILLATION_THRESHOLD = 3;
const REPETITION_LENGTH = 3;
const NO_PROGRESS_ESCALATE = 2;
const NO_PROGRESS_WARNING = 3;
const MAX_DELTA_NAMES = 5;

export function oppositeDirection(direction: SwipeDirection): SwipeDirection {
  switch (direction) {
    case "up":
      return "down";
    case "down":
      return "up";
    case "left":
      return "right";
    case "right":
      return "left";
  }
}

export function isScrollLike(kind: ActionKind) {
  return kind === "swipe" || kind === "scroll";
}

export function isTapLike(kind: ActionKind) {
  return kind === "tap" || kind === "click";
}

/** Folds action aliases together so `click` and `tap` compare equal. */
export function canonicalKind(kind: ActionKind): ActionKind {
  if (kind === "click") return "tap";
  if (kind === "scroll") return "swipe";
  return kind;
}

export function formatFailure(step: CompletedStep) {
  return `[${step.action}:${step.target}] ${step.error ?? "unknown error"}`;
}

export function uiDelta(before: readonly string[], after: readonly string[]) {
  const beforeSet = new Set(before);
  const afterSet = new Set(after);
  return {
    added: after.filter((name) => !beforeSet.has(name)),
    removed: before.filter((name) => !afterSet.has(name)),
  };
}

/**
 * Append-only history of one task run. Entries are frozen on append and never
 * reordered. Recovery maneuvers are kept for rendering and auditing but are
 * invisible to the streak counters and anomaly detectors.
 */
export class StepLedger {
  private readonly entries: CompletedStep[] = [];
  private readonly toggleKeywords: string[];

  constructor(opts: { toggleKeywords?: string[] } = {}) {
    this.toggleKeywords = (opts.toggleKeywords ?? DEFAULT_TOGGLE_KEYWORDS).map((k) =>
      k.toLowerCase()
    );
  }

  append(step: StepInput): CompletedStep {
    const record: CompletedStep = Object.freeze({
      ...step,
      index: this.entries.length + 1,
      parameters: Object.freeze({ ...step.parameters }),
      uiBefore: Object.freeze([...step.uiBefore]),
      uiAfter: Object.freeze([...step.uiAfter]),
    });
    this.entries.push(record);
    return record;
  }

  get length() {
    return this.entries.length;
  }

  all(): readonly CompletedStep[] {
    return [...this.entries];
  }

  last(): CompletedStep | undefined {
    return this.entries.at(-1);
  }

  lastPrimary(): CompletedStep | undefined {
    return this.primary().at(-1);
  }

  private primary() {
    return this.entries.filter((step) => !step.recovery);
  }

  consecutiveFailures() {
    let count = 0;
    for (const step of [...this.primary()].reverse()) {
      if (step.success) break;
      count += 1;
    }
    return count;
  }

  consecutiveNoChange() {
    let count = 0;
    for (const step of [...this.primary()].reverse()) {
      if (!step.success || step.uiChanged) break;
      count += 1;
    }
    return count;
  }

  /** Reasons of the trailing failure streak, oldest first, at most `limit`. */
  lastFailureReasons(limit = 3): string[] {
    const streak = this.consecutiveFailures();
    const steps = this.primary();
    return steps.slice(steps.length - Math.min(streak, limit)).map(formatFailure);
  }

  recentFailures(window = 5): CompletedStep[] {
    return this.primary()
      .slice(-window)
      .filter((step) => !step.success);
  }

  recentNoChange(window = 3): CompletedStep[] {
    return this.primary()
      .slice(-window)
      .filter((step) => step.success && !step.uiChanged);
  }

  /**
   * Direction that is stuck, if the two most recent successful steps were both
   * swipes in that direction and neither changed the UI.
   */
  stuckScrollDirection(): SwipeDirection | null {
    const successful = this.primary().filter((step) => step.success);
    if (successful.length < 2) return null;
    const [previous, latest] = successful.slice(-2);
    if (!previous || !latest) return null;
    const bothScrolls = isScrollLike(previous.action) && isScrollLike(latest.action);
    if (!bothScrolls || previous.uiChanged || latest.uiChanged) return null;
    const direction = latest.parameters.direction;
    if (!direction || direction !== previous.parameters.direction) return null;
    return direction;
  }

  detectAnomalies(): Anomaly[] {
    const anomalies: Anomaly[] = [];
    const steps = this.primary();

    const stuck = this.stuckScrollDirection();
    if (stuck) {
      const suggested = oppositeDirection(stuck);
      anomalies.push({
        kind: "stuck_scroll",
        direction: stuck,
        suggested,
        message: `Scrolling ${stuck} twice did not change the screen; scroll ${suggested} instead.`,
      });
    }

    const tail = steps.slice(-REPETITION_LENGTH);
    if (tail.length === REPETITION_LENGTH) {
      const [first] = tail;
      const key = (step: CompletedStep) =>
        `${canonicalKind(step.action)}|${step.target}|${step.parameters.direction ?? ""}`;
      if (first && tail.every((step) => key(step) === key(first))) {
        anomalies.push({
          kind: "repetition",
          action: first.action,
          target: first.target,
          message: `The same ${first.action} on "${first.target}" ran ${REPETITION_LENGTH} times in a row. You must change strategy.`,
        });
      }
    }

    const windowSteps = steps.slice(-OSCILLATION_WINDOW);
    const matched = new Set<string>();
    let toggles = 0;
    for (const step of windowSteps) {
      if (!isTapLike(step.action)) continue;
      const haystack = `${step.description} ${step.target}`.toLowerCase();
      const hits = this.toggleKeywords.filter((keyword) => haystack.includes(keyword));
      if (hits.length === 0) continue;
      toggles += 1;
      for (const keyword of hits) matched.add(keyword);
    }
    if (toggles >= OSCILLATION_THRESHOLD) {
      const keywords = [...matched];
      anomalies.push({
        kind: "oscillation",
        count: toggles,
        keywords,
        message: `${toggles} of the last ${windowSteps.length} steps toggled ${keywords
          .map((keyword) => `"${keyword}"`)
          .join("/")}. Do not tap it again.`,
      });
    }

    const noChange = this.consecutiveNoChange();
    if (noChange >= NO_PROGRESS_ESCALATE) {
      const severity = noChange >= NO_PROGRESS_WARNING ? "warning" : "escalate";
      anomalies.push({
        kind: "no_progress",
        count: noChange,
        severity,
        message: `${noChange} consecutive steps succeeded without changing the screen.`,
      });
    }

    return anomalies;
  }

  render(): string[] {
    const lines: string[] = [];
    for (const step of this.entries) {
      const prefix = step.recovery ? "[recovery] " : "";
      let line = `${step.index}. ${prefix}[${step.action}] ${step.description} (target: ${step.target})`;
      if (step.success) {
        line += " ✓";
        if (!step.uiChanged) line += " (UI unchanged)";
      } else {
        line += ` ✗ failed: ${step.error ?? "unknown error"}`;
      }
      if (step.retryCount > 0) {
        line += ` (retried ${step.retryCount}x)`;
      }
      lines.push(line);

      if (step.uiChanged) {
        const { added, removed } = uiDelta(step.uiBefore, step.uiAfter);
        if (added.length > 0) {
          lines.push(`   + appeared: ${added.slice(0, MAX_DELTA_NAMES).join(", ")}`);
        }
        if (removed.length > 0) {
          lines.push(`   - disappeared: ${removed.slice(0, MAX_DELTA_NAMES).join(", ")}`);
        }
      }
    }
    return lines;
  }

  toAuditLog(): AuditEntry[] {
    return auditEntries(this.entries);
  }
}

export function auditEntries(steps: readonly CompletedStep[]): AuditEntry[] {
  return steps.map((step) => ({
    action: step.action,
    target: step.target,
    description: step.description,
    success: step.success,
    error: step.error ?? null,
    durationMs: step.durationMs,
  }));
}
