export type Point = { x: number; y: number };

export type Bounds = { left: number; top: number; right: number; bottom: number };

/** One node as reported by the device's hierarchy dump, before normalization. */
export type RawElementRecord = {
  text?: string | null;
  label?: string | null;
  className?: string | null;
  resourceId?: string | null;
  packageName?: string | null;
  hint?: string | null;
  bounds: Bounds;
  clickable?: boolean;
  scrollable?: boolean;
  enabled?: boolean;
};

export type UIElement = Readonly<{
  text: string;
  accessibleLabel: string;
  className: string;
  resourceId: string;
  packageName: string;
  hint: string;
  bounds: Readonly<Bounds>;
  center: Readonly<Point>;
  clickable: boolean;
  scrollable: boolean;
  enabled: boolean;
}>;

export type ScreenInfo = {
  width: number;
  height: number;
  density?: number;
  orientation: "portrait" | "landscape";
};

// --- actions ---

export const ACTION_KINDS = [
  "tap",
  "click",
  "swipe",
  "scroll",
  "input",
  "press_key",
  "back",
  "home",
  "wait",
  "launch_app",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KINDS.some((kind) => kind === value);
}

export const SWIPE_DIRECTIONS = ["up", "down", "left", "right"] as const;

export type SwipeDirection = (typeof SWIPE_DIRECTIONS)[number];

export function isSwipeDirection(value: string): value is SwipeDirection {
  return (SWIPE_DIRECTIONS as readonly string[]).includes(value);
}

export type ActionParameters = {
  direction?: SwipeDirection;
  text?: string;
  key?: string;
  durationMs?: number;
  packageId?: string;
};

export type ProposedAction = {
  kind: ActionKind;
  targetIndex?: number;
  targetName?: string;
  coordinate?: Point;
  parameters: ActionParameters;
  description: string;
};

/** Planner output. `no_op` with confidence 0 means the step could not be reasoned. */
export type NextStepDecision =
  | { type: "task_complete"; reason: string; confidence: number }
  | { type: "single_step"; action: ProposedAction; reason: string; confidence: number }
  | { type: "batch_steps"; actions: ProposedAction[]; reason: string; confidence: number }
  | { type: "no_op"; reason: string; confidence: number };

export function decisionActions(decision: NextStepDecision): ProposedAction[] {
  switch (decision.type) {
    case "single_step":
      return [decision.action];
    case "batch_steps":
      return decision.actions;
    default:
      return [];
  }
}

/** Device-level command an action resolves to. */
export type ResolvedCommand =
  | { type: "tap"; point: Point }
  | { type: "swipe"; direction: SwipeDirection; durationMs: number }
  | { type: "input"; text: string; focus?: Point }
  | { type: "key"; key: string }
  | { type: "wait"; durationMs: number }
  | { type: "launch"; packageId: string };

export type FailureKind = "transport" | "execution" | "resolution";

export type ActionOutcome = {
  success: boolean;
  data?: Record<string, unknown>;
  error?: string;
  needsRecovery: boolean;
  errorKind?: FailureKind;
};

// --- history ---

export type CompletedStep = Readonly<{
  index: number;
  action: ActionKind;
  target: string;
  description: string;
  parameters: Readonly<ActionParameters>;
  success: boolean;
  error?: string;
  uiBefore: readonly string[];
  uiAfter: readonly string[];
  uiChanged: boolean;
  retryCount: number;
  durationMs: number;
  recovery: boolean;
}>;

export type TaskPlan = {
  instruction: string;
  summary: string;
  steps: string[];
  risks: string[];
  successCriteria: string;
  estimatedSteps: number;
  confidence: number;
};

export type RunState = "idle" | "planning" | "executing" | "recording" | "completed" | "failed";

export type TaskResult = {
  success: boolean;
  instruction: string;
  state: "completed" | "failed";
  cancelled: boolean;
  stepsExecuted: number;
  iterations: number;
  durationMs: number;
  error?: string;
  completionReason?: string;
  steps: CompletedStep[];
  taskPlan?: TaskPlan;
};

// --- observers ---

export type ProgressUpdate = {
  stepIndex: number;
  totalSteps: number;
  action: ActionKind;
  description: string;
  target: string;
};

/** Optional outbound channel for UI layers; delivery is best effort. */
export interface ProgressSink {
  notify(update: ProgressUpdate): void | Promise<void>;
}

export type RecoveryStrategy =
  | "scroll_down"
  | "scroll_up"
  | "swipe_left"
  | "swipe_right"
  | "go_back"
  | "close_popup"
  | "tap_alternative"
  | "wait"
  | "give_up";

export type PilotEvent =
  | { type: "init"; instruction: string; maxSteps: number; maxIterations: number }
  | { type: "task_plan"; plan: TaskPlan }
  | { type: "state"; state: RunState; iteration: number }
  | { type: "snapshot"; iteration: number; elementCount: number; names: string[] }
  | { type: "decision"; iteration: number; decision: NextStepDecision }
  | { type: "step"; step: CompletedStep }
  | {
      type: "recovery";
      iteration: number;
      target: string;
      strategy: RecoveryStrategy;
      recovered: boolean;
      reason: string;
    }
  | { type: "warning"; iteration: number; message: string }
  | { type: "backoff"; iteration: number; attempt: number; delayMs: number; reason: string }
  | { type: "done"; result: TaskResult }
  | { type: "error"; message: string };

export type PilotEventCallback = (event: PilotEvent) => void | Promise<void>;
