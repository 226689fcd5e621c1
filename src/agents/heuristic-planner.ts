import type { StepLedger } from "../core/ledger.js";
import { isScrollLike } from "../core/ledger.js";
import type { UISnapshot } from "../core/snapshot.js";
import type { ActionKind, NextStepDecision, ProposedAction, SwipeDirection } from "../core/types.js";
import { KEY_CODES, normalizeKeyName } from "../device/keys.js";
import type { Planner, TaskContext } from "./planner.js";

type RuleContext = {
  instruction: string;
  snapshot: UISnapshot;
  ledger: StepLedger;
  homeScreenMarkers: readonly string[];
};

type Rule = {
  name: string;
  decide(ctx: RuleContext): NextStepDecision | null;
};

const HOME_PATTERN = /\bhome\s*screen\b|\bgo\s+home\b|\breturn\s+home\b|回到?桌面|主屏幕|返回主页/i;
const BACK_PATTERN = /^\s*(go\s+back|back|返回|后退)\s*$/i;
const SWIPE_PATTERN = /\b(swipe|scroll)\b|滑动|上滑|下滑|左滑|右滑/i;
const KEY_PATTERN = /\bpress\s+(?:the\s+)?([a-z_ ]+?)\s*(?:key|button)?\s*$/i;
const LAUNCH_PATTERN = /(?:launch|open|start|打开|启动)\s*([a-z][\w]*(?:\.[\w]+)+)/i;

const DIRECTION_WORDS: Array<[RegExp, SwipeDirection]> = [
  [/\bup\b|上/i, "up"],
  [/\bdown\b|下/i, "down"],
  [/\bleft\b|左/i, "left"],
  [/\bright\b|右/i, "right"],
];

const step = (action: ProposedAction, reason: string): NextStepDecision => ({
  type: "single_step",
  action,
  reason,
  confidence: 0.9,
});

const complete = (reason: string): NextStepDecision => ({
  type: "task_complete",
  reason,
  confidence: 0.9,
});

function lastSucceeded(ledger: StepLedger, kinds: ActionKind[], requireChange = false) {
  const last = ledger.lastPrimary();
  if (!last || !last.success || !kinds.includes(last.action)) return false;
  return requireChange ? last.uiChanged : true;
}

const RULES: Rule[] = [
  {
    name: "home",
    decide: ({ instruction, snapshot, homeScreenMarkers }) => {
      if (!HOME_PATTERN.test(instruction)) return null;
      if (snapshot.isHomeScreen(homeScreenMarkers)) {
        return complete("The home screen is showing");
      }
      return step({ kind: "home", parameters: {}, description: "Press HOME" }, "Not on the home screen yet");
    },
  },
  {
    name: "back",
    decide: ({ instruction, ledger }) => {
      if (!BACK_PATTERN.test(instruction)) return null;
      if (lastSucceeded(ledger, ["back"])) return complete("Navigated back");
      return step({ kind: "back", parameters: {}, description: "Press BACK" }, "Instruction asks to go back");
    },
  },
  {
    name: "swipe",
    decide: ({ instruction, ledger }) => {
      if (!SWIPE_PATTERN.test(instruction)) return null;
      const direction = DIRECTION_WORDS.find(([pattern]) => pattern.test(instruction))?.[1] ?? "up";
      const last = ledger.lastPrimary();
      if (last && last.success && last.uiChanged && isScrollLike(last.action)) {
        return complete(`Swiped ${last.parameters.direction ?? direction} and the screen moved`);
      }
      return step(
        { kind: "swipe", parameters: { direction }, description: `Swipe ${direction}` },
        `Instruction asks to swipe ${direction}`
      );
    },
  },
  {
    name: "launch",
    decide: ({ instruction, ledger }) => {
      const packageId = LAUNCH_PATTERN.exec(instruction)?.[1];
      if (!packageId) return null;
      if (lastSucceeded(ledger, ["launch_app"])) return complete(`Launched ${packageId}`);
      return step(
        { kind: "launch_app", parameters: { packageId }, description: `Launch ${packageId}` },
        "Instruction names an app package"
      );
    },
  },
  {
    name: "key",
    decide: ({ instruction, ledger }) => {
      const raw = KEY_PATTERN.exec(instruction)?.[1];
      if (!raw) return null;
      const key = normalizeKeyName(raw);
      if (!KEY_CODES[key]) return null;
      if (lastSucceeded(ledger, ["press_key", "back", "home"])) return complete(`Pressed ${key}`);
      return step(
        { kind: "press_key", parameters: { key }, description: `Press ${key}` },
        `Instruction asks to press ${key}`
      );
    },
  },
];

/**
 * Reasoning-free planner for direct device commands (go home, go back, swipe,
 * press a key, launch a package). Anything else is a confidence-0 no-op.
 */
export class HeuristicPlanner implements Planner {
  private readonly homeScreenMarkers: readonly string[];

  constructor(opts: { homeScreenMarkers?: readonly string[] } = {}) {
    this.homeScreenMarkers = opts.homeScreenMarkers ?? [];
  }

  async plan(task: TaskContext, snapshot: UISnapshot, ledger: StepLedger): Promise<NextStepDecision> {
    const ctx: RuleContext = {
      instruction: task.instruction,
      snapshot,
      ledger,
      homeScreenMarkers: this.homeScreenMarkers,
    };
    for (const rule of RULES) {
      const decision = rule.decide(ctx);
      if (decision) return decision;
    }
    return { type: "no_op", reason: "No rule matches this instruction", confidence: 0 };
  }
}
