import type { StepLedger } from "./ledger.js";
import { isScrollLike, isTapLike, oppositeDirection } from "./ledger.js";
import type { UISnapshot } from "./snapshot.js";
import { labelOf } from "./snapshot.js";
import type { ProposedAction, SwipeDirection } from "./types.js";

/** Phrasing that means "the Nth element", where a digit is a position rather than a key. */
const POSITIONAL_PHRASING =
  /第.+?(个|元素)|编号|\bindex\b|\bposition\b|\belement\s*#?\d|\b(first|second|third|fourth|fifth|1st|2nd|3rd|4th|5th|nth)\b/i;

const INPUT_HINTS = ["input", "edit", "search", "field", "输入", "搜索", "编辑"];

/** The single digit a tap presses, from its target name or the indexed element's label. */
export function digitOf(action: ProposedAction, snapshot: UISnapshot): string | null {
  if (!isTapLike(action.kind)) return null;
  const name = action.targetName?.trim();
  if (name && /^\d$/.test(name)) return name;
  if (action.targetIndex !== undefined) {
    const label = snapshot.lookupByIndex(action.targetIndex);
    const text = label ? labelOf(label.element) : "";
    if (/^\d$/.test(text)) return text;
  }
  return null;
}

export function lastStepTappedInput(ledger: StepLedger) {
  const last = ledger.lastPrimary();
  if (!last || !last.success || !isTapLike(last.action)) return false;
  const haystack = `${last.target} ${last.description}`.toLowerCase();
  return INPUT_HINTS.some((hint) => haystack.includes(hint));
}

export type DigitCollapse = { actions: ProposedAction[]; collapsedDigits: string | null };

/**
 * Turns a batch of single-digit taps into one text input when a text field is
 * on screen (or the previous step focused one). Skipped when any description
 * talks about element positions.
 */
export function collapseDigitBatch(
  actions: ProposedAction[],
  snapshot: UISnapshot,
  ledger: StepLedger
): DigitCollapse {
  const focused = lastStepTappedInput(ledger);
  const minimum = focused ? 1 : 2;
  if (actions.length < minimum) return { actions, collapsedDigits: null };
  if (!snapshot.hasTextInput() && !focused) return { actions, collapsedDigits: null };
  if (actions.some((action) => POSITIONAL_PHRASING.test(action.description))) {
    return { actions, collapsedDigits: null };
  }

  const digits: string[] = [];
  for (const action of actions) {
    const digit = digitOf(action, snapshot);
    if (digit === null) return { actions, collapsedDigits: null };
    digits.push(digit);
  }

  const text = digits.join("");
  return {
    actions: [{ kind: "input", parameters: { text }, description: `Input digits ${text}` }],
    collapsedDigits: text,
  };
}

export const DEFAULT_SWIPE_DIRECTION: SwipeDirection = "up";

/** Writes the default direction into swipes proposed without one, so the ledger records where they went. */
export function withSwipeDirections(actions: ProposedAction[]): ProposedAction[] {
  return actions.map((action) =>
    isScrollLike(action.kind) && !action.parameters.direction
      ? { ...action, parameters: { ...action.parameters, direction: DEFAULT_SWIPE_DIRECTION } }
      : action
  );
}

export type ScrollCorrection = {
  actions: ProposedAction[];
  correction: { stuck: SwipeDirection; forced: SwipeDirection } | null;
};

/**
 * After two unchanged swipes in one direction, the next swipe goes the other
 * way whatever the planner proposed.
 */
export function correctStuckScroll(actions: ProposedAction[], ledger: StepLedger): ScrollCorrection {
  const stuck = ledger.stuckScrollDirection();
  if (!stuck) return { actions, correction: null };
  const position = actions.findIndex((action) => isScrollLike(action.kind));
  const target = actions[position];
  if (position === -1 || !target) return { actions, correction: null };

  const forced = oppositeDirection(stuck);
  const corrected: ProposedAction = {
    ...target,
    parameters: { ...target.parameters, direction: forced },
    description: `${target.description} (direction corrected to ${forced})`,
  };
  return {
    actions: actions.map((action, i) => (i === position ? corrected : action)),
    correction: { stuck, forced },
  };
}
