import { describe, expect, it } from "vitest";
import { StepLedger, type StepInput } from "../src/core/ledger.js";
import { UISnapshot } from "../src/core/snapshot.js";
import { collapseDigitBatch, correctStuckScroll, digitOf, withSwipeDirections } from "../src/core/transforms.js";
import type { ProposedAction } from "../src/core/types.js";
import { el, input } from "./helpers.js";

const keypad = UISnapshot.capture([
  input("Amount", [0, 200, 1080, 300]),
  el("1", [0, 1000, 360, 1100]),
  el("2", [360, 1000, 720, 1100]),
  el("3", [720, 1000, 1080, 1100]),
]);

const tapDigit = (index: number, description = "Press key"): ProposedAction => ({
  kind: "tap",
  targetIndex: index,
  parameters: {},
  description,
});

const swipe = (direction: "up" | "down", uiChanged: boolean): StepInput => ({
  action: "swipe",
  target: direction,
  description: `Swipe ${direction}`,
  parameters: { direction },
  success: true,
  uiBefore: ["A"],
  uiAfter: ["A"],
  uiChanged,
  retryCount: 0,
  durationMs: 1,
  recovery: false,
});

describe("collapseDigitBatch", () => {
  it("turns digit taps into one input when a field is on screen", () => {
    const result = collapseDigitBatch([tapDigit(2), tapDigit(4), tapDigit(3)], keypad, new StepLedger());
    expect(result).toEqual({
      actions: [{ kind: "input", parameters: { text: "132" }, description: "Input digits 132" }],
      collapsedDigits: "132",
    });
  });

  it("reads digits from target names too", () => {
    const actions: ProposedAction[] = [
      { kind: "click", targetName: "7", parameters: {}, description: "Press 7" },
      { kind: "tap", targetName: "0", parameters: {}, description: "Press 0" },
    ];
    expect(collapseDigitBatch(actions, keypad, new StepLedger()).collapsedDigits).toBe("70");
  });

  it("leaves a batch alone when any tap is not a digit", () => {
    const actions = [tapDigit(2), { ...tapDigit(1), description: "Tap amount" }];
    const result = collapseDigitBatch(actions, keypad, new StepLedger());
    expect(result.collapsedDigits).toBeNull();
    expect(result.actions).toBe(actions);
  });

  it("leaves positional phrasing alone", () => {
    const actions = [tapDigit(2, "Tap the first element"), tapDigit(3)];
    expect(collapseDigitBatch(actions, keypad, new StepLedger()).collapsedDigits).toBeNull();
  });

  it("needs a text field on screen unless one was just focused", () => {
    const noField = UISnapshot.capture([el("1", [0, 1000, 360, 1100]), el("2", [360, 1000, 720, 1100])]);
    expect(collapseDigitBatch([tapDigit(1), tapDigit(2)], noField, new StepLedger()).collapsedDigits).toBeNull();

    const ledger = new StepLedger();
    ledger.append({ ...swipe("up", true), action: "tap", target: "Search field", description: "Tap search" });
    expect(collapseDigitBatch([tapDigit(1)], noField, ledger).collapsedDigits).toBe("1");
  });

  it("digitOf ignores non-tap actions", () => {
    expect(digitOf({ kind: "input", targetName: "1", parameters: {}, description: "" }, keypad)).toBeNull();
  });
});

describe("correctStuckScroll", () => {
  it("reverses the first swipe after two unchanged swipes the same way", () => {
    const ledger = new StepLedger();
    ledger.append(swipe("up", false));
    ledger.append(swipe("up", false));
    const actions: ProposedAction[] = [
      { kind: "wait", parameters: {}, description: "Wait" },
      { kind: "swipe", parameters: { direction: "up" }, description: "Scroll for more" },
    ];

    const result = correctStuckScroll(actions, ledger);

    expect(result.correction).toEqual({ stuck: "up", forced: "down" });
    expect(result.actions[1]).toEqual({
      kind: "swipe",
      parameters: { direction: "down" },
      description: "Scroll for more (direction corrected to down)",
    });
    expect(result.actions[0]).toBe(actions[0]);
  });

  it("does nothing when the screen moved", () => {
    const ledger = new StepLedger();
    ledger.append(swipe("up", false));
    ledger.append(swipe("up", true));
    const actions: ProposedAction[] = [{ kind: "swipe", parameters: { direction: "up" }, description: "Scroll" }];
    expect(correctStuckScroll(actions, ledger)).toEqual({ actions, correction: null });
  });
});

describe("withSwipeDirections", () => {
  it("fills in the default direction and keeps explicit ones", () => {
    const actions: ProposedAction[] = [
      { kind: "scroll", parameters: {}, description: "Scroll" },
      { kind: "swipe", parameters: { direction: "left" }, description: "Swipe left" },
      { kind: "tap", targetName: "OK", parameters: {}, description: "Tap OK" },
    ];
    expect(withSwipeDirections(actions).map((a) => a.parameters.direction)).toEqual(["up", "left", undefined]);
    expect(actions[0]?.parameters.direction).toBeUndefined();
  });
});
