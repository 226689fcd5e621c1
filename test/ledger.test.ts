import { describe, expect, it } from "vitest";
import { StepLedger, type StepInput } from "../src/core/ledger.js";

const step = (overrides: Partial<StepInput> = {}): StepInput => ({
  action: "tap",
  target: "OK",
  description: "Tap OK",
  parameters: {},
  success: true,
  uiBefore: ["Home"],
  uiAfter: ["Home", "Dialog"],
  uiChanged: true,
  retryCount: 0,
  durationMs: 10,
  recovery: false,
  ...overrides,
});

const failed = (error: string, target = "OK") =>
  step({ success: false, error, target, uiAfter: ["Home"], uiChanged: false });

const unchangedSwipe = (direction: "up" | "down") =>
  step({
    action: "swipe",
    target: direction,
    description: `Swipe ${direction}`,
    parameters: { direction },
    uiAfter: ["Home"],
    uiChanged: false,
  });

describe("StepLedger", () => {
  it("numbers and freezes records in append order", () => {
    const ledger = new StepLedger();
    const first = ledger.append(step());
    const second = ledger.append(step({ target: "Next" }));

    expect([first.index, second.index]).toEqual([1, 2]);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.uiAfter)).toBe(true);
    expect(ledger.all().map((s) => s.target)).toEqual(["OK", "Next"]);
    expect(ledger.length).toBe(2);
  });

  it("counts the trailing failure streak and skips recovery records", () => {
    const ledger = new StepLedger();
    ledger.append(step());
    ledger.append(failed("e1"));
    ledger.append(step({ action: "swipe", recovery: true }));
    ledger.append(failed("e2"));
    expect(ledger.consecutiveFailures()).toBe(2);

    ledger.append(step());
    expect(ledger.consecutiveFailures()).toBe(0);
  });

  it("reports the last failure reasons oldest first", () => {
    const ledger = new StepLedger();
    ledger.append(failed("e1", "A"));
    ledger.append(failed("e2", "B"));
    ledger.append(failed("e3", "C"));
    ledger.append(failed("e4", "D"));
    expect(ledger.lastFailureReasons(3)).toEqual(["[tap:B] e2", "[tap:C] e3", "[tap:D] e4"]);
  });

  it("counts successful steps that left the screen unchanged", () => {
    const ledger = new StepLedger();
    ledger.append(step({ uiChanged: false }));
    ledger.append(step({ uiChanged: false }));
    ledger.append(step({ uiChanged: false }));
    expect(ledger.consecutiveNoChange()).toBe(3);

    ledger.append(failed("boom"));
    expect(ledger.consecutiveNoChange()).toBe(0);
  });

  it("detects a stuck scroll direction", () => {
    const ledger = new StepLedger();
    ledger.append(unchangedSwipe("up"));
    expect(ledger.stuckScrollDirection()).toBeNull();
    ledger.append(unchangedSwipe("up"));
    expect(ledger.stuckScrollDirection()).toBe("up");

    const anomalies = ledger.detectAnomalies();
    expect(anomalies.find((a) => a.kind === "stuck_scroll")).toEqual({
      kind: "stuck_scroll",
      direction: "up",
      suggested: "down",
      message: "Scrolling up twice did not change the screen; scroll down instead.",
    });
  });

  it("does not call a scroll stuck when one of them moved the screen", () => {
    const ledger = new StepLedger();
    ledger.append(unchangedSwipe("up"));
    ledger.append(step({ action: "swipe", parameters: { direction: "up" }, uiChanged: true }));
    expect(ledger.stuckScrollDirection()).toBeNull();
  });

  it("flags the same action on the same target three times in a row", () => {
    const ledger = new StepLedger();
    ledger.append(step({ action: "tap" }));
    ledger.append(step({ action: "click" }));
    ledger.append(step({ action: "tap" }));
    const repetition = ledger.detectAnomalies().find((a) => a.kind === "repetition");
    expect(repetition?.message).toBe(
      'The same tap on "OK" ran 3 times in a row. You must change strategy.'
    );
  });

  it("flags a pause and play loop across both keywords", () => {
    const ledger = new StepLedger();
    ledger.append(step({ target: "Pause", description: "Tap Pause" }));
    ledger.append(step({ target: "Play", description: "Tap Play" }));
    ledger.append(step({ target: "Pause", description: "Tap Pause" }));
    const oscillation = ledger.detectAnomalies().find((a) => a.kind === "oscillation");
    expect(oscillation).toEqual({
      kind: "oscillation",
      count: 3,
      keywords: ["pause", "play"],
      message: '3 of the last 3 steps toggled "pause"/"play". Do not tap it again.',
    });
  });

  it("counts toggles only inside the last six steps", () => {
    const ledger = new StepLedger();
    ledger.append(step({ target: "播放", description: "点击播放" }));
    ledger.append(step({ target: "暂停", description: "点击暂停" }));
    for (let i = 0; i < 5; i++) ledger.append(step({ target: `Row ${i}`, description: `Tap row ${i}` }));
    ledger.append(step({ target: "Play", description: "Tap Play" }));
    expect(ledger.detectAnomalies().some((a) => a.kind === "oscillation")).toBe(false);
  });

  it("renders history lines with outcome markers and UI deltas", () => {
    const ledger = new StepLedger();
    ledger.append(step());
    ledger.append(failed("boom", "Next"));
    ledger.append(step({ action: "swipe", target: "up", description: "Swipe up", recovery: true, uiChanged: false }));
    ledger.append(step({ uiChanged: false, retryCount: 2 }));

    expect(ledger.render()).toEqual([
      "1. [tap] Tap OK (target: OK) ✓",
      "   + appeared: Dialog",
      "2. [tap] Tap OK (target: Next) ✗ failed: boom",
      "3. [recovery] [swipe] Swipe up (target: up) ✓ (UI unchanged)",
      "4. [tap] Tap OK (target: OK) ✓ (UI unchanged) (retried 2x)",
    ]);
  });

  it("exports an audit log", () => {
    const ledger = new StepLedger();
    ledger.append(failed("boom"));
    expect(ledger.toAuditLog()).toEqual([
      { action: "tap", target: "OK", description: "Tap OK", success: false, error: "boom", durationMs: 10 },
    ]);
  });
});
