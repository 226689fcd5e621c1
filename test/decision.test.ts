import { describe, expect, it } from "vitest";
import { extractJsonObject, normalizeConfidence, parseDecision } from "../src/agents/decision.js";
import { DecisionParseError } from "../src/utils/errors.js";
import { json } from "./helpers.js";

describe("parseDecision", () => {
  it("reads a fenced completion and scales percentage confidence", () => {
    const reply = '```json\n{"task_complete": true, "reason": "Done", "confidence": 95}\n```';
    expect(parseDecision(reply)).toEqual({ type: "task_complete", reason: "Done", confidence: 0.95 });
  });

  it("treats a numeric target as an element index", () => {
    const reply = json({
      task_complete: false,
      next_step: { action: "tap", target: 3, description: "Tap search box: Search" },
    });
    expect(parseDecision(reply)).toEqual({
      type: "single_step",
      action: { kind: "tap", targetIndex: 3, parameters: {}, description: "Tap search box: Search" },
      reason: "",
      confidence: 0.5,
    });
  });

  it("reads the element index from target_index", () => {
    const reply = json({
      task_complete: false,
      next_step: { action: "tap", target_index: 4, description: "Tap Settings" },
      reason: "Open settings",
      confidence: 0.8,
    });
    expect(parseDecision(reply)).toEqual({
      type: "single_step",
      action: { kind: "tap", targetIndex: 4, parameters: {}, description: "Tap Settings" },
      reason: "Open settings",
      confidence: 0.8,
    });
  });

  it("decodes a batch with aliases and string indices", () => {
    const reply = json({
      next_steps: [
        { action: "tap", element_index: "2" },
        { action: "type", parameters: { text: "42" } },
      ],
      reason: "Enter the code",
      confidence: 0.7,
    });
    expect(parseDecision(reply)).toEqual({
      type: "batch_steps",
      actions: [
        { kind: "tap", targetIndex: 2, parameters: {}, description: "tap 2" },
        { kind: "input", parameters: { text: "42" }, description: "input" },
      ],
      reason: "Enter the code",
      confidence: 0.7,
    });
  });

  it("moves direction, key and package names into parameters", () => {
    const swipe = parseDecision(json({ next_step: { action: "scroll", target: "Down" } }));
    expect(swipe).toMatchObject({ action: { kind: "scroll", parameters: { direction: "down" } } });
    expect(swipe.type === "single_step" ? swipe.action.targetName : "missing").toBeUndefined();

    expect(parseDecision(json({ next_step: { action: "press_key", target: "enter" } }))).toMatchObject({
      action: { kind: "press_key", parameters: { key: "enter" } },
    });
    expect(parseDecision(json({ next_step: { action: "open_app", package: "com.example.music" } }))).toMatchObject({
      action: { kind: "launch_app", parameters: { packageId: "com.example.music" } },
    });
  });

  it("keeps rounded coordinates", () => {
    const decision = parseDecision(json({ next_step: { action: "tap", parameters: { x: "100.4", y: 200 } } }));
    expect(decision).toMatchObject({ action: { coordinate: { x: 100, y: 200 } } });
  });

  it("finds the object inside surrounding prose", () => {
    const reply = 'Sure! {"task_complete": false, "next_step": {"action": "back"}} hope it helps';
    expect(parseDecision(reply)).toMatchObject({ type: "single_step", action: { kind: "back" } });
  });

  it("returns a no-op when no step is proposed", () => {
    expect(parseDecision("{}")).toEqual({ type: "no_op", reason: "No action proposed", confidence: 0.5 });
  });

  it("rejects unknown actions, missing JSON and malformed fields", () => {
    expect(() => parseDecision(json({ next_step: { action: "dance" } }))).toThrow(
      'Unknown action "dance" in step 1'
    );
    expect(() => parseDecision("I am not sure")).toThrow(DecisionParseError);
    expect(() => parseDecision(json({ next_step: { action: 5 } }))).toThrow(
      /^Malformed decision: next_step\.action: /
    );
  });
});

describe("decision helpers", () => {
  it("clamps confidence into 0..1", () => {
    expect(normalizeConfidence(150, 0.5)).toBe(1);
    expect(normalizeConfidence(-1, 0.5)).toBe(0);
    expect(normalizeConfidence(undefined, 0.5)).toBe(0.5);
  });

  it("prefers a fenced block over bare braces", () => {
    expect(extractJsonObject('{"a": 1} then ```{"b": 2}```')).toEqual({ b: 2 });
  });
});
