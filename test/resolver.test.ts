import { describe, expect, it } from "vitest";
import { UISnapshot } from "../src/core/snapshot.js";
import type { ProposedAction } from "../src/core/types.js";
import { ActionResolver, describeTarget, impliedName } from "../src/resolver/resolver.js";
import { el, input } from "./helpers.js";

const screen = UISnapshot.capture([
  el("Night Drive", [0, 300, 1080, 400]),
  el("Morning Run", [0, 500, 1080, 600]),
  el("Settings", [0, 700, 1080, 800]),
  input("Search", [0, 900, 1080, 1000]),
]);

const tap = (overrides: Partial<ProposedAction>): ProposedAction => ({
  kind: "tap",
  parameters: {},
  description: "Tap item",
  ...overrides,
});

describe("ActionResolver", () => {
  const resolver = new ActionResolver();

  it("resolves an index to the element centre", () => {
    const resolution = resolver.resolve(tap({ targetIndex: 2 }), screen);
    expect(resolution).toMatchObject({
      ok: true,
      via: "index",
      target: "Morning Run",
      command: { type: "tap", point: { x: 540, y: 550 } },
    });
  });

  it("fails an out-of-range index with a recovery hint", () => {
    expect(resolver.resolve(tap({ targetIndex: 9 }), screen)).toEqual({
      ok: false,
      target: "#9",
      reason: "Element index 9 not found (screen has 4 elements)",
      needsRecovery: true,
    });
  });

  it("prefers the name in the description when the index points elsewhere", () => {
    const resolution = resolver.resolve(
      tap({ targetIndex: 1, description: "Tap track: Morning Run" }),
      screen
    );
    expect(resolution).toMatchObject({
      ok: true,
      via: "name_check",
      target: "Morning Run",
      command: { type: "tap", point: { x: 540, y: 550 } },
    });
  });

  it("keeps the index when the description agrees with it", () => {
    const resolution = resolver.resolve(
      tap({ targetIndex: 1, description: 'Tap "Night Drive"' }),
      screen
    );
    expect(resolution).toMatchObject({ ok: true, via: "index", target: "Night Drive" });
  });

  it("matches names exactly, then by substring", () => {
    expect(resolver.resolve(tap({ targetName: "settings" }), screen)).toMatchObject({
      ok: true,
      via: "exact",
      command: { type: "tap", point: { x: 540, y: 750 } },
    });
    expect(resolver.resolve(tap({ targetName: "Night" }), screen)).toMatchObject({
      ok: true,
      via: "substring",
      target: "Night Drive",
    });
  });

  it("picks the nth element top to bottom for ordinal targets", () => {
    expect(resolver.resolve(tap({ targetName: "second song" }), screen)).toMatchObject({
      ok: true,
      via: "ordinal",
      target: "Morning Run",
    });
  });

  it("falls back to keyword hits", () => {
    expect(resolver.resolve(tap({ targetName: "drive mode" }), screen)).toMatchObject({
      ok: true,
      via: "keyword",
      target: "Night Drive",
    });
  });

  it("tries keyword hits before ordinal positions", () => {
    expect(resolver.resolve(tap({ targetName: "second drive" }), screen)).toMatchObject({
      ok: true,
      via: "keyword",
      target: "Night Drive",
    });
  });

  it("reports an unmatched name", () => {
    expect(resolver.resolve(tap({ targetName: "Bluetooth" }), screen)).toEqual({
      ok: false,
      target: "Bluetooth",
      reason: 'Target "Bluetooth" not found on screen',
      needsRecovery: true,
    });
  });

  it("avoids candidates under the status bar", () => {
    const dialog = UISnapshot.capture([el("OK", [0, 50, 100, 100]), el("OK", [0, 500, 100, 600])]);
    expect(resolver.resolve(tap({ targetName: "OK" }), dialog)).toMatchObject({
      ok: true,
      command: { type: "tap", point: { x: 50, y: 550 } },
    });
  });

  it("passes coordinates through", () => {
    expect(resolver.resolve(tap({ coordinate: { x: 10, y: 20 } }), screen)).toMatchObject({
      ok: true,
      via: "coordinate",
      command: { type: "tap", point: { x: 10, y: 20 } },
    });
  });

  it("focuses a named field before typing", () => {
    const resolution = resolver.resolve(
      { kind: "input", targetName: "Search", parameters: { text: "hello" }, description: "Type hello" },
      screen
    );
    expect(resolution).toMatchObject({
      ok: true,
      via: "exact",
      command: { type: "input", text: "hello", focus: { x: 540, y: 950 } },
    });
  });

  it("types into the focused field when no target is given", () => {
    const resolution = resolver.resolve(
      { kind: "input", parameters: { text: "hello" }, description: "Type hello" },
      screen
    );
    expect(resolution).toMatchObject({ ok: true, via: "direct", command: { type: "input", text: "hello" } });
  });

  it("maps non-tap kinds to direct commands", () => {
    const resolve = (action: ProposedAction) => resolver.resolve(action, screen);
    expect(resolve({ kind: "swipe", parameters: {}, description: "Scroll" })).toMatchObject({
      ok: true,
      target: "up",
      command: { type: "swipe", direction: "up", durationMs: 500 },
    });
    expect(resolve({ kind: "back", parameters: {}, description: "Back" })).toMatchObject({
      command: { type: "key", key: "BACK" },
    });
    expect(resolve({ kind: "press_key", parameters: { key: "return" }, description: "Submit" })).toMatchObject({
      command: { type: "key", key: "ENTER" },
    });
    expect(resolve({ kind: "wait", parameters: {}, description: "Wait" })).toMatchObject({
      command: { type: "wait", durationMs: 1000 },
    });
    expect(resolve({ kind: "launch_app", parameters: {}, description: "Launch" })).toMatchObject({
      ok: false,
      reason: "launch_app without a package id",
    });
  });
});

describe("target helpers", () => {
  it("reads the implied name after a colon or inside quotes", () => {
    expect(impliedName(tap({ description: "Tap result: Night Drive" }))).toBe("Night Drive");
    expect(impliedName(tap({ description: "Tap “Night Drive” now" }))).toBe("Night Drive");
    expect(impliedName(tap({ description: "Tap it" }))).toBeNull();
  });

  it("describes targets by name, index, coordinate or parameter", () => {
    expect(describeTarget(tap({ targetName: "OK", targetIndex: 3 }))).toBe("OK");
    expect(describeTarget(tap({ targetIndex: 3 }))).toBe("#3");
    expect(describeTarget(tap({ coordinate: { x: 1, y: 2 } }))).toBe("(1,2)");
    expect(describeTarget({ kind: "swipe", parameters: { direction: "left" }, description: "" })).toBe("left");
  });
});
