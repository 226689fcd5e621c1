import { describe, expect, it } from "vitest";
import { basicTaskPlan, generateTaskPlan } from "../src/agents/task-plan.js";
import { UISnapshot } from "../src/core/snapshot.js";
import { ScriptedReasoner, el, json } from "./helpers.js";

describe("generateTaskPlan", () => {
  it("maps the reply onto a task plan", async () => {
    const reasoning = new ScriptedReasoner([
      json({
        summary: "Open the player and start a song",
        steps: ["Open the music app", { description: "Tap the first song" }],
        potential_issues: ["Login wall"],
        success_criteria: ["Song is playing", "Mini player visible"],
        confidence: 90,
      }),
    ]);

    const plan = await generateTaskPlan(reasoning, "Play a song");

    expect(plan).toEqual({
      instruction: "Play a song",
      summary: "Open the player and start a song",
      steps: ["Open the music app", "Tap the first song"],
      risks: ["Login wall"],
      successCriteria: "Song is playing; Mini player visible",
      estimatedSteps: 2,
      confidence: 0.9,
    });
  });

  it("shows the current screen in the prompt when given", async () => {
    const reasoning = new ScriptedReasoner([json({ summary: "s" })]);
    await generateTaskPlan(reasoning, "Play a song", UISnapshot.capture([el("Music", [0, 300, 200, 400])]));
    expect(reasoning.prompts[0]).toContain("Current screen:\n[1]★ Music");
  });

  it("falls back to a one-step plan when reasoning fails", async () => {
    const plan = await generateTaskPlan(new ScriptedReasoner([new Error("offline")]), "Play a song");
    expect(plan).toEqual(basicTaskPlan("Play a song", 0.5));
  });

  it("falls back with higher confidence when the reply is unusable", async () => {
    const plan = await generateTaskPlan(new ScriptedReasoner([json({ steps: "not a list" })]), "Play a song");
    expect(plan).toEqual({
      instruction: "Play a song",
      summary: "Play a song",
      steps: ["Play a song"],
      risks: [],
      successCriteria: "The screen shows the requested outcome",
      estimatedSteps: 5,
      confidence: 0.6,
    });
  });
});
