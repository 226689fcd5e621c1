import { describe, expect, it } from "vitest";
import { createPilotMastra } from "../src/mastra/index.js";

describe("createPilotMastra", () => {
  it("registers the planner, task plan and recovery agents", () => {
    const mastra = createPilotMastra("openai/gpt-4.1-mini");

    expect(mastra.getAgent("plannerAgent").name).toBe("pilot-planner");
    expect(mastra.getAgent("taskPlanAgent").name).toBe("pilot-task-plan");
    expect(mastra.getAgent("recoveryAgent").name).toBe("pilot-recovery");
  });
});
