import { Mastra } from "@mastra/core";
import { Agent } from "@mastra/core/agent";
import { ConsoleLogger } from "@mastra/core/logger";

export const DEFAULT_MODEL = "openai/gpt-4.1";

export function createPlannerAgent(model: string = DEFAULT_MODEL): Agent {
  return new Agent({
    name: "pilot-planner",
    model,
    instructions: [
      "You drive an Android phone for a user, choosing exactly one next move per turn.",
      "Read the task, the completed steps and the indexed element list before deciding.",
      "Only reference element indices that appear in the current list.",
      "Return JSON only, in the shape the prompt describes.",
    ],
  });
}

export function createTaskPlanAgent(model: string = DEFAULT_MODEL): Agent {
  return new Agent({
    name: "pilot-task-plan",
    model,
    instructions: [
      "You outline how a task will be carried out on an Android phone before it starts.",
      "Keep steps short and UI-anchored (e.g. 'Open Settings → Tap Wi-Fi → Toggle on').",
      "List the risks that could block progress, such as permission dialogs or login walls.",
      "Return JSON only.",
    ],
  });
}

export function createRecoveryAgent(model: string = DEFAULT_MODEL): Agent {
  return new Agent({
    name: "pilot-recovery",
    model,
    instructions: [
      "A step of a phone automation task just failed. Pick a single recovery maneuver.",
      "Prefer scrolling when the target is probably off screen and close_popup when a dialog covers it.",
      "Choose give_up only when no maneuver can bring the target into reach.",
      "Return JSON only.",
    ],
  });
}

export type PilotAgents = {
  planner: Agent;
  taskPlan: Agent;
  recovery: Agent;
};

export function createPilotAgents(model: string = DEFAULT_MODEL): PilotAgents {
  return {
    planner: createPlannerAgent(model),
    taskPlan: createTaskPlanAgent(model),
    recovery: createRecoveryAgent(model),
  };
}

/** Registers the pilot agents so Mastra tooling can discover them. */
export function createPilotMastra(model: string = DEFAULT_MODEL, agents = createPilotAgents(model)) {
  return new Mastra({
    logger: new ConsoleLogger({ name: "mobipilot" }),
    agents: {
      plannerAgent: agents.planner,
      taskPlanAgent: agents.taskPlan,
      recoveryAgent: agents.recovery,
    },
  });
}
