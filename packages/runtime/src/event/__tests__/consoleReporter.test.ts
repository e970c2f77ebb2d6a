import { describe, expect, it } from "vitest";
import type { Plan } from "../../types/index.js";
import { EventBus } from "../EventBus.js";
import { attachConsoleReporter, renderEvent } from "../consoleReporter.js";

const plan: Plan = {
  goal: "Goal",
  strategy: "",
  createdAt: "2024-01-01T00:00:00.000Z",
  subtasks: [
    { id: 1, description: "Collect", reasoning: "", dependencies: [], status: "pending" },
    { id: 2, description: "Summarise", reasoning: "", dependencies: [1], status: "pending" },
  ],
};

describe("attachConsoleReporter", () => {
  it("prints progress lines for the events it knows", () => {
    const bus = new EventBus();
    const lines: string[] = [];
    const subscription = attachConsoleReporter(bus, { write: (line) => lines.push(line) });

    bus.publish("plan.created", "trace", { plan });
    bus.publish("subtask.started", "trace", { description: "Collect" }, 1);
    bus.publish("agent.transition", "trace", { state: "executing" });
    bus.publish("subtask.finished", "trace", { success: false, error: "boom" }, 1);
    bus.publish("subtask.skipped", "trace", {}, 2);
    bus.publish("agent.thought", "trace", { kind: "reasoning", content: "Retry with a smaller input" });
    subscription.unsubscribe();
    bus.publish("subtask.started", "trace", { description: "ignored" }, 3);

    expect(lines).toEqual([
      "[Planner] Plan created with 2 subtasks\n  1. Collect\n  2. Summarise (depends on: 1)",
      "[Orchestrator] Executing subtask 1: Collect",
      "[Orchestrator] Subtask 1 failed: boom",
      "[Orchestrator] Skipping subtask 2: dependencies not met",
      "[Thinking] (reasoning) Retry with a smaller input",
    ]);
  });
});

describe("renderEvent", () => {
  it("ignores payloads of an unexpected shape", () => {
    expect(
      renderEvent({
        eventId: "e1",
        type: "agent.finished",
        timestamp: 0,
        traceId: "trace",
        payload: { evaluation: "not an evaluation" },
      })
    ).toBeNull();
  });
});
