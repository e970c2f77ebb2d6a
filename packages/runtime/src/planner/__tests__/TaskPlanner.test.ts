import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Plan } from "../../types/index.js";
import { PlanSchema } from "../../types/index.js";
import { ScriptedModelGateway, textCompletion } from "../../llm/ScriptedModelGateway.js";
import { FALLBACK_STRATEGY, TaskPlanner } from "../TaskPlanner.js";

const FIXED_NOW = new Date("2024-05-01T12:00:00.000Z");

function plannerWith(gateway: ScriptedModelGateway, maxSubtasks?: number) {
  return new TaskPlanner({
    gateway,
    now: () => FIXED_NOW,
    ...(maxSubtasks === undefined ? {} : { maxSubtasks }),
  });
}

describe("TaskPlanner.createPlan", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("builds a pending plan from a fenced JSON answer", async () => {
    const gateway = new ScriptedModelGateway([
      textCompletion(
        [
          "Here is the plan:",
          "```json",
          JSON.stringify({
            strategy: "  Research first  ",
            subtasks: [
              { id: 1, description: "Find sources", reasoning: "Need facts", dependencies: [] },
              { id: 2, description: "Write summary", reasoning: "Deliverable", dependencies: [1] },
            ],
          }),
          "```",
        ].join("\n")
      ),
    ]);

    const plan = await plannerWith(gateway).createPlan("Summarise a topic", "for students");

    expect(plan).toEqual({
      goal: "Summarise a topic",
      strategy: "Research first",
      createdAt: "2024-05-01T12:00:00.000Z",
      subtasks: [
        {
          id: 1,
          description: "Find sources",
          reasoning: "Need facts",
          dependencies: [],
          status: "pending",
        },
        {
          id: 2,
          description: "Write summary",
          reasoning: "Deliverable",
          dependencies: [1],
          status: "pending",
        },
      ],
    });
    const userTurn = gateway.calls[0].conversation[1];
    expect(userTurn).toEqual({
      role: "user",
      content:
        "Goal: Summarise a topic\n\nContext: for students\n\nPlease create a detailed plan to achieve this goal.",
    });
  });

  it("repairs ids and dependencies so the plan satisfies its invariants", async () => {
    const gateway = new ScriptedModelGateway([
      textCompletion(
        JSON.stringify({
          subtasks: [
            { description: "A", dependencies: [] },
            { id: 1, description: "B", dependencies: [1, 1, 9] },
            { id: "3", description: "C", dependencies: ["1", 2, 3] },
          ],
        })
      ),
    ]);

    const plan = await plannerWith(gateway).createPlan("Do A, B and C");

    expect(plan.subtasks.map((subtask) => [subtask.id, subtask.dependencies])).toEqual([
      [1, []],
      [2, [1]],
      [3, [1, 2]],
    ]);
    expect(plan.strategy).toBe("");
    expect(PlanSchema.safeParse(plan).success).toBe(true);
  });

  it("keeps at most maxSubtasks subtasks", async () => {
    const gateway = new ScriptedModelGateway([
      textCompletion(
        JSON.stringify({
          subtasks: [
            { id: 1, description: "one" },
            { id: 2, description: "two", dependencies: [1] },
            { id: 3, description: "three", dependencies: [2] },
          ],
        })
      ),
    ]);

    const plan = await plannerWith(gateway, 2).createPlan("Count");

    expect(plan.subtasks.map((subtask) => subtask.description)).toEqual(["one", "two"]);
  });

  it("drops dependencies on subtasks that were cut off", async () => {
    const gateway = new ScriptedModelGateway([
      textCompletion(
        JSON.stringify({
          subtasks: [
            { id: 1, description: "one", dependencies: [3] },
            { id: 2, description: "two" },
            { id: 3, description: "three" },
          ],
        })
      ),
    ]);

    const plan = await plannerWith(gateway, 2).createPlan("Count");

    expect(plan.subtasks[0].dependencies).toEqual([]);
  });

  it.each([
    ["unparsable text", textCompletion("I would rather not plan today")],
    ["an empty subtask list", textCompletion('{"strategy": "none", "subtasks": []}')],
    ["a gateway error", new Error("service unavailable")],
  ])("falls back to a single subtask on %s", async (_label, step) => {
    const gateway = new ScriptedModelGateway([step]);

    const plan = await plannerWith(gateway).createPlan("Write a poem");

    expect(plan).toEqual({
      goal: "Write a poem",
      strategy: FALLBACK_STRATEGY,
      createdAt: "2024-05-01T12:00:00.000Z",
      subtasks: [
        {
          id: 1,
          description: "Write a poem",
          reasoning: "Direct execution of the goal",
          dependencies: [],
          status: "pending",
        },
      ],
    });
  });

  it("does not call an unconfigured gateway", async () => {
    const gateway = new ScriptedModelGateway([], { configured: false });

    const plan = await plannerWith(gateway).createPlan("Write a poem");

    expect(plan.strategy).toBe(FALLBACK_STRATEGY);
    expect(gateway.calls).toHaveLength(0);
  });
});

describe("TaskPlanner.replan", () => {
  const original: Plan = {
    goal: "Ship the feature",
    strategy: "Small steps",
    createdAt: "2024-04-30T00:00:00.000Z",
    subtasks: [
      {
        id: 1,
        description: "Write code",
        reasoning: "",
        dependencies: [],
        status: "completed",
        result: { success: true, output: "code written" },
      },
      {
        id: 2,
        description: "Run tests",
        reasoning: "",
        dependencies: [1],
        status: "failed",
        result: { success: false, output: "", error: "tests failed" },
      },
    ],
  };

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("marks completed ids and keeps their results", async () => {
    const gateway = new ScriptedModelGateway([
      textCompletion(
        JSON.stringify({
          strategy: "",
          subtasks: [
            { id: 1, description: "Write code", dependencies: [] },
            { id: 2, description: "Fix the failing test", dependencies: [1] },
            { id: 3, description: "Run tests again", dependencies: [2] },
          ],
        })
      ),
    ]);

    const revised = await plannerWith(gateway).replan(original, new Set([1]), "tests failed");

    expect(revised.goal).toBe("Ship the feature");
    expect(revised.strategy).toBe("Small steps");
    expect(revised.subtasks.map((subtask) => [subtask.id, subtask.status])).toEqual([
      [1, "completed"],
      [2, "pending"],
      [3, "pending"],
    ]);
    expect(revised.subtasks[0].result).toEqual({ success: true, output: "code written" });
    expect(revised.subtasks[1].result).toBeUndefined();

    const userTurn = gateway.calls[0].conversation[1];
    expect(userTurn.role).toBe("user");
    if (userTurn.role === "user") {
      expect(userTurn.content).toContain("Completed Subtasks: [1]");
      expect(userTurn.content).toContain("Failure Reason: tests failed");
    }
  });

  it("returns the same plan object when the answer cannot be used", async () => {
    const gateway = new ScriptedModelGateway([textCompletion("no idea")]);

    const revised = await plannerWith(gateway).replan(original, new Set([1]), "tests failed");

    expect(revised).toBe(original);
  });

  it("returns the same plan object when the gateway fails", async () => {
    const gateway = new ScriptedModelGateway([new Error("timeout")]);

    const revised = await plannerWith(gateway).replan(original, new Set(), "tests failed");

    expect(revised).toBe(original);
  });
});
