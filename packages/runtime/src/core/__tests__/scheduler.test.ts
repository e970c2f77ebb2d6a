import { describe, expect, it } from "vitest";
import type { Plan, SubTask } from "../../types/index.js";
import { dependenciesMet, selectNextSubtask } from "../scheduler.js";

function subtask(
  id: number,
  dependencies: number[] = [],
  status: SubTask["status"] = "pending"
): SubTask {
  return { id, description: `Task ${id}`, reasoning: "", dependencies, status };
}

function plan(subtasks: SubTask[]): Plan {
  return {
    goal: "Goal",
    strategy: "",
    createdAt: "2024-01-01T00:00:00.000Z",
    subtasks,
  };
}

describe("dependenciesMet", () => {
  it("requires every dependency to be completed", () => {
    expect(dependenciesMet(subtask(3, [1, 2]), new Set([1]))).toBe(false);
    expect(dependenciesMet(subtask(3, [1, 2]), new Set([1, 2]))).toBe(true);
    expect(dependenciesMet(subtask(1), new Set())).toBe(true);
  });
});

describe("dependency scheduling", () => {
  it("runs a subtask declared before its dependency once the dependency completes", () => {
    const current = plan([subtask(2, [1]), subtask(1)]);

    const first = selectNextSubtask("dependency", {
      plan: current,
      completed: new Set(),
      cursor: 0,
      skipped: [],
    });
    expect(first.subtask?.id).toBe(1);

    const afterFirst = plan([subtask(2, [1]), subtask(1, [], "completed")]);
    const second = selectNextSubtask("dependency", {
      plan: afterFirst,
      completed: new Set([1]),
      cursor: first.cursor,
      skipped: first.skipped,
    });
    expect(second.subtask?.id).toBe(2);
  });

  it("skips everything still pending once nothing is runnable", () => {
    const current = plan([
      subtask(1, [], "failed"),
      subtask(2, [1]),
      subtask(3, [2]),
      subtask(4, [], "completed"),
    ]);

    const decision = selectNextSubtask("dependency", {
      plan: current,
      completed: new Set([4]),
      cursor: 0,
      skipped: [],
    });

    expect(decision).toEqual({ subtask: null, cursor: 0, skipped: [2, 3] });
  });
});

describe("declaration-order scheduling", () => {
  it("skips a subtask whose dependency comes later and never revisits it", () => {
    const current = plan([subtask(2, [1]), subtask(1)]);

    const first = selectNextSubtask("declaration-order", {
      plan: current,
      completed: new Set(),
      cursor: 0,
      skipped: [],
    });
    expect(first.subtask?.id).toBe(1);
    expect(first.skipped).toEqual([2]);
    expect(first.cursor).toBe(2);

    const second = selectNextSubtask("declaration-order", {
      plan: plan([subtask(2, [1]), subtask(1, [], "completed")]),
      completed: new Set([1]),
      cursor: first.cursor,
      skipped: first.skipped,
    });
    expect(second).toEqual({ subtask: null, cursor: 2, skipped: [2] });
  });

  it("passes over subtasks that are no longer pending", () => {
    const decision = selectNextSubtask("declaration-order", {
      plan: plan([subtask(1, [], "completed"), subtask(2, [1])]),
      completed: new Set([1]),
      cursor: 0,
      skipped: [],
    });

    expect(decision.subtask?.id).toBe(2);
    expect(decision.cursor).toBe(2);
  });
});
