import type { Plan, SubTask } from "../types/index.js";

/**
 * dependency：反复挑选声明顺序中第一个依赖全部完成的 pending 子任务，直到没有可选项。
 * declaration-order：按声明顺序单次遍历，依赖未满足的子任务直接跳过、本次运行不再回头。
 */
export type SchedulingMode = "dependency" | "declaration-order";

export interface ScheduleState {
  plan: Plan;
  completed: ReadonlySet<number>;
  /** 仅 declaration-order 使用：下一个要检查的声明位置 */
  cursor: number;
  /** 本次运行中已经被跳过的子任务编号 */
  skipped: readonly number[];
}

export interface ScheduleDecision {
  subtask: SubTask | null;
  cursor: number;
  skipped: number[];
}

export function dependenciesMet(
  subtask: SubTask,
  completed: ReadonlySet<number>
): boolean {
  return subtask.dependencies.every((dependency) => completed.has(dependency));
}

export function selectNextSubtask(
  mode: SchedulingMode,
  state: ScheduleState
): ScheduleDecision {
  return mode === "declaration-order"
    ? selectInDeclarationOrder(state)
    : selectByDependencies(state);
}

function selectByDependencies(state: ScheduleState): ScheduleDecision {
  const ready = state.plan.subtasks.find(
    (subtask) =>
      subtask.status === "pending" && dependenciesMet(subtask, state.completed)
  );
  if (ready) {
    return { subtask: ready, cursor: state.cursor, skipped: [...state.skipped] };
  }

  // 没有可执行项时，剩余的 pending 子任务都因依赖无法满足而被跳过
  const skipped = new Set(state.skipped);
  state.plan.subtasks
    .filter((subtask) => subtask.status === "pending")
    .forEach((subtask) => skipped.add(subtask.id));
  return { subtask: null, cursor: state.cursor, skipped: Array.from(skipped) };
}

function selectInDeclarationOrder(state: ScheduleState): ScheduleDecision {
  const skipped = [...state.skipped];
  const { subtasks } = state.plan;

  for (let index = state.cursor; index < subtasks.length; index += 1) {
    const subtask = subtasks[index];
    if (subtask.status !== "pending") {
      continue;
    }
    if (!dependenciesMet(subtask, state.completed)) {
      if (!skipped.includes(subtask.id)) {
        skipped.push(subtask.id);
      }
      continue;
    }
    return { subtask, cursor: index + 1, skipped };
  }

  return { subtask: null, cursor: subtasks.length, skipped };
}
