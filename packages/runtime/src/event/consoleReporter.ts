import type { Subscription } from "rxjs";
import type { BusEvent, FinalEvaluation, Plan, StepEvaluation } from "../types/index.js";
import type { EventBus } from "./EventBus.js";
import { formatStepEvaluation } from "../evaluator/formatEvaluation.js";

export interface ConsoleReporterOptions {
  /** 默认 console.info */
  write?: (line: string) => void;
}

function isPlan(value: unknown): value is Plan {
  return (
    typeof value === "object" &&
    value !== null &&
    "subtasks" in value &&
    Array.isArray(value.subtasks)
  );
}

function isStepEvaluation(value: unknown): value is StepEvaluation {
  return (
    typeof value === "object" &&
    value !== null &&
    "stepId" in value &&
    "score" in value &&
    typeof value.score === "number"
  );
}

function isFinalEvaluation(value: unknown): value is FinalEvaluation {
  return (
    typeof value === "object" &&
    value !== null &&
    "overallScore" in value &&
    typeof value.overallScore === "number" &&
    "overallSuccess" in value
  );
}

function describePlan(plan: Plan): string[] {
  return plan.subtasks.map((subtask) => {
    const deps =
      subtask.dependencies.length > 0
        ? ` (depends on: ${subtask.dependencies.join(", ")})`
        : "";
    return `  ${subtask.id}. ${subtask.description}${deps}`;
  });
}

/**
 * 把总线事件渲染成进度文本，返回一行文本；不关心的事件返回 null。
 */
export function renderEvent(event: BusEvent): string | null {
  const { payload } = event;
  switch (event.type) {
    case "plan.created":
    case "plan.revised": {
      if (!isPlan(payload.plan)) {
        return null;
      }
      const title = event.type === "plan.created" ? "Plan created" : "Plan revised";
      return [
        `[Planner] ${title} with ${payload.plan.subtasks.length} subtasks`,
        ...describePlan(payload.plan),
      ].join("\n");
    }
    case "subtask.started":
      return `[Orchestrator] Executing subtask ${event.relatedTaskId ?? "?"}: ${String(
        payload.description ?? ""
      )}`;
    case "subtask.skipped":
      return `[Orchestrator] Skipping subtask ${event.relatedTaskId ?? "?"}: dependencies not met`;
    case "subtask.finished":
      return payload.success === true
        ? `[Orchestrator] Subtask ${event.relatedTaskId ?? "?"} completed`
        : `[Orchestrator] Subtask ${event.relatedTaskId ?? "?"} failed: ${String(
            payload.error ?? "Unknown error"
          )}`;
    case "agent.thought":
      return `[Thinking] (${String(payload.kind)}) ${String(payload.content ?? "")}`;
    case "tool.request":
      return `[Executor] Calling tool ${String(payload.tool)}`;
    case "step.evaluated":
      return isStepEvaluation(payload.evaluation)
        ? formatStepEvaluation(payload.evaluation)
        : null;
    case "agent.finished":
      return isFinalEvaluation(payload.evaluation)
        ? `[AgentRuntime] Run finished: ${
            payload.evaluation.overallSuccess ? "success" : "failure"
          } (score ${payload.evaluation.overallScore.toFixed(2)})`
        : null;
    default:
      return null;
  }
}

/**
 * 订阅事件总线并打印进度，调用方负责在不需要时 unsubscribe。
 */
export function attachConsoleReporter(
  eventBus: EventBus,
  options: ConsoleReporterOptions = {}
): Subscription {
  const write = options.write ?? ((line: string) => console.info(line));
  return eventBus.events().subscribe({
    next: (event) => {
      const line = renderEvent(event);
      if (line !== null) {
        write(line);
      }
    },
  });
}
