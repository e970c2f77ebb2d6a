import { assign, fromPromise, not, setup } from "xstate";
import type {
  ExecutionResult,
  FinalEvaluation,
  Plan,
  StepEvaluation,
  SubTask,
  SubTaskResult,
} from "../types/index.js";
import { withSubtask } from "../types/index.js";
import { selectNextSubtask } from "../core/scheduler.js";
import type {
  OrchestratorContext,
  OrchestratorDeps,
  OrchestratorInput,
  OrchestratorOutput,
} from "./orchestratorTypes.js";

export type {
  OrchestratorContext,
  OrchestratorDeps,
  OrchestratorInput,
  OrchestratorOutput,
  OrchestratorSettings,
} from "./orchestratorTypes.js";

interface ExecuteInput {
  subtask: SubTask | null;
  context: string | undefined;
  signal: AbortSignal | undefined;
  traceId: string;
}

interface EvaluateStepInput {
  subtask: SubTask | null;
  result: SubTaskResult | null;
}

interface ReplanInput {
  plan: Plan | null;
  completed: number[];
  failureReason: string;
}

interface ThinkInput {
  goal: string;
  context: string | undefined;
  signal: AbortSignal | undefined;
  traceId: string;
}

interface AnalyzeFailureInput {
  subtask: SubTask | null;
  result: SubTaskResult | null;
  signal: AbortSignal | undefined;
  traceId: string;
}

interface EvaluateFinalInput {
  goal: string;
  stepEvaluations: StepEvaluation[];
  finalOutput: unknown;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function toSubTaskResult(result: ExecutionResult): SubTaskResult {
  return {
    success: result.success,
    output: result.output,
    ...(result.error === undefined ? {} : { error: result.error }),
  };
}

/**
 * 规划 → {执行 → 评估}* → 终评 的编排状态机。
 * 计划、完成集合等运行状态全部保存在机器 context 中，每一步产出新值而不是原地修改。
 */
export function createOrchestratorMachine(deps: OrchestratorDeps) {
  const { planner, executor, evaluator, eventBus, thinker, settings } = deps;

  return setup({
    types: {
      context: {} as OrchestratorContext,
      input: {} as OrchestratorInput,
      output: {} as OrchestratorOutput,
    },
    actors: {
      contemplateGoal: fromPromise<string | null, ThinkInput>(async ({ input }) => {
        if (!thinker) {
          return null;
        }
        return thinker.think(
          input.context ?? "Starting new task",
          `What is the best approach to achieve this goal: ${input.goal}?`,
          "reasoning",
          { traceId: input.traceId, ...(input.signal ? { signal: input.signal } : {}) }
        );
      }),
      createPlan: fromPromise<Plan, { goal: string; context: string | undefined }>(
        ({ input }) => planner.createPlan(input.goal, input.context)
      ),
      executeSubtask: fromPromise<ExecutionResult, ExecuteInput>(
        async ({ input }) => {
          if (!input.subtask) {
            throw new Error("Executor invoked without a selected subtask");
          }
          return executor.executeTask(input.subtask.description, {
            context: input.context,
            signal: input.signal,
            taskId: input.subtask.id,
            traceId: input.traceId,
          });
        }
      ),
      evaluateStep: fromPromise<StepEvaluation, EvaluateStepInput>(
        async ({ input }) => {
          if (!input.subtask || !input.result) {
            throw new Error("Step evaluation invoked without an executed subtask");
          }
          return evaluator.evaluateStep(
            input.subtask.id,
            input.subtask.description,
            input.subtask.reasoning,
            input.result
          );
        }
      ),
      replan: fromPromise<Plan, ReplanInput>(async ({ input }) => {
        if (!input.plan) {
          throw new Error("Replanning invoked without a plan");
        }
        return planner.replan(input.plan, new Set(input.completed), input.failureReason);
      }),
      analyzeFailure: fromPromise<string | null, AnalyzeFailureInput>(async ({ input }) => {
        if (!thinker || !input.subtask) {
          return null;
        }
        return thinker.analyzeFailure(
          input.subtask.description,
          input.result?.error ?? "Unknown error",
          1,
          { traceId: input.traceId, ...(input.signal ? { signal: input.signal } : {}) }
        );
      }),
      evaluateFinal: fromPromise<FinalEvaluation, EvaluateFinalInput>(
        ({ input }) =>
          evaluator.evaluateFinal(input.goal, input.stepEvaluations, input.finalOutput)
      ),
    },
    guards: {
      thinkingEnabled: () => thinker !== undefined,
      shouldAnalyzeFailure: ({ context }) =>
        thinker !== undefined &&
        context.lastResult !== null &&
        !context.lastResult.success &&
        !context.failureAnalyzed,
      hasSelectedSubtask: ({ context }) => context.currentSubtask !== null,
      stepEvaluationEnabled: () => settings.stepEvaluation,
      shouldReplan: ({ context }) =>
        settings.allowReplanning &&
        context.lastResult !== null &&
        !context.lastResult.success &&
        !context.replanningStalled &&
        context.replans < settings.maxReplans,
    },
    actions: {
      selectNextSubtask: assign(({ context }) => {
        if (!context.plan) {
          return { currentSubtask: null };
        }
        const decision = selectNextSubtask(settings.scheduling, {
          plan: context.plan,
          completed: new Set(context.completed),
          cursor: context.cursor,
          skipped: context.skipped,
        });
        return {
          currentSubtask: decision.subtask,
          cursor: decision.cursor,
          skipped: decision.skipped,
        };
      }),
      markInProgress: assign(({ context }) => {
        if (!context.plan || !context.currentSubtask) {
          return {};
        }
        return {
          plan: withSubtask(context.plan, context.currentSubtask.id, {
            status: "in_progress",
          }),
        };
      }),
      announceSubtaskStarted: ({ context }) => {
        if (!context.currentSubtask) {
          return;
        }
        eventBus.publish(
          "subtask.started",
          context.traceId,
          { description: context.currentSubtask.description },
          context.currentSubtask.id
        );
      },
      reportSkipped: ({ context }) => {
        if (!context.plan) {
          return;
        }
        const byId = new Map(context.plan.subtasks.map((subtask) => [subtask.id, subtask]));
        context.skipped.forEach((id) => {
          const subtask = byId.get(id);
          eventBus.publish(
            "subtask.skipped",
            context.traceId,
            {
              description: subtask?.description ?? "",
              dependencies: subtask?.dependencies ?? [],
              reason: "dependencies not met",
            },
            id
          );
        });
      },
    },
  }).createMachine({
    id: "orchestrator",
    initial: "thinking",
    context: ({ input }) => ({
      goal: input.goal,
      runContext: input.context,
      signal: input.signal,
      traceId: input.traceId,
      plan: null,
      completed: [],
      skipped: [],
      cursor: 0,
      currentSubtask: null,
      lastResult: null,
      stepEvaluations: [],
      replans: 0,
      failureAnalyzed: false,
      replanningStalled: false,
      evaluation: null,
      error: null,
    }),
    states: {
      thinking: {
        always: { guard: not("thinkingEnabled"), target: "planning" },
        invoke: {
          src: "contemplateGoal",
          input: ({ context }) => ({
            goal: context.goal,
            context: context.runContext,
            signal: context.signal,
            traceId: context.traceId,
          }),
          onDone: { target: "planning" },
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => toError(event.error) }),
          },
        },
      },
      planning: {
        invoke: {
          src: "createPlan",
          input: ({ context }) => ({ goal: context.goal, context: context.runContext }),
          onDone: {
            target: "selecting",
            actions: [
              assign({ plan: ({ event }) => event.output }),
              ({ context, event }) => {
                eventBus.publish("plan.created", context.traceId, {
                  plan: event.output,
                });
              },
            ],
          },
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => toError(event.error) }),
          },
        },
      },
      selecting: {
        entry: "selectNextSubtask",
        always: [
          { guard: "hasSelectedSubtask", target: "executing" },
          { target: "finalizing", actions: "reportSkipped" },
        ],
      },
      executing: {
        entry: ["markInProgress", "announceSubtaskStarted"],
        invoke: {
          src: "executeSubtask",
          input: ({ context }) => ({
            subtask: context.currentSubtask,
            context: context.runContext,
            signal: context.signal,
            traceId: context.traceId,
          }),
          onDone: {
            target: "executed",
            actions: [
              assign(({ context, event }) => {
                const subtask = context.currentSubtask;
                if (!subtask || !context.plan) {
                  return {};
                }
                const result = toSubTaskResult(event.output);
                return {
                  plan: withSubtask(context.plan, subtask.id, {
                    status: result.success ? "completed" : "failed",
                    result,
                  }),
                  completed: result.success
                    ? [...context.completed, subtask.id]
                    : context.completed,
                  lastResult: result,
                  failureAnalyzed: false,
                };
              }),
              ({ context, event }) => {
                eventBus.publish(
                  "subtask.finished",
                  context.traceId,
                  {
                    success: event.output.success,
                    error: event.output.error ?? null,
                    toolCalls: event.output.toolCalls.length,
                    iterations: event.output.iterations,
                  },
                  context.currentSubtask?.id
                );
              },
            ],
          },
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => toError(event.error) }),
          },
        },
      },
      executed: {
        always: [
          { guard: "stepEvaluationEnabled", target: "evaluating" },
          { target: "routing" },
        ],
      },
      evaluating: {
        invoke: {
          src: "evaluateStep",
          input: ({ context }) => ({
            subtask: context.currentSubtask,
            result: context.lastResult,
          }),
          onDone: {
            target: "routing",
            actions: [
              assign({
                stepEvaluations: ({ context, event }) => [
                  ...context.stepEvaluations,
                  event.output,
                ],
              }),
              ({ context, event }) => {
                eventBus.publish(
                  "step.evaluated",
                  context.traceId,
                  { evaluation: event.output },
                  event.output.stepId
                );
              },
            ],
          },
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => toError(event.error) }),
          },
        },
      },
      routing: {
        always: [
          { guard: "shouldAnalyzeFailure", target: "analyzing" },
          { guard: "shouldReplan", target: "replanning" },
          { target: "selecting" },
        ],
      },
      analyzing: {
        invoke: {
          src: "analyzeFailure",
          input: ({ context }) => ({
            subtask: context.currentSubtask,
            result: context.lastResult,
            signal: context.signal,
            traceId: context.traceId,
          }),
          onDone: {
            target: "routing",
            actions: assign({ failureAnalyzed: true }),
          },
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => toError(event.error) }),
          },
        },
      },
      replanning: {
        invoke: {
          src: "replan",
          input: ({ context }) => ({
            plan: context.plan,
            completed: context.completed,
            failureReason: context.lastResult?.error ?? "Task failed",
          }),
          onDone: [
            {
              // 规划器返回原计划即没有进展，本次运行停止继续重规划
              guard: ({ context, event }) => event.output === context.plan,
              target: "selecting",
              actions: [
                assign({
                  replans: ({ context }) => context.replans + 1,
                  replanningStalled: true,
                }),
                () => {
                  console.warn(
                    "[Orchestrator] Replanning returned the unchanged plan, continuing without further replans."
                  );
                },
              ],
            },
            {
              target: "selecting",
              actions: [
                assign({
                  plan: ({ event }) => event.output,
                  replans: ({ context }) => context.replans + 1,
                }),
                ({ context, event }) => {
                  eventBus.publish("plan.revised", context.traceId, {
                    plan: event.output,
                    replans: context.replans + 1,
                  });
                },
              ],
            },
          ],
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => toError(event.error) }),
          },
        },
      },
      finalizing: {
        invoke: {
          src: "evaluateFinal",
          input: ({ context }) => {
            const subtasks = context.plan?.subtasks ?? [];
            const last = subtasks[subtasks.length - 1];
            return {
              goal: context.goal,
              stepEvaluations: context.stepEvaluations,
              finalOutput: last?.result ?? null,
            };
          },
          onDone: {
            target: "done",
            actions: assign({ evaluation: ({ event }) => event.output }),
          },
          onError: {
            target: "failed",
            actions: assign({ error: ({ event }) => toError(event.error) }),
          },
        },
      },
      done: {
        type: "final",
      },
      failed: {
        type: "final",
      },
    },
    output: ({ context }) => ({
      evaluation: context.evaluation,
      plan: context.plan,
      completed: context.completed,
      skipped: context.skipped,
      replans: context.replans,
      error: context.error,
    }),
  });
}

export type OrchestratorMachine = ReturnType<typeof createOrchestratorMachine>;
