import { nanoid } from "nanoid";
import { Subject } from "rxjs";
import { createActor } from "xstate";
import type {
  AgentRunOptions,
  AgentRunReport,
  Evaluator,
  ExecutionResult,
  FinalEvaluation,
  HistorySink,
  ModelGateway,
  Planner,
  RunSnapshot,
  RunState,
  RuntimeEventStream,
  TaskExecutor,
  ToolAdapter,
} from "../types/index.js";
import { EventBus } from "../event/EventBus.js";
import { attachConsoleReporter } from "../event/consoleReporter.js";
import { createOrchestratorMachine } from "../fsm/orchestratorMachine.js";
import type { OrchestratorOutput } from "../fsm/orchestratorMachine.js";
import { parseAgentSettings } from "../config/settings.js";
import type { AgentSettings, AgentSettingsInput } from "../config/settings.js";
import { InMemoryToolRegistry } from "../registry/ToolRegistry.js";
import { createDefaultToolRegistry } from "../tools/index.js";
import { TaskPlanner } from "../planner/TaskPlanner.js";
import { TaskEvaluator } from "../evaluator/TaskEvaluator.js";
import { ThinkingModule } from "../reasoning/ThinkingModule.js";
import { Executor } from "./Executor.js";

export interface AgentRuntimeOptions {
  gateway: ModelGateway;
  settings?: AgentSettingsInput;
  /** 缺省时注册全部内置工具 */
  toolRegistry?: InMemoryToolRegistry;
  eventBus?: EventBus;
  historySink?: HistorySink;
  planner?: Planner;
  executor?: TaskExecutor;
  evaluator?: Evaluator;
}

const RUN_STATES: readonly RunState[] = [
  "thinking",
  "planning",
  "selecting",
  "executing",
  "executed",
  "evaluating",
  "routing",
  "analyzing",
  "replanning",
  "finalizing",
  "done",
  "failed",
];

function isRunState(value: unknown): value is RunState {
  return RUN_STATES.some((state) => state === value);
}

export class AgentRuntime {
  private readonly settings: AgentSettings;

  private readonly eventBus: EventBus;

  private readonly snapshot$ = new Subject<RunSnapshot>();

  private readonly toolRegistry: InMemoryToolRegistry;

  private readonly planner: Planner;

  private readonly executor: TaskExecutor;

  private readonly evaluator: Evaluator;

  private readonly historySink: HistorySink | undefined;

  private readonly thinker: ThinkingModule | undefined;

  constructor(options: AgentRuntimeOptions) {
    this.settings = parseAgentSettings(options.settings ?? {});
    this.eventBus = options.eventBus ?? new EventBus();
    this.toolRegistry = options.toolRegistry ?? createDefaultToolRegistry();
    this.historySink = options.historySink;

    const { agent, llm, planning, evaluation } = this.settings;
    this.thinker = agent.thinkingEnabled
      ? new ThinkingModule({
          gateway: options.gateway,
          eventBus: this.eventBus,
          temperature: llm.temperature,
        })
      : undefined;
    this.planner =
      options.planner ??
      new TaskPlanner({
        gateway: options.gateway,
        maxSubtasks: planning.maxSubtasks,
        temperature: llm.temperature,
        maxTokens: llm.maxTokens,
      });
    this.executor =
      options.executor ??
      new Executor({
        gateway: options.gateway,
        toolRegistry: this.toolRegistry,
        eventBus: this.eventBus,
        ...(this.thinker ? { thinker: this.thinker } : {}),
        maxIterations: agent.maxIterations,
        temperature: llm.temperature,
        maxTokens: llm.maxTokens,
      });
    this.evaluator =
      options.evaluator ??
      new TaskEvaluator({
        gateway: options.gateway,
        successThreshold: evaluation.successThreshold,
        finalEvaluation: evaluation.finalEvaluation,
      });

    if (agent.verbose) {
      attachConsoleReporter(this.eventBus);
    }
  }

  public get streams(): RuntimeEventStream {
    return {
      events$: this.eventBus.events(),
      snapshots$: this.snapshot$.asObservable(),
    };
  }

  public registerTool(tool: ToolAdapter): void {
    this.toolRegistry.register(tool);
  }

  public async run(goal: string, options?: AgentRunOptions): Promise<FinalEvaluation> {
    const report = await this.runWithReport(goal, options);
    return report.evaluation;
  }

  public async runWithReport(
    goal: string,
    options?: AgentRunOptions
  ): Promise<AgentRunReport> {
    const traceId = nanoid();
    try {
      return await this.orchestrate(goal, traceId, options);
    } finally {
      // 想法只在单次运行内有意义
      this.thinker?.clear(traceId);
    }
  }

  private async orchestrate(
    goal: string,
    traceId: string,
    options: AgentRunOptions | undefined
  ): Promise<AgentRunReport> {
    console.info(`[AgentRuntime] ${this.settings.agent.name} starting run ${traceId}: ${goal}`);

    const { planning, evaluation } = this.settings;
    const machine = createOrchestratorMachine({
      planner: this.planner,
      executor: this.executor,
      evaluator: this.evaluator,
      eventBus: this.eventBus,
      ...(this.thinker ? { thinker: this.thinker } : {}),
      settings: {
        stepEvaluation: evaluation.stepEvaluation,
        allowReplanning: planning.allowReplanning,
        maxReplans: planning.maxReplans,
        scheduling: planning.scheduling,
      },
    });
    const actor = createActor(machine, {
      input: {
        goal,
        traceId,
        ...(options?.context === undefined ? {} : { context: options.context }),
        ...(options?.signal === undefined ? {} : { signal: options.signal }),
      },
    });

    const output = await new Promise<OrchestratorOutput>((resolve, reject) => {
      const subscription = actor.subscribe({
        next: (state) => {
          const stateName = isRunState(state.value) ? state.value : "failed";
          const snapshot: RunSnapshot = {
            state: stateName,
            plan: state.context.plan,
            completed: [...state.context.completed],
            stepEvaluations: [...state.context.stepEvaluations],
            replans: state.context.replans,
          };
          // 每次状态变更都把快照广播出去，用于外界观测
          this.snapshot$.next(snapshot);
          this.eventBus.publish("agent.transition", traceId, {
            state: stateName,
            completed: snapshot.completed,
            replans: snapshot.replans,
          });
          if (state.status === "done" && state.output) {
            subscription.unsubscribe();
            resolve(state.output);
          }
        },
        error: (error) => {
          subscription.unsubscribe();
          reject(error);
        },
      });

      try {
        actor.start();
      } catch (error) {
        subscription.unsubscribe();
        reject(error);
      }
    });

    if (output.error) {
      console.warn(`[AgentRuntime] Run ${traceId} aborted: ${output.error.message}`);
      throw output.error;
    }
    if (!output.evaluation || !output.plan) {
      throw new Error(`Run ${traceId} finished without a final evaluation`);
    }

    const report: AgentRunReport = {
      evaluation: output.evaluation,
      plan: output.plan,
      completed: output.completed,
      skipped: output.skipped,
      replans: output.replans,
      thoughts: this.thinker?.getThoughts(traceId) ?? [],
    };

    await this.saveHistory(report, goal);
    this.eventBus.publish("agent.finished", traceId, {
      evaluation: report.evaluation,
      skipped: report.skipped,
      replans: report.replans,
    });
    return report;
  }

  /**
   * 不经规划与评估，直接执行单个任务。
   */
  public async quickTask(task: string, options?: AgentRunOptions): Promise<ExecutionResult> {
    const traceId = nanoid();
    try {
      return await this.executor.executeTask(task, {
        traceId,
        ...(options?.context === undefined ? {} : { context: options.context }),
        ...(options?.signal === undefined ? {} : { signal: options.signal }),
      });
    } finally {
      this.thinker?.clear(traceId);
    }
  }

  private async saveHistory(report: AgentRunReport, goal: string): Promise<void> {
    if (!this.historySink) {
      return;
    }
    try {
      await this.historySink.save({
        goal,
        plan: report.plan,
        evaluation: report.evaluation,
        completedAt: new Date().toISOString(),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[AgentRuntime] Failed to save run history: ${message}`);
    }
  }
}
