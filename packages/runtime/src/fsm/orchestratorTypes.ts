import type {
  Evaluator,
  FinalEvaluation,
  Plan,
  Planner,
  StepEvaluation,
  SubTask,
  SubTaskResult,
  TaskExecutor,
  Thinker,
} from "../types/index.js";
import type { EventBus } from "../event/EventBus.js";
import type { SchedulingMode } from "../core/scheduler.js";

export interface OrchestratorContext {
  /** 本次运行的目标 */
  goal: string;
  /** 调用方附带的上下文，原样传给规划器与执行器 */
  runContext: string | undefined;
  /** 协作式取消信号，执行器在每轮迭代前检查 */
  signal: AbortSignal | undefined;
  /** 串联本次运行所有总线事件 */
  traceId: string;
  /** 当前计划；每次状态变更都替换为新的值 */
  plan: Plan | null;
  /** 已成功完成的子任务编号 */
  completed: number[];
  /** 因依赖未满足而未执行的子任务编号 */
  skipped: number[];
  /** declaration-order 模式下的遍历位置 */
  cursor: number;
  /** 选中待执行的子任务 */
  currentSubtask: SubTask | null;
  /** 最近一次执行写回子任务的结果 */
  lastResult: SubTaskResult | null;
  stepEvaluations: StepEvaluation[];
  /** 已发起的重规划次数 */
  replans: number;
  /** 最近一次失败是否已做过失败分析 */
  failureAnalyzed: boolean;
  /** 重规划返回了原计划后，本次运行不再重规划 */
  replanningStalled: boolean;
  evaluation: FinalEvaluation | null;
  /** 导致运行中止的错误（网关故障或取消） */
  error: Error | null;
}

export interface OrchestratorInput {
  goal: string;
  context?: string;
  signal?: AbortSignal;
  traceId: string;
}

export interface OrchestratorOutput {
  evaluation: FinalEvaluation | null;
  plan: Plan | null;
  completed: number[];
  skipped: number[];
  replans: number;
  error: Error | null;
}

export interface OrchestratorSettings {
  stepEvaluation: boolean;
  allowReplanning: boolean;
  maxReplans: number;
  scheduling: SchedulingMode;
}

export interface OrchestratorDeps {
  planner: Planner;
  executor: TaskExecutor;
  evaluator: Evaluator;
  eventBus: EventBus;
  /** 缺省即关闭思考：跳过规划前推理与失败分析 */
  thinker?: Thinker;
  settings: OrchestratorSettings;
}
