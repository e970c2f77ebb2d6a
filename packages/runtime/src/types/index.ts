import type { Observable } from "rxjs";
import type {
  FinalEvaluation,
  Plan,
  StepEvaluation,
  SubTaskResult,
} from "./plan.js";

export {
  FinalEvaluationSchema,
  PlanSchema,
  StepEvaluationSchema,
  SubTaskResultSchema,
  SubTaskSchema,
  SubTaskStatusSchema,
  withSubtask,
} from "./plan.js";

export type {
  FinalEvaluation,
  Plan,
  StepEvaluation,
  SubTask,
  SubTaskResult,
  SubTaskStatus,
} from "./plan.js";

// ---------------------------------------------------------------------------
// 对话与模型网关
// ---------------------------------------------------------------------------

export interface ToolInvocation {
  /** 模型分配的调用 ID，回填 tool 消息时使用 */
  id: string;
  toolName: string;
  /** 模型给出的原始参数文本，可能不是合法 JSON */
  argumentsText: string;
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolInvocation[] }
  | { role: "tool"; toolCallId: string; name: string; content: string };

export type ChatRole = ChatMessage["role"];

export type StopReason =
  | "stop"
  | "tool_calls"
  | "length"
  | "content_filter"
  | "unknown";

export interface ModelCompletion {
  text: string | null;
  toolInvocations: ToolInvocation[];
  stopReason: StopReason;
}

export interface FunctionToolSchema {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: {
      type: "object";
      properties: Record<string, Record<string, unknown>>;
      required: string[];
    };
  };
}

export interface CompletionOptions {
  tools?: FunctionToolSchema[];
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ModelGateway {
  /** 是否具备发起请求的条件（例如已配置 API key） */
  isConfigured(): boolean;
  complete(
    conversation: ChatMessage[],
    options?: CompletionOptions
  ): Promise<ModelCompletion>;
}

// ---------------------------------------------------------------------------
// 工具
// ---------------------------------------------------------------------------

export type ToolParameterType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "array"
  | "object";

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[];
}

export interface ToolInput {
  /** 模型传入的参数，解析失败时为空对象 */
  params: Record<string, unknown>;
  /** 链路追踪 ID，与总线事件保持一致 */
  traceId: string;
}

export interface ToolResult {
  success: boolean;
  result?: unknown;
  error?: string;
}

export interface ToolAdapter {
  /** 工具唯一名称，模型通过它发起调用 */
  name: string;
  /** 给模型看的用途说明 */
  description: string;
  parameters: ToolParameter[];
  /** 用户输入导致的错误必须以 success=false 返回，而不是抛出 */
  execute(input: ToolInput): Promise<ToolResult>;
}

export interface ToolRegistry {
  get(name: string): ToolAdapter | undefined;
  list(): ToolAdapter[];
  toFunctionSchemas(): FunctionToolSchema[];
}

// ---------------------------------------------------------------------------
// 执行与评估
// ---------------------------------------------------------------------------

export interface ToolCallRecord {
  tool: string;
  arguments: Record<string, unknown>;
  result: ToolResult;
}

export interface ExecutionResult {
  success: boolean;
  output: unknown;
  error?: string;
  /** 按调用顺序记录的工具调用 */
  toolCalls: ToolCallRecord[];
  /** 实际消耗的迭代次数 */
  iterations: number;
}

export interface ExecuteTaskOptions {
  context?: string;
  signal?: AbortSignal;
  /** 所属子任务编号，仅用于事件关联 */
  taskId?: number;
  /** 沿用调用方的链路 ID；缺省时每次执行生成一个 */
  traceId?: string;
}

// ---------------------------------------------------------------------------
// 思考（旁路推理）
// ---------------------------------------------------------------------------

export type ThoughtKind = "reasoning" | "reflection" | "decision" | "observation";

export interface Thought {
  kind: ThoughtKind;
  content: string;
  /** ISO 8601 */
  timestamp: string;
  traceId: string;
}

export interface ThinkOptions {
  traceId?: string;
  signal?: AbortSignal;
}

/**
 * 旁路推理：产出的想法只被记录与广播，不进入执行对话。
 * 网关不可用时返回 null，调用方照常继续。
 */
export interface Thinker {
  think(
    context: string,
    question: string,
    kind?: ThoughtKind,
    options?: ThinkOptions
  ): Promise<string | null>;
  reflectOnAction(
    action: string,
    result: ToolResult,
    expectedOutcome: string,
    options?: ThinkOptions
  ): Promise<string | null>;
  analyzeFailure(
    task: string,
    error: string,
    attempts: number,
    options?: ThinkOptions
  ): Promise<string | null>;
}

export interface Planner {
  createPlan(goal: string, context?: string): Promise<Plan>;
  replan(
    originalPlan: Plan,
    completedSubtasks: ReadonlySet<number>,
    failureReason: string
  ): Promise<Plan>;
}

export interface TaskExecutor {
  executeTask(
    taskDescription: string,
    options?: ExecuteTaskOptions
  ): Promise<ExecutionResult>;
}

export interface Evaluator {
  evaluateStep(
    stepId: number,
    stepDescription: string,
    expectedOutcome: string,
    actualResult: SubTaskResult
  ): Promise<StepEvaluation>;
  evaluateFinal(
    goal: string,
    stepEvaluations: StepEvaluation[],
    finalOutput: unknown
  ): Promise<FinalEvaluation>;
}

// ---------------------------------------------------------------------------
// 事件总线与运行结果
// ---------------------------------------------------------------------------

export type EventType =
  | "plan.created"
  | "plan.revised"
  | "subtask.started"
  | "subtask.skipped"
  | "subtask.finished"
  | "tool.request"
  | "tool.result"
  | "step.evaluated"
  | "agent.thought"
  | "agent.transition"
  | "agent.finished";

export interface EventPayload {
  [key: string]: unknown;
}

export interface BusEvent {
  eventId: string; // 事件唯一标识
  type: EventType; // 事件类型
  timestamp: number; // 事件发生的时间戳（毫秒）
  traceId: string; // 链路追踪 ID，用于串联同一次运行
  relatedTaskId?: number; // 可选，关联的子任务编号
  payload: EventPayload; // 事件负载
}

export type RunState =
  | "thinking"
  | "planning"
  | "selecting"
  | "executing"
  | "executed"
  | "evaluating"
  | "routing"
  | "analyzing"
  | "replanning"
  | "finalizing"
  | "done"
  | "failed";

export interface RunSnapshot {
  state: RunState;
  plan: Plan | null;
  completed: number[];
  stepEvaluations: StepEvaluation[];
  replans: number;
}

export interface RuntimeEventStream {
  events$: Observable<BusEvent>;
  snapshots$: Observable<RunSnapshot>;
}

export interface AgentRunOptions {
  context?: string;
  signal?: AbortSignal;
}

export interface AgentRunReport {
  evaluation: FinalEvaluation;
  /** 运行结束时的计划（可能经过重规划） */
  plan: Plan;
  completed: number[];
  /** 因依赖未满足而未执行的子任务编号 */
  skipped: number[];
  replans: number;
  /** 本次运行记录的想法；未开启思考时为空 */
  thoughts: Thought[];
}

export interface HistoryRecord {
  goal: string;
  plan: Plan;
  evaluation: FinalEvaluation;
  completedAt: string;
}

export interface HistorySink {
  save(record: HistoryRecord): Promise<void>;
}
