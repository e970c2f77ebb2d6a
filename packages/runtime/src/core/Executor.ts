import { nanoid } from "nanoid";
// 执行器：通过模型的工具调用循环完成单个子任务，同时在总线上广播请求/结果事件
import type {
  ChatMessage,
  ExecuteTaskOptions,
  ExecutionResult,
  ModelGateway,
  TaskExecutor,
  Thinker,
  ThinkOptions,
  ToolCallRecord,
  ToolInvocation,
  ToolRegistry,
  ToolResult,
} from "../types/index.js";
import { EventBus } from "../event/EventBus.js";
import { RunCancelledError } from "../llm/errors.js";
import { parseToolArguments } from "../llm/parseModelJson.js";

export interface ExecutorOptions {
  gateway: ModelGateway;
  toolRegistry: ToolRegistry;
  eventBus?: EventBus;
  /** 开启后在任务开始前推理，并在工具调用成功后反思 */
  thinker?: Thinker;
  maxIterations?: number;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export const DEFAULT_MAX_ITERATIONS = 10;

export const MAX_ITERATIONS_ERROR = "Task execution exceeded maximum iterations";

const DEFAULT_SYSTEM_PROMPT = [
  "You are a capable agent that uses tools to accomplish tasks.",
  "",
  "When you need a tool:",
  "1. Decide which of the provided tools fits the need.",
  "2. Call it with arguments that match its parameter schema.",
  "3. Read the result before deciding on the next action.",
  "",
  "Tools may be chained: a later call can rely on an earlier call's result.",
  "When the task is complete, reply with the final answer and no tool calls.",
].join("\n");

export class Executor implements TaskExecutor {
  private readonly gateway: ModelGateway;

  private readonly toolRegistry: ToolRegistry;

  private readonly eventBus: EventBus | undefined;

  private readonly thinker: Thinker | undefined;

  private readonly maxIterations: number;

  private readonly systemPrompt: string;

  private readonly temperature: number | undefined;

  private readonly maxTokens: number | undefined;

  constructor(options: ExecutorOptions) {
    this.gateway = options.gateway;
    this.toolRegistry = options.toolRegistry;
    this.eventBus = options.eventBus;
    this.thinker = options.thinker;
    this.maxIterations = Math.max(1, options.maxIterations ?? DEFAULT_MAX_ITERATIONS);
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  public async executeTask(
    taskDescription: string,
    options?: ExecuteTaskOptions
  ): Promise<ExecutionResult> {
    const traceId = options?.traceId ?? nanoid();
    const conversation: ChatMessage[] = [
      { role: "system", content: this.systemPrompt },
      {
        role: "user",
        content: options?.context
          ? `Task: ${taskDescription}\n\nContext: ${options.context}`
          : `Task: ${taskDescription}`,
      },
    ];
    const toolCalls: ToolCallRecord[] = [];
    const thinkOptions: ThinkOptions = {
      traceId,
      ...(options?.signal ? { signal: options.signal } : {}),
    };

    await this.thinker?.think(
      options?.context ?? "Starting new task",
      `How should I approach this task: ${taskDescription}?`,
      "reasoning",
      thinkOptions
    );

    for (let iteration = 1; iteration <= this.maxIterations; iteration += 1) {
      if (options?.signal?.aborted) {
        throw new RunCancelledError(
          `Execution of "${taskDescription}" was cancelled before iteration ${iteration}`
        );
      }

      // 网关的传输错误直接向上抛出，由编排器决定整个运行的去向
      const completion = await this.gateway.complete(conversation, {
        tools: this.toolRegistry.toFunctionSchemas(),
        ...(this.temperature === undefined ? {} : { temperature: this.temperature }),
        ...(this.maxTokens === undefined ? {} : { maxTokens: this.maxTokens }),
        ...(options?.signal ? { signal: options.signal } : {}),
      });

      if (completion.toolInvocations.length > 0) {
        conversation.push({
          role: "assistant",
          content: completion.text ?? "",
          toolCalls: completion.toolInvocations,
        });

        // 严格按模型给出的顺序串行执行：后一个调用可能依赖前一个的结果
        for (const invocation of completion.toolInvocations) {
          const record = await this.invokeTool(invocation, traceId, options?.taskId);
          toolCalls.push(record);
          if (record.result.success) {
            await this.thinker?.reflectOnAction(
              `Used ${record.tool} with ${JSON.stringify(record.arguments)}`,
              record.result,
              "The tool call succeeds",
              thinkOptions
            );
          }
          conversation.push({
            role: "tool",
            toolCallId: invocation.id,
            name: invocation.toolName,
            content: serializeToolResult(record.result),
          });
        }
        continue;
      }

      conversation.push({ role: "assistant", content: completion.text ?? "" });

      if (completion.stopReason === "stop") {
        return {
          success: true,
          output: completion.text ?? "",
          toolCalls,
          iterations: iteration,
        };
      }
    }

    return {
      success: false,
      output: "Max iterations reached",
      error: MAX_ITERATIONS_ERROR,
      toolCalls,
      iterations: this.maxIterations,
    };
  }

  private async invokeTool(
    invocation: ToolInvocation,
    traceId: string,
    taskId: number | undefined
  ): Promise<ToolCallRecord> {
    const args = parseToolArguments(invocation.argumentsText);
    this.eventBus?.publish(
      "tool.request",
      traceId,
      { tool: invocation.toolName, callId: invocation.id, arguments: args },
      taskId
    );

    const tool = this.toolRegistry.get(invocation.toolName);
    let result: ToolResult;
    const startedAt = Date.now();
    if (!tool) {
      result = {
        success: false,
        error: `Tool '${invocation.toolName}' not found`,
      };
    } else {
      try {
        result = await tool.execute({ params: args, traceId });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        result = {
          success: false,
          error: `Tool '${invocation.toolName}' failed: ${message}`,
        };
      }
    }

    this.eventBus?.publish(
      "tool.result",
      traceId,
      {
        tool: invocation.toolName,
        callId: invocation.id,
        result,
        latencyMs: Date.now() - startedAt,
      },
      taskId
    );

    return { tool: invocation.toolName, arguments: args, result };
  }
}

function serializeToolResult(result: ToolResult): string {
  try {
    return JSON.stringify(result);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({
      success: result.success,
      error: result.error ?? `Tool result could not be serialized: ${message}`,
    });
  }
}
