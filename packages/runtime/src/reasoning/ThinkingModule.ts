import { nanoid } from "nanoid";
import type {
  ModelGateway,
  ThinkOptions,
  Thinker,
  Thought,
  ThoughtKind,
  ToolResult,
} from "../types/index.js";
import type { EventBus } from "../event/EventBus.js";
import { RunCancelledError } from "../llm/errors.js";

export interface ThinkingModuleOptions {
  gateway: ModelGateway;
  /** 每条想法以 agent.thought 事件广播 */
  eventBus?: EventBus;
  temperature?: number;
  now?: () => Date;
}

const KIND_PROMPTS: Record<ThoughtKind, string> = {
  reasoning:
    "You are thinking through a problem step by step. Analyze the situation logically and explain your reasoning.",
  reflection:
    "You are reflecting on what has happened. Consider what went well, what didn't, and what can be learned.",
  decision:
    "You are making a decision. Consider the options, their pros and cons, and choose the best path forward.",
  observation:
    "You are observing the current state. What do you notice? What is important?",
};

const THINK_ALOUD = "Think aloud and be explicit about your reasoning process.";

export class ThinkingModule implements Thinker {
  private readonly gateway: ModelGateway;

  private readonly eventBus: EventBus | undefined;

  private readonly temperature: number;

  private readonly now: () => Date;

  private thoughts: Thought[] = [];

  constructor(options: ThinkingModuleOptions) {
    this.gateway = options.gateway;
    this.eventBus = options.eventBus;
    this.temperature = options.temperature ?? 0.7;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 针对当前情境向模型提问并记录回答。
   * 网关未配置、请求失败或回答为空时返回 null；取消错误照常抛出。
   */
  public async think(
    context: string,
    question: string,
    kind: ThoughtKind = "reasoning",
    options?: ThinkOptions
  ): Promise<string | null> {
    if (!this.gateway.isConfigured()) {
      return null;
    }

    let content: string;
    try {
      const completion = await this.gateway.complete(
        [
          { role: "system", content: `${KIND_PROMPTS[kind]}\n\n${THINK_ALOUD}` },
          { role: "user", content: `Context: ${context}\n\nQuestion: ${question}` },
        ],
        {
          temperature: this.temperature,
          ...(options?.signal ? { signal: options.signal } : {}),
        }
      );
      content = (completion.text ?? "").trim();
    } catch (error) {
      if (error instanceof RunCancelledError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[ThinkingModule] LLM ${kind} failed (${message}), continuing without it.`);
      return null;
    }
    if (content.length === 0) {
      return null;
    }

    const thought: Thought = {
      kind,
      content,
      timestamp: this.now().toISOString(),
      traceId: options?.traceId ?? nanoid(),
    };
    this.thoughts = [...this.thoughts, thought];
    this.eventBus?.publish("agent.thought", thought.traceId, { kind, content });
    return content;
  }

  public reflectOnAction(
    action: string,
    result: ToolResult,
    expectedOutcome: string,
    options?: ThinkOptions
  ): Promise<string | null> {
    return this.think(
      [
        `Action taken: ${action}`,
        `Expected outcome: ${expectedOutcome}`,
        `Actual result: ${JSON.stringify(result)}`,
      ].join("\n"),
      "Did this action achieve what we wanted? What should we do next?",
      "reflection",
      options
    );
  }

  public analyzeFailure(
    task: string,
    error: string,
    attempts: number,
    options?: ThinkOptions
  ): Promise<string | null> {
    return this.think(
      [`Task: ${task}`, `Error: ${error}`, `Attempts made: ${attempts}`].join("\n"),
      "Why did this fail? What are the root causes? How can we fix it?",
      "reasoning",
      options
    );
  }

  /** 省略 traceId 时返回全部想法 */
  public getThoughts(traceId?: string): Thought[] {
    return traceId === undefined
      ? [...this.thoughts]
      : this.thoughts.filter((thought) => thought.traceId === traceId);
  }

  public clear(traceId?: string): void {
    this.thoughts =
      traceId === undefined
        ? []
        : this.thoughts.filter((thought) => thought.traceId !== traceId);
  }
}
