import type {
  ChatMessage,
  CompletionOptions,
  ModelCompletion,
  ModelGateway,
} from "../types/index.js";

export type ScriptedStep =
  | ModelCompletion
  | Error
  | ((conversation: ChatMessage[]) => ModelCompletion);

export interface ScriptedCall {
  conversation: ChatMessage[];
  options: CompletionOptions | undefined;
}

/**
 * 进程内的模型网关：按顺序回放预设的回复（或错误），并记录每次收到的对话。
 * 用于测试与离线演示。
 */
export class ScriptedModelGateway implements ModelGateway {
  public readonly calls: ScriptedCall[] = [];

  private readonly steps: ScriptedStep[];

  private readonly fallback: ScriptedStep | undefined;

  private readonly configured: boolean;

  constructor(
    steps: ScriptedStep[] = [],
    options?: { fallback?: ScriptedStep; configured?: boolean }
  ) {
    this.steps = [...steps];
    this.fallback = options?.fallback;
    this.configured = options?.configured ?? true;
  }

  public isConfigured(): boolean {
    return this.configured;
  }

  public async complete(
    conversation: ChatMessage[],
    options?: CompletionOptions
  ): Promise<ModelCompletion> {
    // 记录副本，执行器后续追加的消息不影响已记录的调用
    const recorded = conversation.map((message) => ({ ...message }));
    this.calls.push({ conversation: recorded, options });

    const step = this.steps.shift() ?? this.fallback;
    if (!step) {
      throw new Error("ScriptedModelGateway has no scripted response left");
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === "function") {
      return step(recorded);
    }
    return step;
  }
}

export function textCompletion(
  text: string,
  stopReason: ModelCompletion["stopReason"] = "stop"
): ModelCompletion {
  return { text, toolInvocations: [], stopReason };
}

export function toolCallCompletion(
  calls: Array<{ name: string; args?: Record<string, unknown> | string; id?: string }>,
  text: string | null = null
): ModelCompletion {
  return {
    text,
    stopReason: "tool_calls",
    toolInvocations: calls.map((call, index) => ({
      id: call.id ?? `call_${index + 1}`,
      toolName: call.name,
      argumentsText:
        typeof call.args === "string" ? call.args : JSON.stringify(call.args ?? {}),
    })),
  };
}
