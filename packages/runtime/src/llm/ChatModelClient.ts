import { z } from "zod";
import type {
  ChatMessage,
  CompletionOptions,
  ModelCompletion,
  ModelGateway,
  StopReason,
} from "../types/index.js";
import { ModelGatewayError, RunCancelledError } from "./errors.js";

export type ChatModelProvider = "openai" | "deepseek";

export interface ChatModelClientOptions {
  provider?: ChatModelProvider;
  apiKey?: string | null;
  baseURL?: string;
  model?: string;
  requestTimeoutMs?: number;
  headers?: Record<string, string>;
  temperature?: number;
  maxTokens?: number;
  /** 总尝试次数（含首次请求） */
  maxAttempts?: number;
  /** 指数退避的基准间隔，第 n 次重试等待 retryDelayMs * 2^(n-1) */
  retryDelayMs?: number;
}

interface ProviderDefaults {
  apiKeyEnv: string;
  baseUrlEnv: string;
  modelEnv: string;
  baseURL: string;
  model: string;
}

const PROVIDER_DEFAULTS: Record<ChatModelProvider, ProviderDefaults> = {
  openai: {
    apiKeyEnv: "OPENAI_API_KEY",
    baseUrlEnv: "OPENAI_BASE_URL",
    modelEnv: "OPENAI_MODEL",
    baseURL: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
  },
  deepseek: {
    apiKeyEnv: "DEEPSEEK_API_KEY",
    baseUrlEnv: "DEEPSEEK_BASE_URL",
    modelEnv: "DEEPSEEK_MODEL",
    baseURL: "https://api.deepseek.com/v1",
    model: "deepseek-chat",
  },
};

const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 1_000;
const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504]);

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullable().optional(),
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                type: z.string().optional(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().nullable().optional(),
                }),
              })
            )
            .nullable()
            .optional(),
        }),
      })
    )
    .min(1),
});

type WireMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string;
      tool_calls?: Array<{
        id: string;
        type: "function";
        function: { name: string; arguments: string };
      }>;
    }
  | { role: "tool"; tool_call_id: string; name: string; content: string };

/**
 * OpenAI 兼容 /chat/completions 接口的模型网关。
 * 网络错误、超时与 408/409/429/5xx 会按指数退避重试，重试耗尽后抛出 ModelGatewayError。
 */
export class ChatModelClient implements ModelGateway {
  private readonly provider: ChatModelProvider;

  private readonly apiKey: string | null;

  private readonly endpoint: string;

  private readonly model: string;

  private readonly requestTimeoutMs: number;

  private readonly headers: Record<string, string>;

  private readonly temperature: number;

  private readonly maxTokens: number;

  private readonly maxAttempts: number;

  private readonly retryDelayMs: number;

  constructor(options?: ChatModelClientOptions) {
    this.provider = resolveProvider(options);
    const defaults = PROVIDER_DEFAULTS[this.provider];

    const resolvedApiKey =
      options?.apiKey ?? process.env[defaults.apiKeyEnv] ?? null;
    this.apiKey =
      typeof resolvedApiKey === "string" && resolvedApiKey.length > 0
        ? resolvedApiKey
        : null;

    const baseURL =
      options?.baseURL ?? process.env[defaults.baseUrlEnv] ?? defaults.baseURL;
    this.endpoint = `${stripTrailingSlash(baseURL)}/chat/completions`;

    this.model =
      options?.model ?? process.env[defaults.modelEnv] ?? defaults.model;

    this.requestTimeoutMs =
      typeof options?.requestTimeoutMs === "number"
        ? options.requestTimeoutMs
        : DEFAULT_REQUEST_TIMEOUT_MS;
    this.temperature = options?.temperature ?? 0.7;
    this.maxTokens = options?.maxTokens ?? 4096;
    this.maxAttempts = Math.max(1, options?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryDelayMs = Math.max(0, options?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
    this.headers = {
      "Content-Type": "application/json",
      ...(options?.headers ?? {}),
    };
  }

  public isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  public async complete(
    conversation: ChatMessage[],
    options?: CompletionOptions
  ): Promise<ModelCompletion> {
    if (!this.apiKey) {
      throw new ModelGatewayError(
        `ChatModelClient (${this.provider}) is not configured with an API key`
      );
    }

    const body: Record<string, unknown> = {
      model: this.model,
      temperature: options?.temperature ?? this.temperature,
      max_tokens: options?.maxTokens ?? this.maxTokens,
      messages: conversation.map(toWireMessage),
    };
    if (options?.tools && options.tools.length > 0) {
      body.tools = options.tools;
      body.tool_choice = "auto";
    }

    const payload = JSON.stringify(body);
    let lastError: ModelGatewayError | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (options?.signal?.aborted) {
        throw new RunCancelledError("Model request was cancelled by the caller");
      }
      try {
        return await this.send(payload, attempt, options?.signal);
      } catch (error) {
        // 调用方主动取消时不再重试，与超时触发的中止区分开
        if (options?.signal?.aborted) {
          throw new RunCancelledError("Model request was cancelled by the caller");
        }
        const gatewayError =
          error instanceof ModelGatewayError
            ? error
            : new ModelGatewayError(
                `${capitalize(this.provider)} request failed: ${
                  error instanceof Error ? error.message : String(error)
                }`,
                { retryable: true, attempts: attempt, cause: error }
              );
        if (!gatewayError.retryable || attempt === this.maxAttempts) {
          throw new ModelGatewayError(gatewayError.message, {
            status: gatewayError.status,
            retryable: gatewayError.retryable,
            attempts: attempt,
            cause: gatewayError.cause ?? error,
          });
        }
        lastError = gatewayError;
        const waitMs = this.retryDelayMs * 2 ** (attempt - 1);
        console.warn(
          `[ChatModelClient] Attempt ${attempt}/${this.maxAttempts} failed (${gatewayError.message}), retrying in ${waitMs}ms`
        );
        await sleep(waitMs);
      }
    }

    throw (
      lastError ??
      new ModelGatewayError(`${capitalize(this.provider)} request failed`)
    );
  }

  private async send(
    payload: string,
    attempt: number,
    signal: AbortSignal | undefined
  ): Promise<ModelCompletion> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          ...this.headers,
          Authorization: `Bearer ${this.apiKey ?? ""}`,
        },
        body: payload,
        signal: controller.signal,
      });

      if (!response.ok) {
        let errText = "";
        try {
          errText = await response.text();
        } catch {
          errText = "<unavailable>";
        }
        throw new ModelGatewayError(
          `${capitalize(this.provider)} request failed with status ${
            response.status
          } ${response.statusText}${errText ? `: ${errText}` : ""}`,
          {
            status: response.status,
            retryable: RETRYABLE_STATUS.has(response.status),
            attempts: attempt,
          }
        );
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (error) {
        throw new ModelGatewayError(
          `${capitalize(this.provider)} response body is not valid JSON`,
          { status: response.status, attempts: attempt, cause: error }
        );
      }
      const parsed = ChatCompletionResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new ModelGatewayError(
          `${capitalize(this.provider)} response did not match the chat completion shape`,
          { status: response.status, attempts: attempt, cause: parsed.error }
        );
      }

      const choice = parsed.data.choices[0];
      return {
        text: choice.message.content ?? null,
        toolInvocations: (choice.message.tool_calls ?? []).map((call) => ({
          id: call.id,
          toolName: call.function.name,
          argumentsText: call.function.arguments ?? "",
        })),
        stopReason: toStopReason(choice.finish_reason),
      };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

function toWireMessage(message: ChatMessage): WireMessage {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content };
    case "assistant":
      return message.toolCalls && message.toolCalls.length > 0
        ? {
            role: "assistant",
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: "function",
              function: { name: call.toolName, arguments: call.argumentsText },
            })),
          }
        : { role: "assistant", content: message.content };
    case "tool":
      return {
        role: "tool",
        tool_call_id: message.toolCallId,
        name: message.name,
        content: message.content,
      };
  }
}

function toStopReason(value: string | null | undefined): StopReason {
  switch (value) {
    case "stop":
    case "tool_calls":
    case "length":
    case "content_filter":
      return value;
    case "function_call":
      return "tool_calls";
    default:
      return "unknown";
  }
}

function resolveProvider(options?: ChatModelClientOptions): ChatModelProvider {
  if (options?.provider) {
    return options.provider;
  }

  const envProvider = (process.env.LLM_PROVIDER ?? "").toLowerCase();
  if (envProvider === "openai" || envProvider === "deepseek") {
    return envProvider;
  }

  const preferredProviders: ChatModelProvider[] = ["openai", "deepseek"];
  for (const provider of preferredProviders) {
    if (process.env[PROVIDER_DEFAULTS[provider].apiKeyEnv]) {
      return provider;
    }
  }

  return "openai";
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

function capitalize(value: string): string {
  if (!value) return value;
  return value.charAt(0).toUpperCase() + value.slice(1);
}
