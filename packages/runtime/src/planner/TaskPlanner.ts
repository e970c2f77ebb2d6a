import { z } from "zod";
import type {
  ChatMessage,
  ModelGateway,
  Plan,
  Planner,
  SubTask,
} from "../types/index.js";
import { parseModelJson } from "../llm/parseModelJson.js";

export interface TaskPlannerOptions {
  gateway: ModelGateway;
  maxSubtasks?: number;
  temperature?: number;
  maxTokens?: number;
  /** 便于测试注入固定时间 */
  now?: () => Date;
}

export const DEFAULT_MAX_SUBTASKS = 20;

export const FALLBACK_STRATEGY = "Direct execution";

const FALLBACK_REASONING = "Direct execution of the goal";

const REPLAN_SYSTEM_PROMPT = [
  "You are an expert planning agent. A previous plan has run into a failure and needs to be revised.",
  "",
  "Produce an updated plan that:",
  "1. Preserves the subtasks that are already completed (keep their ids).",
  "2. Addresses the reported failure.",
  "3. Adds or replaces subtasks where needed to reach the goal.",
  "4. Adjusts the strategy if the failure calls for it.",
  "",
  "Output the updated plan in the same JSON format as the original plan:",
  '{ "strategy": string, "subtasks": [{ "id": number, "description": string, "reasoning": string, "dependencies": number[] }] }',
  "Output MUST be valid JSON without comments.",
].join("\n");

const LLMSubtaskSchema = z.object({
  id: z.coerce.number().int().optional(),
  description: z.string().trim().min(1),
  reasoning: z.string().optional(),
  dependencies: z.array(z.coerce.number().int()).optional(),
});

const LLMPlanSchema = z.object({
  strategy: z.string().optional(),
  subtasks: z.array(LLMSubtaskSchema).min(1),
});

type LLMPlan = z.infer<typeof LLMPlanSchema>;

export class TaskPlanner implements Planner {
  private readonly gateway: ModelGateway;

  private readonly maxSubtasks: number;

  private readonly temperature: number | undefined;

  private readonly maxTokens: number | undefined;

  private readonly now: () => Date;

  constructor(options: TaskPlannerOptions) {
    this.gateway = options.gateway;
    this.maxSubtasks = Math.max(1, options.maxSubtasks ?? DEFAULT_MAX_SUBTASKS);
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 把目标拆解为有序子任务。任何失败都退化为单子任务计划，不会抛出。
   */
  async createPlan(goal: string, context?: string): Promise<Plan> {
    const fallback = this.buildFallbackPlan(goal);

    if (!this.gateway.isConfigured()) {
      console.warn("[TaskPlanner] Model gateway is not configured, using fallback plan.");
      return fallback;
    }

    const messages: ChatMessage[] = [
      { role: "system", content: this.buildSystemPrompt() },
      {
        role: "user",
        content: [
          `Goal: ${goal}`,
          ...(context ? ["", `Context: ${context}`] : []),
          "",
          "Please create a detailed plan to achieve this goal.",
        ].join("\n"),
      },
    ];

    let content: string;
    try {
      content = await this.requestText(messages);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(
        `[TaskPlanner] LLM planning failed (${message}). Using fallback plan.`
      );
      return fallback;
    }

    const parsed = parseModelJson(content, LLMPlanSchema, null);
    if (!parsed.ok) {
      console.warn(
        `[TaskPlanner] Could not parse plan (${parsed.reason}). Using fallback plan.`
      );
      return fallback;
    }

    return {
      goal,
      subtasks: this.normalizeSubtasks(parsed.value, () => "pending"),
      strategy: parsed.value.strategy?.trim() ?? "",
      createdAt: this.now().toISOString(),
    };
  }

  /**
   * 根据失败原因修订计划。解析失败时原样返回 originalPlan（同一个对象），
   * 调用方据此判断重规划没有产生进展。
   */
  async replan(
    originalPlan: Plan,
    completedSubtasks: ReadonlySet<number>,
    failureReason: string
  ): Promise<Plan> {
    if (!this.gateway.isConfigured()) {
      console.warn("[TaskPlanner] Model gateway is not configured, keeping original plan.");
      return originalPlan;
    }

    const completedIds = Array.from(completedSubtasks).sort((a, b) => a - b);
    const messages: ChatMessage[] = [
      { role: "system", content: REPLAN_SYSTEM_PROMPT },
      {
        role: "user",
        content: [
          `Original Goal: ${originalPlan.goal}`,
          `Original Strategy: ${originalPlan.strategy}`,
          `Completed Subtasks: ${JSON.stringify(completedIds)}`,
          `Failure Reason: ${failureReason}`,
          "",
          "Original Subtasks:",
          JSON.stringify(originalPlan.subtasks, null, 2),
          "",
          "Please create an updated plan to continue towards the goal.",
        ].join("\n"),
      },
    ];

    let content: string;
    try {
      content = await this.requestText(messages);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[TaskPlanner] LLM replanning failed (${message}). Keeping original plan.`);
      return originalPlan;
    }

    const parsed = parseModelJson(content, LLMPlanSchema, null);
    if (!parsed.ok) {
      console.warn(
        `[TaskPlanner] Could not parse revised plan (${parsed.reason}). Keeping original plan.`
      );
      return originalPlan;
    }

    const previousResults = new Map(
      originalPlan.subtasks.map((subtask) => [subtask.id, subtask.result])
    );
    const subtasks = this.normalizeSubtasks(parsed.value, (id) =>
      completedSubtasks.has(id) ? "completed" : "pending"
    ).map((subtask) => {
      const previous = previousResults.get(subtask.id);
      return subtask.status === "completed" && previous
        ? { ...subtask, result: previous }
        : subtask;
    });

    const strategy = parsed.value.strategy?.trim();
    return {
      goal: originalPlan.goal,
      subtasks,
      strategy: strategy && strategy.length > 0 ? strategy : originalPlan.strategy,
      createdAt: this.now().toISOString(),
    };
  }

  public buildFallbackPlan(goal: string): Plan {
    return {
      goal,
      subtasks: [
        {
          id: 1,
          description: goal,
          reasoning: FALLBACK_REASONING,
          dependencies: [],
          status: "pending",
        },
      ],
      strategy: FALLBACK_STRATEGY,
      createdAt: this.now().toISOString(),
    };
  }

  private buildSystemPrompt(): string {
    return [
      "You are an expert planning agent. Decompose complex goals into clear, actionable subtasks.",
      "",
      "Rules:",
      `1. Break the goal down into ${this.maxSubtasks} or fewer subtasks.`,
      "2. Each subtask must be specific and actionable.",
      "3. Identify dependencies between subtasks by id.",
      "4. Give the reasoning for each subtask.",
      "5. Describe a high-level strategy.",
      "",
      "Output the plan as valid JSON with this structure:",
      "{",
      '  "strategy": "Overall strategy description",',
      '  "subtasks": [',
      '    { "id": 1, "description": "Subtask description", "reasoning": "Why this subtask is needed", "dependencies": [] }',
      "  ]",
      "}",
      "dependencies lists the ids of subtasks that must complete first; use [] when there are none.",
    ].join("\n");
  }

  private async requestText(messages: ChatMessage[]): Promise<string> {
    const completion = await this.gateway.complete(messages, {
      ...(this.temperature === undefined ? {} : { temperature: this.temperature }),
      ...(this.maxTokens === undefined ? {} : { maxTokens: this.maxTokens }),
    });
    return completion.text ?? "";
  }

  /**
   * 截断到 maxSubtasks，补齐/去重 ID，并把依赖过滤为计划内存在的其他子任务。
   */
  private normalizeSubtasks(
    plan: LLMPlan,
    resolveStatus: (id: number) => SubTask["status"]
  ): SubTask[] {
    const items = plan.subtasks.slice(0, this.maxSubtasks);
    const used = new Set<number>();
    const ids = items.map((item, index) => {
      const candidate = item.id ?? index + 1;
      if (!used.has(candidate)) {
        used.add(candidate);
        return candidate;
      }
      let next = Math.max(...used) + 1;
      while (used.has(next)) {
        next += 1;
      }
      used.add(next);
      return next;
    });

    return items.map((item, index) => {
      const id = ids[index];
      const dependencies = Array.from(new Set(item.dependencies ?? [])).filter(
        (dependency) => dependency !== id && used.has(dependency)
      );
      return {
        id,
        description: item.description,
        reasoning: item.reasoning?.trim() ?? "",
        dependencies,
        status: resolveStatus(id),
      };
    });
  }
}
