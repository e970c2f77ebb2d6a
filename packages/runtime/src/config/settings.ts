import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const SchedulingModeSchema = z.enum(["dependency", "declaration-order"]);

const AgentSectionSchema = z
  .object({
    name: z.string().min(1).default("TaskPilot"),
    maxIterations: z.number().int().positive().default(10),
    verbose: z.boolean().default(false),
    // 每次思考都是一次额外的模型请求，默认关闭
    thinkingEnabled: z.boolean().default(false),
  })
  .default({});

const LlmSectionSchema = z
  .object({
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(4096),
  })
  .default({});

const PlanningSectionSchema = z
  .object({
    maxSubtasks: z.number().int().positive().default(20),
    allowReplanning: z.boolean().default(true),
    maxReplans: z.number().int().nonnegative().default(3),
    scheduling: SchedulingModeSchema.default("dependency"),
  })
  .default({});

const EvaluationSectionSchema = z
  .object({
    stepEvaluation: z.boolean().default(true),
    finalEvaluation: z.boolean().default(true),
    successThreshold: z.number().min(0).max(1).default(0.7),
  })
  .default({});

export const AgentSettingsSchema = z.object({
  agent: AgentSectionSchema,
  llm: LlmSectionSchema,
  planning: PlanningSectionSchema,
  evaluation: EvaluationSectionSchema,
});

export type AgentSettings = z.infer<typeof AgentSettingsSchema>;

/** 未填写的字段由 schema 默认值补齐 */
export type AgentSettingsInput = z.input<typeof AgentSettingsSchema>;

/**
 * 校验并补齐设置；非法字段直接抛出 ZodError。
 */
export function parseAgentSettings(raw: unknown = {}): AgentSettings {
  return AgentSettingsSchema.parse(raw ?? {});
}

/**
 * 读取 YAML 或 JSON 设置文件（按扩展名区分，.json 以外一律按 YAML 解析）。
 */
export async function loadAgentSettingsFile(filePath: string): Promise<AgentSettings> {
  const text = await readFile(filePath, "utf-8");
  const raw: unknown =
    extname(filePath).toLowerCase() === ".json" ? JSON.parse(text) : parseYaml(text);
  return parseAgentSettings(raw);
}
