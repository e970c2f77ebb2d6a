import { z } from "zod";
import type {
  ChatMessage,
  Evaluator,
  FinalEvaluation,
  ModelGateway,
  StepEvaluation,
  SubTaskResult,
} from "../types/index.js";
import { parseModelJson } from "../llm/parseModelJson.js";

export interface TaskEvaluatorOptions {
  gateway: ModelGateway;
  /** overallScore 大于等于该阈值即判定成功 */
  successThreshold?: number;
  /** 为 false 时终评不请求模型，直接给出按得分生成的总结 */
  finalEvaluation?: boolean;
  temperature?: number;
}

export const DEFAULT_SUCCESS_THRESHOLD = 0.7;

export const AUTOMATIC_STEP_REASONING =
  "Automatic evaluation based on result status";

const STEP_SYSTEM_PROMPT = [
  "You are an expert evaluator. Assess whether a task step was successful.",
  "",
  "Provide your evaluation as JSON with this structure:",
  "{",
  '  "success": true | false,',
  '  "score": number between 0.0 and 1.0,',
  '  "reasoning": "Explanation of your evaluation",',
  '  "issues": ["Issues found"],',
  '  "suggestions": ["Suggestions for improvement"]',
  "}",
].join("\n");

const FINAL_SYSTEM_PROMPT = [
  "You are an expert evaluator conducting a final assessment of a task execution.",
  "",
  "Analyze the overall performance and answer as JSON:",
  "{",
  '  "summary": "Overall summary of the execution",',
  '  "strengths": ["Strengths"],',
  '  "weaknesses": ["Weaknesses"],',
  '  "lessons_learned": ["Key lessons from this execution"]',
  "}",
].join("\n");

const StepResponseSchema = z.object({
  success: z.boolean(),
  score: z.number().transform((value) => clampScore(value)),
  reasoning: z.string().optional().default(""),
  issues: z.array(z.string()).optional().default([]),
  suggestions: z.array(z.string()).optional().default([]),
});

const FinalResponseSchema = z.object({
  summary: z.string(),
  strengths: z.array(z.string()).optional().default([]),
  weaknesses: z.array(z.string()).optional().default([]),
  lessons_learned: z.array(z.string()).optional().default([]),
});

/**
 * 步骤得分的算术平均；没有任何步骤时为 0。
 */
export function computeOverallScore(scores: readonly number[]): number {
  if (scores.length === 0) {
    return 0;
  }
  const total = scores.reduce((sum, score) => sum + score, 0);
  return total / scores.length;
}

export class TaskEvaluator implements Evaluator {
  private readonly gateway: ModelGateway;

  private readonly successThreshold: number;

  private readonly finalEvaluation: boolean;

  private readonly temperature: number;

  constructor(options: TaskEvaluatorOptions) {
    this.gateway = options.gateway;
    this.successThreshold = options.successThreshold ?? DEFAULT_SUCCESS_THRESHOLD;
    this.finalEvaluation = options.finalEvaluation ?? true;
    this.temperature = options.temperature ?? 0.3;
  }

  async evaluateStep(
    stepId: number,
    stepDescription: string,
    expectedOutcome: string,
    actualResult: SubTaskResult
  ): Promise<StepEvaluation> {
    const fallback: StepEvaluation = {
      stepId,
      stepDescription,
      success: actualResult.success,
      score: actualResult.success ? 1 : 0,
      reasoning: AUTOMATIC_STEP_REASONING,
      issues: actualResult.success ? [] : [actualResult.error ?? "Unknown error"],
      suggestions: [],
    };

    const content = await this.requestText(
      [
        { role: "system", content: STEP_SYSTEM_PROMPT },
        {
          role: "user",
          content: [
            `Step: ${stepDescription}`,
            `Expected Outcome: ${expectedOutcome}`,
            `Actual Result: ${safeStringify(actualResult)}`,
            "",
            "Please evaluate this step.",
          ].join("\n"),
        },
      ],
      "step evaluation"
    );
    if (content === null) {
      return fallback;
    }

    const parsed = parseModelJson(content, StepResponseSchema, null);
    if (!parsed.ok) {
      console.warn(
        `[TaskEvaluator] Could not parse step ${stepId} evaluation (${parsed.reason}), using result status.`
      );
      return fallback;
    }

    return {
      stepId,
      stepDescription,
      success: parsed.value.success,
      score: parsed.value.score,
      reasoning: parsed.value.reasoning,
      issues: parsed.value.issues,
      suggestions: parsed.value.suggestions,
    };
  }

  async evaluateFinal(
    goal: string,
    stepEvaluations: StepEvaluation[],
    finalOutput: unknown
  ): Promise<FinalEvaluation> {
    const overallScore = computeOverallScore(
      stepEvaluations.map((evaluation) => evaluation.score)
    );
    const overallSuccess = overallScore >= this.successThreshold;
    const base = {
      goal,
      overallSuccess,
      overallScore,
      stepEvaluations,
    };

    const fallback: FinalEvaluation = {
      ...base,
      summary: `Task ${
        overallSuccess ? "completed successfully" : "failed"
      } with an overall score of ${overallScore.toFixed(2)}`,
      strengths: ["Task execution attempted"],
      weaknesses: overallSuccess ? [] : ["Some steps failed"],
      lessonsLearned: [],
    };
    if (!this.finalEvaluation) {
      return fallback;
    }

    const stepsSummary = stepEvaluations
      .map(
        (evaluation) =>
          `Step ${evaluation.stepId}: ${evaluation.stepDescription} - ${
            evaluation.success ? "Success" : "Failed"
          } (Score: ${evaluation.score})`
      )
      .join("\n");

    const content = await this.requestText(
      [
        { role: "system", content: FINAL_SYSTEM_PROMPT },
        {
          role: "user",
          content: [
            `Goal: ${goal}`,
            "",
            "Steps Executed:",
            stepsSummary.length > 0 ? stepsSummary : "(none)",
            "",
            `Overall Score: ${overallScore.toFixed(2)}`,
            "",
            `Final Output: ${safeStringify(finalOutput)}`,
            "",
            "Please provide a comprehensive final evaluation.",
          ].join("\n"),
        },
      ],
      "final evaluation"
    );
    if (content === null) {
      return fallback;
    }

    const parsed = parseModelJson(content, FinalResponseSchema, null);
    if (!parsed.ok) {
      console.warn(
        `[TaskEvaluator] Could not parse final evaluation (${parsed.reason}), using templated summary.`
      );
      return fallback;
    }

    return {
      ...base,
      summary: parsed.value.summary,
      strengths: parsed.value.strengths,
      weaknesses: parsed.value.weaknesses,
      lessonsLearned: parsed.value.lessons_learned,
    };
  }

  /**
   * 返回模型文本；网关未配置或请求失败时返回 null，由调用方使用兜底结果。
   */
  private async requestText(
    messages: ChatMessage[],
    scope: string
  ): Promise<string | null> {
    if (!this.gateway.isConfigured()) {
      return null;
    }
    try {
      const completion = await this.gateway.complete(messages, {
        temperature: this.temperature,
      });
      return completion.text ?? "";
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[TaskEvaluator] LLM ${scope} failed (${message}), using fallback.`);
      return null;
    }
  }
}

function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

function safeStringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}
