import { z } from "zod";

export const SubTaskStatusSchema = z.enum([
  "pending", // 等待执行
  "in_progress", // 正在执行
  "completed", // 执行成功
  "failed", // 执行失败
]);

export const SubTaskResultSchema = z.object({
  /** 执行器是否正常结束 */
  success: z.boolean(),
  /** 模型最终给出的文本或其他结构化产出 */
  output: z.unknown(),
  /** 可选：失败原因 */
  error: z.string().optional(),
});

export const SubTaskSchema = z
  .object({
    /** 子任务编号，在同一个计划内唯一 */
    id: z.number().int(),
    /** 子任务要完成的具体内容 */
    description: z.string().min(1),
    /** 规划器给出的理由，评估时作为预期结果 */
    reasoning: z.string(),
    /** 必须先完成的子任务编号 */
    dependencies: z.array(z.number().int()),
    status: SubTaskStatusSchema,
    /** 执行后由编排器写入 */
    result: SubTaskResultSchema.optional(),
  })
  .strict();

export const PlanSchema = z
  .object({
    goal: z.string().min(1),
    /** 声明顺序，不等于执行顺序 */
    subtasks: z.array(SubTaskSchema),
    strategy: z.string(),
    /** ISO 8601 时间戳 */
    createdAt: z.string().min(1),
  })
  .strict()
  .superRefine((plan, ctx) => {
    const ids = new Set<number>();
    plan.subtasks.forEach((subtask, index) => {
      if (ids.has(subtask.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate subtask id ${subtask.id}`,
          path: ["subtasks", index, "id"],
        });
      }
      ids.add(subtask.id);
    });
    plan.subtasks.forEach((subtask, index) => {
      subtask.dependencies.forEach((dependency, depIndex) => {
        if (!ids.has(dependency)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Subtask ${subtask.id} depends on unknown subtask ${dependency}`,
            path: ["subtasks", index, "dependencies", depIndex],
          });
        }
      });
    });
  });

export const StepEvaluationSchema = z.object({
  stepId: z.number().int(),
  stepDescription: z.string(),
  success: z.boolean(),
  score: z.number().min(0).max(1),
  reasoning: z.string(),
  issues: z.array(z.string()),
  suggestions: z.array(z.string()),
});

export const FinalEvaluationSchema = z.object({
  goal: z.string(),
  overallSuccess: z.boolean(),
  overallScore: z.number().min(0).max(1),
  stepEvaluations: z.array(StepEvaluationSchema),
  summary: z.string(),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  lessonsLearned: z.array(z.string()),
});

export type SubTaskStatus = z.infer<typeof SubTaskStatusSchema>;
export type SubTaskResult = z.infer<typeof SubTaskResultSchema>;
export type SubTask = z.infer<typeof SubTaskSchema>;
export type Plan = z.infer<typeof PlanSchema>;
export type StepEvaluation = z.infer<typeof StepEvaluationSchema>;
export type FinalEvaluation = z.infer<typeof FinalEvaluationSchema>;

/**
 * 返回替换了指定子任务的新计划，原计划保持不变。
 */
export function withSubtask(
  plan: Plan,
  subtaskId: number,
  patch: Partial<Omit<SubTask, "id">>
): Plan {
  return {
    ...plan,
    subtasks: plan.subtasks.map((subtask) =>
      subtask.id === subtaskId ? { ...subtask, ...patch } : subtask
    ),
  };
}
