import type { FinalEvaluation, StepEvaluation } from "../types/index.js";

const RULE = "=".repeat(60);

function bulletList(title: string, items: string[], marker: string): string[] {
  if (items.length === 0) {
    return [];
  }
  return ["", `${title}:`, ...items.map((item) => `  ${marker} ${item}`)];
}

export function formatStepEvaluation(evaluation: StepEvaluation): string {
  return [
    RULE,
    `Step ${evaluation.stepId} Evaluation`,
    RULE,
    `Description: ${evaluation.stepDescription}`,
    `Success: ${evaluation.success ? "✓" : "✗"}`,
    `Score: ${evaluation.score.toFixed(2)}`,
    "",
    `Reasoning: ${evaluation.reasoning}`,
    ...bulletList("Issues", evaluation.issues, "-"),
    ...bulletList("Suggestions", evaluation.suggestions, "-"),
    RULE,
  ].join("\n");
}

export function formatFinalEvaluation(evaluation: FinalEvaluation): string {
  return [
    RULE,
    "FINAL EVALUATION",
    RULE,
    `Goal: ${evaluation.goal}`,
    `Overall Success: ${evaluation.overallSuccess ? "✓" : "✗"}`,
    `Overall Score: ${evaluation.overallScore.toFixed(2)}`,
    "",
    `Summary: ${evaluation.summary}`,
    ...bulletList("Strengths", evaluation.strengths, "+"),
    ...bulletList("Weaknesses", evaluation.weaknesses, "-"),
    ...bulletList("Lessons Learned", evaluation.lessonsLearned, "→"),
    "",
    "Step Results:",
    ...evaluation.stepEvaluations.map(
      (step) =>
        `  ${step.success ? "✓" : "✗"} Step ${step.stepId}: ${step.stepDescription} (Score: ${step.score.toFixed(2)})`
    ),
    RULE,
  ].join("\n");
}
