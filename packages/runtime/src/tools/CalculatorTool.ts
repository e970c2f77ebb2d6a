import { evaluate, format } from "mathjs";
import type {
  ToolAdapter,
  ToolInput,
  ToolParameter,
  ToolResult,
} from "../types/index.js";
import { describeError } from "./workspacePath.js";

export class CalculatorTool implements ToolAdapter {
  public readonly name = "calculator";

  public readonly description =
    'Evaluates a mathematical expression, e.g. "2 * (3 + 4)" or "sqrt(16) + 5^3".';

  public readonly parameters: ToolParameter[] = [
    {
      name: "expression",
      type: "string",
      description: "The expression to evaluate",
      required: true,
    },
  ];

  async execute(input: ToolInput): Promise<ToolResult> {
    const expression = String(input.params.expression ?? "").trim();
    if (!expression) {
      return { success: false, error: "Missing expression parameter" };
    }

    try {
      const value: unknown = evaluate(expression);
      return {
        success: true,
        result: {
          expression,
          // 数字原样返回，矩阵、单位等复杂结果转成可读文本
          value: typeof value === "number" ? value : format(value),
        },
      };
    } catch (error) {
      return {
        success: false,
        error: `Failed to evaluate expression: ${describeError(error)}`,
      };
    }
  }
}
