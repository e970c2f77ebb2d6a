import { describe, expect, it } from "vitest";
import { CalculatorTool } from "../CalculatorTool.js";
import { createDefaultToolRegistry } from "../index.js";

describe("CalculatorTool", () => {
  const tool = new CalculatorTool();

  it("evaluates an expression", async () => {
    expect(
      await tool.execute({ params: { expression: "10 * 5 + (5^3) - 10" }, traceId: "t" })
    ).toEqual({
      success: true,
      result: { expression: "10 * 5 + (5^3) - 10", value: 165 },
    });
  });

  it("formats non-numeric results", async () => {
    expect(await tool.execute({ params: { expression: "[1, 2] * 2" }, traceId: "t" })).toEqual({
      success: true,
      result: { expression: "[1, 2] * 2", value: "[2, 4]" },
    });
  });

  it("reports an invalid expression", async () => {
    const result = await tool.execute({ params: { expression: "2 +" }, traceId: "t" });

    expect(result.success).toBe(false);
    expect(result.error?.startsWith("Failed to evaluate expression:")).toBe(true);
  });

  it("requires an expression", async () => {
    expect(await tool.execute({ params: {}, traceId: "t" })).toEqual({
      success: false,
      error: "Missing expression parameter",
    });
  });
});

describe("createDefaultToolRegistry", () => {
  it("registers every built-in tool", () => {
    expect(
      createDefaultToolRegistry()
        .list()
        .map((tool) => tool.name)
    ).toEqual(["read_file", "write_file", "list_files", "execute_code", "web_fetch", "calculator"]);
  });
});
