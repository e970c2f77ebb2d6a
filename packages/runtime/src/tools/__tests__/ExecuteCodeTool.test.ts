import { describe, expect, it } from "vitest";
import { ExecuteCodeTool } from "../ExecuteCodeTool.js";

describe("ExecuteCodeTool", () => {
  const tool = new ExecuteCodeTool();

  it("captures stdout of a successful snippet", async () => {
    const result = await tool.execute({
      params: { code: "console.log(6 * 7)" },
      traceId: "t",
    });

    expect(result).toEqual({
      success: true,
      result: { stdout: "42\n", stderr: "", exit_code: 0 },
    });
  });

  it("reports a non-zero exit code as a failure", async () => {
    const result = await tool.execute({
      params: { code: "process.stderr.write('bad'); process.exit(3)" },
      traceId: "t",
    });

    expect(result).toEqual({
      success: false,
      result: { stdout: "", stderr: "bad", exit_code: 3 },
      error: "Process exited with code 3",
    });
  });

  it("kills a snippet that runs past its timeout", async () => {
    const result = await tool.execute({
      params: { code: "setInterval(() => {}, 1000)", timeout: 0.5 },
      traceId: "t",
    });

    expect(result).toEqual({
      success: false,
      error: "Code execution timed out after 0.5 seconds",
    });
  });

  it("caps an oversized timeout instead of firing it at once", async () => {
    const result = await tool.execute({
      params: { code: "setTimeout(() => console.log('late'), 200)", timeout: 1e9 },
      traceId: "t",
    });

    expect(result).toEqual({
      success: true,
      result: { stdout: "late\n", stderr: "", exit_code: 0 },
    });
  });

  it("requires code", async () => {
    expect(await tool.execute({ params: {}, traceId: "t" })).toEqual({
      success: false,
      error: "Missing code parameter",
    });
  });
});
