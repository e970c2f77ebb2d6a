import { spawn } from "node:child_process";
import type {
  ToolAdapter,
  ToolInput,
  ToolParameter,
  ToolResult,
} from "../types/index.js";
import { describeError } from "./workspacePath.js";

export const DEFAULT_CODE_TIMEOUT_SECONDS = 30;

/** 模型给出的超时上限，同时保证毫秒值落在 setTimeout 的有效范围内 */
export const MAX_CODE_TIMEOUT_SECONDS = 600;

export interface ExecuteCodeToolOptions {
  /** 子进程工作目录，默认 process.cwd() */
  workspaceRoot?: string;
  defaultTimeoutSeconds?: number;
}

/**
 * 在独立的 Node.js 子进程中执行 JavaScript 片段，收集 stdout/stderr 与退出码。
 */
export class ExecuteCodeTool implements ToolAdapter {
  public readonly name = "execute_code";

  public readonly description =
    "Execute a JavaScript snippet with Node.js and return its output";

  public readonly parameters: ToolParameter[] = [
    {
      name: "code",
      type: "string",
      description: "The JavaScript code to execute",
      required: true,
    },
    {
      name: "timeout",
      type: "number",
      description: `Timeout in seconds (default: ${DEFAULT_CODE_TIMEOUT_SECONDS})`,
      required: false,
    },
  ];

  private readonly workspaceRoot: string;

  private readonly defaultTimeoutSeconds: number;

  constructor(options: ExecuteCodeToolOptions = {}) {
    this.workspaceRoot = options.workspaceRoot ?? process.cwd();
    this.defaultTimeoutSeconds =
      options.defaultTimeoutSeconds ?? DEFAULT_CODE_TIMEOUT_SECONDS;
  }

  async execute(input: ToolInput): Promise<ToolResult> {
    const { code } = input.params;
    if (typeof code !== "string" || code.trim().length === 0) {
      return { success: false, error: "Missing code parameter" };
    }
    const timeoutSeconds = Math.min(
      typeof input.params.timeout === "number" && input.params.timeout > 0
        ? input.params.timeout
        : this.defaultTimeoutSeconds,
      MAX_CODE_TIMEOUT_SECONDS
    );

    return new Promise<ToolResult>((resolve) => {
      const child = spawn(process.execPath, ["-e", code], {
        cwd: this.workspaceRoot,
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const stdoutChunks: string[] = [];
      const stderrChunks: string[] = [];
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, timeoutSeconds * 1000);

      child.stdout.on("data", (chunk) => stdoutChunks.push(String(chunk)));
      child.stderr.on("data", (chunk) => stderrChunks.push(String(chunk)));

      child.on("error", (error) => {
        clearTimeout(timer);
        resolve({
          success: false,
          error: `Error executing code: ${describeError(error)}`,
        });
      });

      child.on("close", (exitCode) => {
        clearTimeout(timer);
        if (timedOut) {
          resolve({
            success: false,
            error: `Code execution timed out after ${timeoutSeconds} seconds`,
          });
          return;
        }
        resolve({
          success: exitCode === 0,
          result: {
            stdout: stdoutChunks.join(""),
            stderr: stderrChunks.join(""),
            exit_code: exitCode,
          },
          ...(exitCode === 0 ? {} : { error: `Process exited with code ${exitCode}` }),
        });
      });
    });
  }
}
