import type { ToolAdapter } from "../types/index.js";
import { InMemoryToolRegistry } from "../registry/ToolRegistry.js";
import { CalculatorTool } from "./CalculatorTool.js";
import { ExecuteCodeTool } from "./ExecuteCodeTool.js";
import { ListFilesTool, ReadFileTool, WriteFileTool } from "./FileTools.js";
import { WebFetchTool } from "./WebFetchTool.js";

export { CalculatorTool } from "./CalculatorTool.js";
export { DEFAULT_CODE_TIMEOUT_SECONDS, ExecuteCodeTool } from "./ExecuteCodeTool.js";
export type { ExecuteCodeToolOptions } from "./ExecuteCodeTool.js";
export { ListFilesTool, ReadFileTool, WriteFileTool } from "./FileTools.js";
export type { WorkspaceToolOptions } from "./FileTools.js";
export { DEFAULT_MAX_CONTENT_LENGTH, WebFetchTool, htmlToText } from "./WebFetchTool.js";

export interface DefaultToolsOptions {
  /** 文件工具与代码执行的根目录，默认 process.cwd() */
  workspaceRoot?: string;
}

export function createDefaultTools(options: DefaultToolsOptions = {}): ToolAdapter[] {
  const workspace =
    options.workspaceRoot === undefined ? {} : { workspaceRoot: options.workspaceRoot };
  return [
    new ReadFileTool(workspace),
    new WriteFileTool(workspace),
    new ListFilesTool(workspace),
    new ExecuteCodeTool(workspace),
    new WebFetchTool(),
    new CalculatorTool(),
  ];
}

export function createDefaultToolRegistry(
  options: DefaultToolsOptions = {}
): InMemoryToolRegistry {
  return new InMemoryToolRegistry(createDefaultTools(options));
}
