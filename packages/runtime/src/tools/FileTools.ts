import { promises as fs } from "node:fs";
import path from "node:path";
import type {
  ToolAdapter,
  ToolInput,
  ToolParameter,
  ToolResult,
} from "../types/index.js";
import { describeError, resolveInWorkspace } from "./workspacePath.js";

export interface WorkspaceToolOptions {
  /** 所有路径都相对此目录解析，默认 process.cwd() */
  workspaceRoot?: string;
}

/**
 * 读取工作区内的 UTF-8 文本文件。
 */
export class ReadFileTool implements ToolAdapter {
  public readonly name = "read_file";

  public readonly description = "Read the contents of a file from the filesystem";

  public readonly parameters: ToolParameter[] = [
    {
      name: "file_path",
      type: "string",
      description: "The path to the file to read",
      required: true,
    },
  ];

  private readonly workspaceRoot: string;

  constructor(options: WorkspaceToolOptions = {}) {
    this.workspaceRoot = options.workspaceRoot ?? process.cwd();
  }

  async execute(input: ToolInput): Promise<ToolResult> {
    const target = resolveInWorkspace(
      this.workspaceRoot,
      input.params.file_path,
      "file_path"
    );
    if (!target.ok) {
      return { success: false, error: target.error };
    }
    const filePath = String(input.params.file_path);

    try {
      const content = await fs.readFile(target.absolutePath, "utf8");
      return {
        success: true,
        result: {
          file_path: filePath,
          content,
          size: Buffer.byteLength(content, "utf8"),
        },
      };
    } catch (error) {
      if (isNotFound(error)) {
        return { success: false, error: `File not found: ${filePath}` };
      }
      return { success: false, error: `Error reading file: ${describeError(error)}` };
    }
  }
}

/**
 * 写入文本文件，父目录不存在时自动创建。
 */
export class WriteFileTool implements ToolAdapter {
  public readonly name = "write_file";

  public readonly description = "Write content to a file on the filesystem";

  public readonly parameters: ToolParameter[] = [
    {
      name: "file_path",
      type: "string",
      description: "The path to the file to write",
      required: true,
    },
    {
      name: "content",
      type: "string",
      description: "The content to write to the file",
      required: true,
    },
  ];

  private readonly workspaceRoot: string;

  constructor(options: WorkspaceToolOptions = {}) {
    this.workspaceRoot = options.workspaceRoot ?? process.cwd();
  }

  async execute(input: ToolInput): Promise<ToolResult> {
    const target = resolveInWorkspace(
      this.workspaceRoot,
      input.params.file_path,
      "file_path"
    );
    if (!target.ok) {
      return { success: false, error: target.error };
    }
    const content = input.params.content;
    if (typeof content !== "string") {
      return { success: false, error: "Missing content parameter" };
    }

    try {
      await fs.mkdir(path.dirname(target.absolutePath), { recursive: true });
      await fs.writeFile(target.absolutePath, content, "utf8");
      return {
        success: true,
        result: {
          file_path: String(input.params.file_path),
          bytes_written: Buffer.byteLength(content, "utf8"),
        },
      };
    } catch (error) {
      return { success: false, error: `Error writing file: ${describeError(error)}` };
    }
  }
}

/**
 * 列出目录下的文件与子目录。
 */
export class ListFilesTool implements ToolAdapter {
  public readonly name = "list_files";

  public readonly description = "List files and directories in a given path";

  public readonly parameters: ToolParameter[] = [
    {
      name: "directory_path",
      type: "string",
      description: "The directory path to list files from",
      required: true,
    },
  ];

  private readonly workspaceRoot: string;

  constructor(options: WorkspaceToolOptions = {}) {
    this.workspaceRoot = options.workspaceRoot ?? process.cwd();
  }

  async execute(input: ToolInput): Promise<ToolResult> {
    const target = resolveInWorkspace(
      this.workspaceRoot,
      input.params.directory_path,
      "directory_path"
    );
    if (!target.ok) {
      return { success: false, error: target.error };
    }
    const directoryPath = String(input.params.directory_path);

    try {
      const stats = await fs.stat(target.absolutePath);
      if (!stats.isDirectory()) {
        return { success: false, error: `Not a directory: ${directoryPath}` };
      }
      const entries = await fs.readdir(target.absolutePath, { withFileTypes: true });
      const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
      const directories = entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name);
      return {
        success: true,
        result: {
          directory_path: directoryPath,
          files: files.sort(),
          directories: directories.sort(),
          total_items: entries.length,
        },
      };
    } catch (error) {
      if (isNotFound(error)) {
        return { success: false, error: `Directory not found: ${directoryPath}` };
      }
      return { success: false, error: `Error listing directory: ${describeError(error)}` };
    }
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
