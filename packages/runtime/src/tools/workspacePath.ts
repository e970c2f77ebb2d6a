import path from "node:path";

export type WorkspacePathResult =
  | { ok: true; absolutePath: string }
  | { ok: false; error: string };

/**
 * 把模型给出的路径解析到工作区根目录下，越界的路径被拒绝。
 */
export function resolveInWorkspace(
  workspaceRoot: string,
  requested: unknown,
  paramName: string
): WorkspacePathResult {
  if (typeof requested !== "string" || requested.trim().length === 0) {
    return { ok: false, error: `Missing ${paramName} parameter` };
  }
  const root = path.resolve(workspaceRoot);
  const absolutePath = path.resolve(root, requested);
  const relative = path.relative(root, absolutePath);
  if (
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return { ok: false, error: `Path must be inside the workspace: ${requested}` };
  }
  return { ok: true, absolutePath };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
