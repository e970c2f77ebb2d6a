import type { ZodTypeAny, output } from "zod";

export type ParseOutcome<T, F> =
  | { ok: true; value: T }
  | { ok: false; value: F; reason: string };

/**
 * 从模型回复中取出 JSON 文本：优先 ```json 围栏，其次任意 ``` 围栏，
 * 再退到最外层的 {...} 片段。
 */
export function extractJsonPayload(content: string): string {
  const fenced = content.match(/```json\s*([\s\S]+?)```/i);
  if (fenced) {
    return fenced[1].trim();
  }
  const altFence = content.match(/```([\s\S]+?)```/);
  if (altFence) {
    return altFence[1].trim();
  }
  const trimmed = content.trim();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    return trimmed;
  }
  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start !== -1 && end > start) {
    return trimmed.slice(start, end + 1);
  }
  return trimmed;
}

/**
 * 规划器与评估器共用的解析步骤：去围栏、JSON 解码、zod 校验，
 * 任一环节失败都返回调用方给出的兜底值。
 */
export function parseModelJson<S extends ZodTypeAny, F>(
  content: string,
  schema: S,
  fallback: F
): ParseOutcome<output<S>, F> {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonPayload(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, value: fallback, reason: `Invalid JSON: ${message}` };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return {
      ok: false,
      value: fallback,
      reason: `Schema mismatch${where}: ${issue?.message ?? "unknown issue"}`,
    };
  }
  return { ok: true, value: parsed.data };
}

/**
 * 解析工具调用参数。非 JSON 或非对象一律视为空参数。
 */
export function parseToolArguments(argumentsText: string): Record<string, unknown> {
  if (argumentsText.trim().length === 0) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(argumentsText);
  } catch {
    return {};
  }
  if (!isRecord(raw)) {
    return {};
  }
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
