import type {
  ToolAdapter,
  ToolInput,
  ToolParameter,
  ToolResult,
} from "../types/index.js";
import { describeError } from "./workspacePath.js";

export const DEFAULT_MAX_CONTENT_LENGTH = 5000;

const FETCH_TIMEOUT_MS = 10_000;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePointOr(codePoint: number, fallback: string): string {
  return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : fallback;
}

function decodeEntities(text: string): string {
  return text.replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return fromCodePointOr(Number.parseInt(entity.slice(2), 16), match);
    }
    if (entity.startsWith("#")) {
      return fromCodePointOr(Number.parseInt(entity.slice(1), 10), match);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/**
 * 去掉 script/style 与全部标签，压缩空白。
 */
export function htmlToText(html: string): string {
  const withoutBlocks = html
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<(script|style|noscript)\b[\s\S]*?<\/\1>/gi, " ");
  const withoutTags = withoutBlocks.replace(/<[^>]+>/g, " ");
  return decodeEntities(withoutTags).replace(/\s+/g, " ").trim();
}

export function extractTitle(html: string): string | null {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  if (!match) {
    return null;
  }
  const title = decodeEntities(match[1]).replace(/\s+/g, " ").trim();
  return title.length > 0 ? title : null;
}

export class WebFetchTool implements ToolAdapter {
  public readonly name = "web_fetch";

  public readonly description = "Fetch and extract text content from a web URL";

  public readonly parameters: ToolParameter[] = [
    {
      name: "url",
      type: "string",
      description: "The http(s) URL to fetch content from",
      required: true,
    },
    {
      name: "max_length",
      type: "integer",
      description: `Maximum number of characters to return (default: ${DEFAULT_MAX_CONTENT_LENGTH})`,
      required: false,
    },
  ];

  async execute(input: ToolInput): Promise<ToolResult> {
    const rawUrl = input.params.url;
    if (typeof rawUrl !== "string" || rawUrl.trim().length === 0) {
      return { success: false, error: "Missing url parameter" };
    }

    let url: URL;
    try {
      url = new URL(rawUrl.trim());
    } catch {
      return { success: false, error: `Invalid URL: ${rawUrl}` };
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return { success: false, error: `Unsupported URL protocol: ${url.protocol}` };
    }

    const maxLength =
      typeof input.params.max_length === "number" && input.params.max_length > 0
        ? Math.floor(input.params.max_length)
        : DEFAULT_MAX_CONTENT_LENGTH;

    try {
      const response = await fetch(url, {
        headers: { "User-Agent": "Mozilla/5.0 (compatible; TaskPilot/0.1)" },
        signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
      });
      if (!response.ok) {
        return {
          success: false,
          error: `Error fetching URL: HTTP ${response.status}`,
        };
      }
      const body = await response.text();
      const text = htmlToText(body);
      return {
        success: true,
        result: {
          url: url.toString(),
          title: extractTitle(body),
          content: text.slice(0, maxLength),
          truncated: text.length > maxLength,
          status_code: response.status,
        },
      };
    } catch (error) {
      return { success: false, error: `Error fetching URL: ${describeError(error)}` };
    }
  }
}
