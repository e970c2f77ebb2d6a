import type {
  FunctionToolSchema,
  ToolAdapter,
  ToolRegistry,
} from "../types/index.js";

export class InMemoryToolRegistry implements ToolRegistry {
  private tools = new Map<string, ToolAdapter>();

  constructor(tools: ToolAdapter[] = []) {
    tools.forEach((tool) => {
      this.tools.set(tool.name, tool);
    });
  }

  public register(tool: ToolAdapter): void {
    this.tools.set(tool.name, tool);
  }

  public get(name: string): ToolAdapter | undefined {
    return this.tools.get(name);
  }

  public list(): ToolAdapter[] {
    return Array.from(this.tools.values());
  }

  public toFunctionSchemas(): FunctionToolSchema[] {
    return this.list().map(toFunctionSchema);
  }
}

export function toFunctionSchema(tool: ToolAdapter): FunctionToolSchema {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const param of tool.parameters) {
    properties[param.name] = {
      type: param.type,
      description: param.description,
      ...(param.enum ? { enum: param.enum } : {}),
    };
    if (param.required) {
      required.push(param.name);
    }
  }

  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { type: "object", properties, required },
    },
  };
}
