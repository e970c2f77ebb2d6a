import { afterEach, describe, expect, it, vi } from "vitest";
import type { BusEvent, ToolAdapter, ToolInput, ToolResult } from "../../types/index.js";
import { EventBus } from "../../event/EventBus.js";
import { ChatModelClient } from "../../llm/ChatModelClient.js";
import { RunCancelledError } from "../../llm/errors.js";
import {
  ScriptedModelGateway,
  textCompletion,
  toolCallCompletion,
} from "../../llm/ScriptedModelGateway.js";
import { ThinkingModule } from "../../reasoning/ThinkingModule.js";
import { InMemoryToolRegistry } from "../../registry/ToolRegistry.js";
import { Executor, MAX_ITERATIONS_ERROR } from "../Executor.js";

function createEchoTool() {
  const execute = vi.fn(
    async ({ params }: ToolInput): Promise<ToolResult> => ({
      success: true,
      result: params.text,
    })
  );
  const tool: ToolAdapter = {
    name: "echo",
    description: "Echoes its text parameter",
    parameters: [{ name: "text", type: "string", description: "Text", required: true }],
    execute,
  };
  return { tool, execute };
}

describe("Executor", () => {
  it("runs tool calls in order and succeeds on a final answer", async () => {
    const echo = createEchoTool();
    const gateway = new ScriptedModelGateway([
      toolCallCompletion([
        { name: "echo", args: { text: "first" } },
        { name: "echo", args: { text: "second" } },
      ]),
      toolCallCompletion([{ name: "echo", args: { text: "third" }, id: "call_9" }]),
      textCompletion("all done"),
    ]);
    const executor = new Executor({
      gateway,
      toolRegistry: new InMemoryToolRegistry([echo.tool]),
    });

    const result = await executor.executeTask("Say three things");

    expect(result.success).toBe(true);
    expect(result.output).toBe("all done");
    expect(result.iterations).toBe(3);
    expect(result.toolCalls.map((call) => call.result.result)).toEqual([
      "first",
      "second",
      "third",
    ]);
    expect(echo.execute).toHaveBeenCalledTimes(3);

    const lastConversation = gateway.calls[2].conversation;
    expect(lastConversation.map((message) => message.role)).toEqual([
      "system",
      "user",
      "assistant",
      "tool",
      "tool",
      "assistant",
      "tool",
    ]);
    expect(lastConversation[1]).toEqual({ role: "user", content: "Task: Say three things" });
    expect(lastConversation[6]).toEqual({
      role: "tool",
      toolCallId: "call_9",
      name: "echo",
      content: '{"success":true,"result":"third"}',
    });
  });

  it("offers every registered tool on each request", async () => {
    const gateway = new ScriptedModelGateway([textCompletion("ok")]);
    const executor = new Executor({
      gateway,
      toolRegistry: new InMemoryToolRegistry([createEchoTool().tool]),
    });

    await executor.executeTask("Anything", { context: "Some background" });

    expect(gateway.calls[0].options?.tools?.map((tool) => tool.function.name)).toEqual([
      "echo",
    ]);
    expect(gateway.calls[0].conversation[1]).toEqual({
      role: "user",
      content: "Task: Anything\n\nContext: Some background",
    });
  });

  it("fails after the iteration budget when the model never stops", async () => {
    const gateway = new ScriptedModelGateway([], {
      fallback: textCompletion("still thinking", "length"),
    });
    const executor = new Executor({
      gateway,
      toolRegistry: new InMemoryToolRegistry(),
      maxIterations: 3,
    });

    const result = await executor.executeTask("Never ending");

    expect(result).toEqual({
      success: false,
      output: "Max iterations reached",
      error: MAX_ITERATIONS_ERROR,
      toolCalls: [],
      iterations: 3,
    });
    expect(gateway.calls).toHaveLength(3);
  });

  it("reports an unknown tool to the model and keeps going", async () => {
    const gateway = new ScriptedModelGateway([
      toolCallCompletion([{ name: "teleport", args: { to: "mars" } }]),
      textCompletion("I could not teleport"),
    ]);
    const executor = new Executor({ gateway, toolRegistry: new InMemoryToolRegistry() });

    const result = await executor.executeTask("Go to mars");

    expect(result.success).toBe(true);
    expect(result.toolCalls).toEqual([
      {
        tool: "teleport",
        arguments: { to: "mars" },
        result: { success: false, error: "Tool 'teleport' not found" },
      },
    ]);
    expect(gateway.calls[1].conversation[3]).toEqual({
      role: "tool",
      toolCallId: "call_1",
      name: "teleport",
      content: '{"success":false,"error":"Tool \'teleport\' not found"}',
    });
  });

  it("passes empty arguments when the model sends malformed JSON", async () => {
    const echo = createEchoTool();
    const gateway = new ScriptedModelGateway([
      toolCallCompletion([{ name: "echo", args: "{text: oops" }]),
      textCompletion("done"),
    ]);
    const executor = new Executor({ gateway, toolRegistry: new InMemoryToolRegistry([echo.tool]) });

    const result = await executor.executeTask("Echo something");

    expect(echo.execute).toHaveBeenCalledWith({ params: {}, traceId: expect.any(String) });
    expect(result.toolCalls[0].arguments).toEqual({});
  });

  it("converts a throwing tool into a failed tool result", async () => {
    const broken: ToolAdapter = {
      name: "broken",
      description: "Always throws",
      parameters: [],
      execute: async () => {
        throw new Error("disk on fire");
      },
    };
    const gateway = new ScriptedModelGateway([
      toolCallCompletion([{ name: "broken" }]),
      textCompletion("gave up"),
    ]);
    const executor = new Executor({ gateway, toolRegistry: new InMemoryToolRegistry([broken]) });

    const result = await executor.executeTask("Use the broken tool");

    expect(result.toolCalls[0].result).toEqual({
      success: false,
      error: "Tool 'broken' failed: disk on fire",
    });
  });

  it("publishes tool events with the caller's trace id", async () => {
    const eventBus = new EventBus();
    const events: BusEvent[] = [];
    const subscription = eventBus.events().subscribe((event) => events.push(event));
    const gateway = new ScriptedModelGateway([
      toolCallCompletion([{ name: "echo", args: { text: "hi" } }]),
      textCompletion("done"),
    ]);
    const executor = new Executor({
      gateway,
      toolRegistry: new InMemoryToolRegistry([createEchoTool().tool]),
      eventBus,
    });

    await executor.executeTask("Echo", { traceId: "trace-1", taskId: 4 });
    subscription.unsubscribe();

    expect(events.map((event) => [event.type, event.traceId, event.relatedTaskId])).toEqual([
      ["tool.request", "trace-1", 4],
      ["tool.result", "trace-1", 4],
    ]);
  });

  it("thinks before the task and reflects only on successful tool calls", async () => {
    const echo = createEchoTool();
    const gateway = new ScriptedModelGateway([
      toolCallCompletion([
        { name: "echo", args: { text: "hi" } },
        { name: "missing" },
      ]),
      textCompletion("done"),
    ]);
    const thinkerGateway = new ScriptedModelGateway([], { fallback: textCompletion("noted") });
    const thinker = new ThinkingModule({ gateway: thinkerGateway });
    const executor = new Executor({
      gateway,
      toolRegistry: new InMemoryToolRegistry([echo.tool]),
      thinker,
    });

    const result = await executor.executeTask("Greet", { traceId: "trace-7" });

    expect(result.success).toBe(true);
    expect(thinker.getThoughts("trace-7").map((thought) => thought.kind)).toEqual([
      "reasoning",
      "reflection",
    ]);
    expect(thinkerGateway.calls[1].conversation[1].content).toBe(
      'Context: Action taken: Used echo with {"text":"hi"}\nExpected outcome: The tool call succeeds' +
        '\nActual result: {"success":true,"result":"hi"}' +
        "\n\nQuestion: Did this action achieve what we wanted? What should we do next?"
    );
  });

  it("propagates gateway errors", async () => {
    const gateway = new ScriptedModelGateway([new Error("connection reset")]);
    const executor = new Executor({ gateway, toolRegistry: new InMemoryToolRegistry() });

    await expect(executor.executeTask("Anything")).rejects.toThrow("connection reset");
  });

  it("stops before the next iteration once cancelled", async () => {
    const controller = new AbortController();
    const gateway = new ScriptedModelGateway([
      () => {
        controller.abort();
        return toolCallCompletion([{ name: "missing" }]);
      },
    ]);
    const executor = new Executor({ gateway, toolRegistry: new InMemoryToolRegistry() });

    await expect(
      executor.executeTask("Cancel me", { signal: controller.signal })
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(gateway.calls).toHaveLength(1);
  });

  describe("with a live model client", () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it("raises a cancellation error when aborted while the model request is in flight", async () => {
      const fetchMock = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
          })
      );
      vi.stubGlobal("fetch", fetchMock);
      const gateway = new ChatModelClient({
        provider: "openai",
        apiKey: "test-secret",
        baseURL: "http://localhost:9999/v1",
        retryDelayMs: 0,
      });
      const executor = new Executor({ gateway, toolRegistry: new InMemoryToolRegistry() });
      const controller = new AbortController();

      const pending = executor
        .executeTask("Wait for the model", { signal: controller.signal })
        .catch((caught: unknown) => caught);
      controller.abort();

      expect(await pending).toBeInstanceOf(RunCancelledError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
