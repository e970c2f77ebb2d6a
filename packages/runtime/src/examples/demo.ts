import { AgentRuntime } from "../core/AgentRuntime.js";
import { formatFinalEvaluation } from "../evaluator/formatEvaluation.js";
import { ChatModelClient } from "../llm/ChatModelClient.js";
import {
  ScriptedModelGateway,
  textCompletion,
  toolCallCompletion,
} from "../llm/ScriptedModelGateway.js";
import { InMemoryHistoryStore } from "../memory/HistoryStore.js";
import type { ModelGateway } from "../types/index.js";

const GOAL = "计算 10 * 5 + (5^3) - 10，并用一句话说明结果";

/**
 * 无需 API key 的脚本化回复：两步计划，第一步调用 calculator。
 */
function createOfflineGateway(): ScriptedModelGateway {
  return new ScriptedModelGateway([
    textCompletion(
      JSON.stringify({
        strategy: "Compute first, then explain",
        subtasks: [
          {
            id: 1,
            description: "Evaluate 10 * 5 + (5^3) - 10 with the calculator",
            reasoning: "The arithmetic must be exact",
            dependencies: [],
          },
          {
            id: 2,
            description: "Explain the result in one sentence",
            reasoning: "The user asked for a short explanation",
            dependencies: [1],
          },
        ],
      })
    ),
    toolCallCompletion([{ name: "calculator", args: { expression: "10 * 5 + (5^3) - 10" } }]),
    textCompletion("The expression evaluates to 165."),
    textCompletion(
      '{"success": true, "score": 1.0, "reasoning": "Calculator returned 165"}'
    ),
    textCompletion("10 * 5 + 5^3 - 10 equals 165: 50 plus 125, minus 10."),
    textCompletion('{"success": true, "score": 0.9, "reasoning": "Clear explanation"}'),
    textCompletion(
      JSON.stringify({
        summary: "The expression was evaluated and explained.",
        strengths: ["Used the calculator for exact arithmetic"],
        weaknesses: [],
        lessons_learned: ["Split computation from explanation"],
      })
    ),
  ]);
}

async function main() {
  const offline = process.argv.includes("--offline");
  const gateway: ModelGateway = offline ? createOfflineGateway() : new ChatModelClient();
  if (!gateway.isConfigured()) {
    console.warn(
      "[demo] No API key found (OPENAI_API_KEY / DEEPSEEK_API_KEY). Re-run with --offline to use scripted responses."
    );
    process.exitCode = 1;
    return;
  }

  const history = new InMemoryHistoryStore();
  const runtime = new AgentRuntime({
    gateway,
    historySink: history,
    settings: { agent: { verbose: true } },
  });

  const evaluation = await runtime.run(GOAL);
  console.log(formatFinalEvaluation(evaluation));
  console.log(`History entries: ${history.size()}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
