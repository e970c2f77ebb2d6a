export * from "./types/index.js";
export * from "./config/settings.js";
export * from "./core/AgentRuntime.js";
export * from "./core/Executor.js";
export * from "./core/scheduler.js";
export * from "./planner/TaskPlanner.js";
export * from "./evaluator/TaskEvaluator.js";
export * from "./evaluator/formatEvaluation.js";
export * from "./event/EventBus.js";
export * from "./event/consoleReporter.js";
export * from "./fsm/orchestratorMachine.js";
export * from "./llm/errors.js";
export * from "./llm/ChatModelClient.js";
export * from "./llm/ScriptedModelGateway.js";
export * from "./llm/parseModelJson.js";
export * from "./memory/HistoryStore.js";
export * from "./reasoning/ThinkingModule.js";
export * from "./registry/ToolRegistry.js";
export * from "./tools/index.js";
