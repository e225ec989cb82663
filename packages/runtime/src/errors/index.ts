export * from "./AgentCoreError.js";
export * from "./AgentError.js";
export * from "./EventError.js";
export * from "./StrategyError.js";
export * from "./SystemError.js";
