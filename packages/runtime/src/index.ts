export * from "./types/events.js";
export * from "./types/systems.js";
export * from "./types/strategy.js";
export * from "./types/sources.js";
export * from "./types/agent.js";
export * from "./errors/index.js";
export * from "./logging/logger.js";
export * from "./config/agentConfig.js";
export * from "./event/EntityId.js";
export * from "./event/EventType.js";
export * from "./event/EventBus.js";
export * from "./registry/HandlerRegistry.js";
export * from "./registry/SystemType.js";
export * from "./registry/SystemRegistry.js";
export * from "./core/SystemHandle.js";
export * from "./core/AgentContext.js";
export * from "./core/ExecutionTracker.js";
export * from "./core/StrategyTools.js";
export * from "./core/AgentLoop.js";
export * from "./fsm/lifecycleMachine.js";
export * from "./strategy/actions.js";
export * from "./strategy/RuleStrategy.js";
export * from "./strategy/functionStrategy.js";
export * from "./sources/QueueEventSource.js";
export * from "./sources/IterableEventSource.js";
export * from "./sources/IntervalEventSource.js";
export * from "./systems/EchoSystem.js";
export * from "./systems/MathSystem.js";
export * from "./systems/DelaySystem.js";
